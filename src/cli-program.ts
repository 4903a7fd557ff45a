import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import {
  loadConfig as loadConfigFromDisk,
  maskSecret,
  missingGitLabSettings,
  type AppConfig,
  type LoadConfigOptions,
} from "./core/config";
import { GitLabClient, type IssueTracker } from "./core/gitlab-client";
import { createLogger, type Logger } from "./core/logger";
import { ProgressMonitor } from "./core/monitor";
import { MysqlSyncStore, applySchema, createMysqlExecutor } from "./core/mysql-store";
import { sleep as defaultSleep } from "./core/pool";
import { QueueProcessor, type BatchResult } from "./core/queue";
import { Reconciler } from "./core/reconcile";
import { addSeconds, formatTimestamp, isTaskAction, parseSheetTimestamp, TASK_ACTION_VALUES } from "./core/records";
import { RemoteSync } from "./core/remote-sync";
import { DEFAULT_TASK_PRIORITY, type SyncStore } from "./core/store";
import { parseUploadPayload, runUpload, type UploadSummary } from "./core/upload";

export type CliDeps = {
  loadConfig: (options: LoadConfigOptions) => Promise<AppConfig>;
  openStore: (config: AppConfig) => SyncStore;
  initSchema: (config: AppConfig) => Promise<number>;
  createTracker: (config: AppConfig) => IssueTracker;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
};

export const defaultCliDeps: CliDeps = {
  loadConfig: loadConfigFromDisk,
  openStore: (config) => new MysqlSyncStore(createMysqlExecutor(config.database)),
  initSchema: async (config) => {
    const executor = createMysqlExecutor(config.database);
    try {
      return await applySchema(executor);
    } finally {
      await executor.end();
    }
  },
  createTracker: (config) => GitLabClient.fromConfig(config.gitlab),
  now: () => new Date(),
  sleep: defaultSleep,
};

const stderrSink: Logger = {
  log: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

type CommandContext = {
  config: AppConfig;
  store: SyncStore;
  logger: (scope: string) => Logger;
  tracker: () => IssueTracker;
  reconciler: () => Reconciler;
  sync: () => RemoteSync;
  queue: () => QueueProcessor;
  monitor: () => ProgressMonitor;
};

function positiveInt(value: string): number {
  const trimmed = value.trim();
  if (!/^[0-9]+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new InvalidArgumentError("expected a positive integer.");
  }
  return Number(trimmed);
}

function integer(value: string): number {
  const trimmed = value.trim();
  if (!/^-?[0-9]+$/.test(trimmed)) {
    throw new InvalidArgumentError("expected an integer.");
  }
  return Number(trimmed);
}

function printErrors(errors: string[]): void {
  if (!errors.length) return;
  console.log("errors:");
  for (const entry of errors) {
    console.log(`- ${entry}`);
  }
}

function printUploadSummary(summary: UploadSummary): void {
  console.log(
    `total: ${summary.total} | inserted: ${summary.inserted} | updated: ${summary.updated} | ` +
      `skipped: ${summary.skipped} | failed: ${summary.failed}`,
  );
  console.log(`queued: ${summary.tasksEnqueued} | applied remotely: ${summary.remoteApplied}`);
  for (const skipped of summary.skippedRecords) {
    console.log(`skipped row ${skipped.row} (${skipped.projectName || "-"}): ${skipped.reason}`);
  }
  printErrors(summary.errors);
}

function printBatch(result: BatchResult): void {
  console.log(
    `processed: ${result.processed} | success: ${result.success} | retry: ${result.retry} | ` +
      `partial: ${result.partial} | failed: ${result.failed}`,
  );
  printErrors(result.errors);
}

export function createProgram(deps: CliDeps = defaultCliDeps): Command {
  const program = new Command();

  program
    .name("issue-sync")
    .description("Sync spreadsheet issue lists into MySQL and GitLab")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to issue-sync.yml");

  async function withContext(
    label: string,
    options: { json?: boolean },
    run: (context: CommandContext) => Promise<void>,
  ): Promise<void> {
    let store: SyncStore | null = null;
    try {
      const globalOpts = program.opts<{ config?: string }>();
      const config = await deps.loadConfig({ configPath: globalOpts.config ?? null });
      const openedStore = deps.openStore(config);
      store = openedStore;

      const logger = (scope: string): Logger => createLogger(scope, options.json ? stderrSink : console);
      let tracker: IssueTracker | null = null;
      const requireTracker = (): IssueTracker => {
        if (!tracker) {
          const missing = missingGitLabSettings(config);
          if (missing.length) {
            throw new Error(`missing GitLab settings: ${missing.join(", ")}`);
          }
          tracker = deps.createTracker(config);
        }
        return tracker;
      };
      const sync = (): RemoteSync =>
        new RemoteSync({ store: openedStore, tracker: requireTracker(), config, logger: logger("sync"), now: deps.now });

      await run({
        config,
        store: openedStore,
        logger,
        tracker: requireTracker,
        reconciler: () => new Reconciler({ store: openedStore, config, logger: logger("reconcile"), now: deps.now }),
        sync,
        queue: () =>
          new QueueProcessor({
            store: openedStore,
            sync: sync(),
            config: config.queue,
            logger: logger("queue"),
            now: deps.now,
            sleep: deps.sleep,
          }),
        monitor: () =>
          new ProgressMonitor({
            store: openedStore,
            tracker: requireTracker(),
            sync: sync(),
            config,
            logger: logger("monitor"),
            now: deps.now,
            sleep: deps.sleep,
          }),
      });
    } catch (error) {
      console.error(`${label}: ERROR`);
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    } finally {
      if (store) {
        await store.close();
      }
    }
  }

  program
    .command("upload")
    .description("Reconcile a spreadsheet export ({ table_data: [...] }) into the issues table")
    .argument("<file>", "Path to the upload JSON")
    .option("--immediate", "Apply remote changes right away, queueing only on failure", false)
    .option("--category <keyword>", "Only accept rows whose category contains this keyword")
    .option("--json", "Print the summary as JSON", false)
    .action(async (file: string, opts: { immediate: boolean; category?: string; json: boolean }) => {
      await withContext("upload", opts, async (context) => {
        const raw: unknown = JSON.parse(await readFile(file, "utf8"));
        const payload = parseUploadPayload(Array.isArray(raw) ? { table_data: raw } : raw);
        const summary = await runUpload(
          payload,
          {
            reconciler: context.reconciler(),
            remoteSync: opts.immediate ? context.sync() : undefined,
            logger: context.logger("upload"),
          },
          {
            immediate: opts.immediate,
            categoryKeyword: opts.category ?? context.config.upload.categoryKeyword,
          },
        );

        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          console.log(summary.failed || summary.errors.length ? "upload: DONE WITH ERRORS" : "upload: OK");
          printUploadSummary(summary);
        }
        if (summary.failed || summary.errors.length) {
          process.exitCode = 1;
        }
      });
    });

  const queue = program.command("queue").description("Work the GitLab sync task queue");

  queue
    .command("process")
    .description("Process one batch of ready tasks (or keep polling with --continuous)")
    .option("--batch-size <n>", "Tasks per batch", positiveInt)
    .option("--max-priority <n>", "Highest priority number to pick up", integer)
    .option("--workers <n>", "Concurrent workers", positiveInt)
    .option("--continuous", "Keep processing batches until interrupted", false)
    .option("--interval <seconds>", "Sleep between batches in continuous mode", positiveInt)
    .option("--iterations <n>", "Stop continuous mode after this many batches", positiveInt)
    .option("--json", "Print the batch result as JSON", false)
    .action(
      async (opts: {
        batchSize?: number;
        maxPriority?: number;
        workers?: number;
        continuous: boolean;
        interval?: number;
        iterations?: number;
        json: boolean;
      }) => {
        await withContext("queue process", opts, async (context) => {
          const processor = context.queue();
          const batch = { batchSize: opts.batchSize, maxPriority: opts.maxPriority, workers: opts.workers };

          if (opts.continuous) {
            await processor.runContinuous({
              ...batch,
              intervalSeconds: opts.interval,
              iterations: opts.iterations,
              onBatch: (result, iteration) => {
                if (result.processed) console.log(`batch ${iteration}:`);
                if (result.processed) printBatch(result);
              },
            });
            return;
          }

          const result = await processor.processBatch(batch);
          if (opts.json) {
            console.log(JSON.stringify(result, null, 2));
            return;
          }
          if (!result.processed) {
            console.log("queue process: no ready tasks");
            return;
          }
          printBatch(result);
        });
      },
    );

  queue
    .command("status")
    .description("Show task counts and average age per status")
    .option("--json", "Print as JSON", false)
    .action(async (opts: { json: boolean }) => {
      await withContext("queue status", opts, async (context) => {
        const rows = await context.store.queueStatus();
        if (opts.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }
        if (!rows.length) {
          console.log("queue: empty");
          return;
        }
        for (const row of rows) {
          console.log(`${row.status}: ${row.count} (avg age ${row.avgAgeMinutes} min)`);
        }
      });
    });

  queue
    .command("enqueue")
    .description("Queue a sync task for one issue record")
    .requiredOption("--issue <id>", "Issue record id", positiveInt)
    .requiredOption("--action <action>", `One of: ${TASK_ACTION_VALUES.join(", ")}`)
    .option("--priority <n>", "Override the action's default priority", integer)
    .option("--remove-label <label...>", "Extra labels a close should strip")
    .action(async (opts: { issue: number; action: string; priority?: number; removeLabel?: string[] }) => {
      const action = opts.action.trim();
      if (!isTaskAction(action)) {
        console.error(`queue enqueue: --action must be one of ${TASK_ACTION_VALUES.join(", ")}.`);
        process.exitCode = 1;
        return;
      }

      await withContext("queue enqueue", {}, async (context) => {
        const issue = await context.store.getIssue(opts.issue);
        if (!issue) {
          throw new Error(`issue record #${opts.issue} does not exist`);
        }
        const result = await context.store.enqueueTask({
          issueId: opts.issue,
          action,
          priority: opts.priority ?? DEFAULT_TASK_PRIORITY[action],
          maxRetries: context.config.queue.maxRetries,
          metadata: { source: "manual", ...(opts.removeLabel?.length ? { removeLabels: opts.removeLabel } : {}) },
        });
        console.log(`queue enqueue: ${result.result} task ${result.taskId} (${action} issue ${opts.issue})`);
      });
    });

  queue
    .command("cleanup")
    .description("Delete completed and failed tasks older than N days")
    .option("--days <n>", "Age threshold in days", positiveInt, 7)
    .action(async (opts: { days: number }) => {
      await withContext("queue cleanup", {}, async (context) => {
        const removed = await context.queue().cleanup(opts.days);
        console.log(`queue cleanup: removed ${removed} task(s)`);
      });
    });

  queue
    .command("recover")
    .description("Return tasks stuck in processing to retry")
    .option("--minutes <n>", "Claim age after which a task counts as stuck", positiveInt, 30)
    .action(async (opts: { minutes: number }) => {
      await withContext("queue recover", {}, async (context) => {
        const released = await context.queue().recoverStale(opts.minutes);
        console.log(`queue recover: released ${released} task(s)`);
      });
    });

  const monitor = program.command("monitor").description("Pull GitLab progress labels into the issues table");

  monitor
    .command("check")
    .description("Run one progress check over linked open issues")
    .option("--json", "Print the result as JSON", false)
    .action(async (opts: { json: boolean }) => {
      await withContext("monitor check", opts, async (context) => {
        const result = await context.monitor().runSingleCheck();
        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }
        console.log(`updated: ${result.updated} | skipped: ${result.skipped} | failed: ${result.failed}`);
        printErrors(result.errors);
      });
    });

  monitor
    .command("watch")
    .description("Repeat the progress check on an interval")
    .option("--interval <seconds>", "Seconds between checks", positiveInt)
    .option("--iterations <n>", "Stop after this many checks", positiveInt)
    .action(async (opts: { interval?: number; iterations?: number }) => {
      await withContext("monitor watch", {}, async (context) => {
        await context.monitor().runContinuous({
          intervalSeconds: opts.interval,
          iterations: opts.iterations,
          onCheck: (result, iteration) => {
            console.log(
              `check ${iteration}: updated: ${result.updated} | skipped: ${result.skipped} | failed: ${result.failed}`,
            );
          },
        });
      });
    });

  monitor
    .command("scan")
    .description("Queue sync tasks for records whose business fields changed recently")
    .option("--since <timestamp>", "Lower bound, YYYY-MM-DD HH:MM:SS")
    .option("--minutes <n>", "Look back this many minutes when --since is not given", positiveInt, 5)
    .action(async (opts: { since?: string; minutes: number }) => {
      let since = formatTimestamp(addSeconds(deps.now(), -opts.minutes * 60));
      if (opts.since !== undefined) {
        const parsed = parseSheetTimestamp(opts.since);
        if (!parsed) {
          console.error("monitor scan: --since must be YYYY-MM-DD HH:MM:SS.");
          process.exitCode = 1;
          return;
        }
        since = parsed;
      }

      await withContext("monitor scan", {}, async (context) => {
        const result = await context.monitor().runChangeScan(since);
        console.log(`scanned: ${result.scanned} | changed: ${result.changed} | queued: ${result.enqueued}`);
        printErrors(result.errors);
      });
    });

  monitor
    .command("stats")
    .description("Show monitor statistics")
    .action(async () => {
      await withContext("monitor stats", {}, async (context) => {
        const stats = await context.monitor().stats();
        console.log(`linked open issues: ${stats.linkedOpenIssues}`);
        console.log(`cached records: ${stats.cachedRecords}`);
        console.log(`last check: ${stats.lastCheckAt ?? "never (this process)"}`);
      });
    });

  const repair = program.command("repair").description("Repair tooling");

  repair
    .command("missing-links")
    .description("Queue create for every open record without a GitLab link")
    .option("--dry-run", "List the records without queueing", false)
    .action(async (opts: { dryRun: boolean }) => {
      await withContext("repair missing-links", {}, async (context) => {
        const records = await context.store.listUnlinkedOpenIssues();
        if (!records.length) {
          console.log("repair missing-links: nothing to do");
          return;
        }

        const reconciler = context.reconciler();
        let added = 0;
        for (const record of records) {
          if (opts.dryRun) {
            console.log(`would queue create for #${record.id} ${record.projectName}`);
            continue;
          }
          const task = await reconciler.enqueue(record.id, "create", "repair");
          if (task.result === "added") added += 1;
        }
        if (!opts.dryRun) {
          console.log(`repair missing-links: queued ${added} of ${records.length} record(s)`);
        }
      });
    });

  const db = program.command("db").description("Database helpers");

  db.command("status")
    .description("Show issue counts")
    .option("--json", "Print as JSON", false)
    .action(async (opts: { json: boolean }) => {
      await withContext("db status", opts, async (context) => {
        const stats = await context.store.issueStats();
        if (opts.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }
        console.log(`issues: ${stats.total}`);
        for (const [status, count] of Object.entries(stats.byStatus)) {
          console.log(`- ${status}: ${count}`);
        }
        console.log(`linked: ${stats.linked} | unlinked open: ${stats.unlinkedOpen} | sync failed: ${stats.syncFailed}`);
      });
    });

  db.command("init")
    .description("Create the issues and sync_queue tables")
    .action(async () => {
      try {
        const config = await deps.loadConfig({ configPath: program.opts<{ config?: string }>().config ?? null });
        const statements = await deps.initSchema(config);
        console.log(`db init: OK (${statements} statement(s))`);
      } catch (error) {
        console.error("db init: ERROR");
        console.error(error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  program
    .command("config")
    .description("Configuration helpers")
    .command("check")
    .description("Print the resolved configuration with secrets masked")
    .action(async () => {
      try {
        const config = await deps.loadConfig({ configPath: program.opts<{ config?: string }>().config ?? null });
        console.log(`source: ${config.sourcePath ?? "(defaults + environment)"}`);
        console.log(`gitlab: ${config.gitlab.url || "(unset)"} project ${config.gitlab.projectId || "(unset)"}`);
        console.log(`token: ${maskSecret(config.gitlab.token)}`);
        console.log(
          `database: ${config.database.user}@${config.database.host}:${config.database.port}/${config.database.name}`,
        );
        console.log(
          `queue: batch ${config.queue.batchSize}, workers ${config.queue.workers}, ` +
            `max priority ${config.queue.maxPriority}, max retries ${config.queue.maxRetries}`,
        );
        console.log(`users mapped: ${Object.keys(config.users.mapping).length}`);

        const missing = missingGitLabSettings(config);
        if (missing.length) {
          console.log(`config check: INCOMPLETE (missing ${missing.join(", ")})`);
          process.exitCode = 1;
          return;
        }
        console.log("config check: OK");
      } catch (error) {
        console.error("config check: ERROR");
        console.error(error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, deps: CliDeps = defaultCliDeps): Promise<void> {
  const program = createProgram(deps);
  await program.parseAsync(argv);
}
