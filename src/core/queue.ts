import type { QueueConfig } from "./config";
import { PartialSyncError, RecordNotFoundError, errorMessage, isRetryableError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { runWithConcurrency, sleep as defaultSleep, type Settled } from "./pool";
import { addSeconds, formatTimestamp, type SyncTask } from "./records";
import type { RemoteSync } from "./remote-sync";
import type { IssueStore, QueueStatusRow, TaskStore } from "./store";

const MAX_ERROR_SAMPLES = 10;
const BASE_RETRY_DELAY_SECONDS = 60;
const MAX_RETRY_DELAY_SECONDS = 300;

export type BatchOptions = {
  batchSize?: number;
  maxPriority?: number;
  workers?: number;
};

export type BatchResult = {
  processed: number;
  success: number;
  failed: number;
  retry: number;
  partial: number;
  errors: string[];
};

export type TaskOutcome = "success" | "retry" | "failed" | "partial" | "skipped";

type TaskResult = { outcome: TaskOutcome; error?: unknown };

export type ContinuousOptions = BatchOptions & {
  intervalSeconds?: number;
  /** Stop after this many batches; runs until the process exits when unset. */
  iterations?: number;
  onBatch?: (result: BatchResult, iteration: number) => void;
};

export type QueueProcessorDeps = {
  store: TaskStore & Pick<IssueStore, "updateIssue">;
  sync: Pick<RemoteSync, "run">;
  config: QueueConfig;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

/** Groups tasks by issue, keeping selection order inside each group. */
export function groupTasksByIssue(tasks: readonly SyncTask[]): SyncTask[][] {
  const lanes = new Map<number, SyncTask[]>();
  for (const task of tasks) {
    const lane = lanes.get(task.issueId);
    if (lane) {
      lane.push(task);
    } else {
      lanes.set(task.issueId, [task]);
    }
  }
  return Array.from(lanes.values());
}

/** Seconds to wait before the next attempt, from the retry count before this failure. */
export function computeRetryDelay(retryCount: number): number {
  const exponent = Math.max(0, Math.trunc(retryCount));
  return Math.min(MAX_RETRY_DELAY_SECONDS, BASE_RETRY_DELAY_SECONDS * 2 ** exponent);
}

export class QueueProcessor {
  private readonly store: QueueProcessorDeps["store"];
  private readonly sync: QueueProcessorDeps["sync"];
  private readonly config: QueueConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: QueueProcessorDeps) {
    this.store = deps.store;
    this.sync = deps.sync;
    this.config = deps.config;
    this.logger = deps.logger ?? createLogger("queue");
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async processBatch(options: BatchOptions = {}): Promise<BatchResult> {
    const batchSize = options.batchSize ?? this.config.batchSize;
    const maxPriority = options.maxPriority ?? this.config.maxPriority;
    const workers = options.workers ?? this.config.workers;

    const result: BatchResult = { processed: 0, success: 0, failed: 0, retry: 0, partial: 0, errors: [] };
    const tasks = await this.store.selectReadyTasks(batchSize, maxPriority, formatTimestamp(this.now()));
    if (!tasks.length) {
      return result;
    }

    // Tasks for one issue share a lane so they never race on the same remote issue.
    const lanes = groupTasksByIssue(tasks);
    this.logger.log(
      `processing ${tasks.length} task(s) for ${lanes.length} issue(s) with ${Math.min(workers, lanes.length)} worker(s)`,
    );

    const settled = await runWithConcurrency(lanes, workers, (lane) => this.processLane(lane));
    for (const [index, laneEntry] of settled.entries()) {
      const lane = lanes[index] ?? [];
      for (const [position, task] of lane.entries()) {
        const entry: Settled<TaskResult> | undefined = laneEntry.ok
          ? laneEntry.value[position]
          : { ok: false, error: laneEntry.error };
        if (entry) this.tally(result, task, entry);
      }
    }

    this.logger.log(
      `batch done: processed=${result.processed} success=${result.success} retry=${result.retry} ` +
        `partial=${result.partial} failed=${result.failed}`,
    );
    return result;
  }

  async processTask(task: SyncTask): Promise<TaskResult> {
    const claimed = await this.store.claimTask(task.id, formatTimestamp(this.now()));
    if (!claimed) {
      this.logger.warn(`task ${task.id} was claimed elsewhere; skipping`);
      return { outcome: "skipped" };
    }

    try {
      const outcome = await this.sync.run(task.action, task.issueId, task.metadata);
      await this.store.completeTask(task.id, formatTimestamp(this.now()));
      this.logger.log(`task ${task.id} ${task.action} issue ${task.issueId}: ${outcome.status} (${outcome.detail})`);
      return { outcome: "success" };
    } catch (error) {
      const next = await this.handleFailure(task, error);
      return { outcome: error instanceof PartialSyncError ? "partial" : next, error };
    }
  }

  async queueStatus(): Promise<QueueStatusRow[]> {
    return this.store.queueStatus();
  }

  async cleanup(days: number): Promise<number> {
    const cutoff = formatTimestamp(addSeconds(this.now(), -Math.max(0, days) * 86_400));
    const removed = await this.store.cleanupTasks(cutoff);
    this.logger.log(`removed ${removed} finished task(s) created before ${cutoff}`);
    return removed;
  }

  async recoverStale(minutes: number): Promise<number> {
    const now = this.now();
    const cutoff = formatTimestamp(addSeconds(now, -Math.max(0, minutes) * 60));
    const released = await this.store.releaseStaleTasks(cutoff, formatTimestamp(now));
    if (released) {
      this.logger.warn(`released ${released} task(s) stuck in processing since before ${cutoff}`);
    }
    return released;
  }

  async runContinuous(options: ContinuousOptions = {}): Promise<number> {
    const intervalMs = (options.intervalSeconds ?? this.config.intervalSeconds) * 1000;
    let iteration = 0;

    while (options.iterations === undefined || iteration < options.iterations) {
      iteration += 1;
      try {
        const result = await this.processBatch(options);
        options.onBatch?.(result, iteration);
      } catch (error) {
        this.logger.error(`batch ${iteration} failed: ${errorMessage(error)}`);
      }

      if (options.iterations !== undefined && iteration >= options.iterations) break;
      await this.sleep(intervalMs);
    }
    return iteration;
  }

  private async handleFailure(task: SyncTask, error: unknown): Promise<"retry" | "failed"> {
    const message = errorMessage(error);
    const nextRetryCount = task.retryCount + 1;

    if (isRetryableError(error) && nextRetryCount < task.maxRetries) {
      const delay = computeRetryDelay(task.retryCount);
      const scheduledAt = formatTimestamp(addSeconds(this.now(), delay));
      await this.store.scheduleRetry(task.id, nextRetryCount, scheduledAt, message);
      this.logger.warn(
        `task ${task.id} ${task.action} attempt ${nextRetryCount}/${task.maxRetries} failed, retry at ${scheduledAt}: ${message}`,
      );
      return "retry";
    }

    await this.store.failTask(task.id, nextRetryCount, message, formatTimestamp(this.now()));
    this.logger.error(`task ${task.id} ${task.action} failed permanently: ${message}`);

    if (!(error instanceof RecordNotFoundError)) {
      await this.store.updateIssue(task.issueId, { syncStatus: "failed" });
    }
    return "failed";
  }

  private async processLane(lane: readonly SyncTask[]): Promise<Settled<TaskResult>[]> {
    const results: Settled<TaskResult>[] = [];
    for (const task of lane) {
      try {
        results.push({ ok: true, value: await this.processTask(task) });
      } catch (error) {
        results.push({ ok: false, error });
      }
    }
    return results;
  }

  private tally(result: BatchResult, task: SyncTask, entry: Settled<TaskResult>): void {
    if (!entry.ok) {
      // Only bookkeeping writes can land here; the task stays claimed until recovered.
      result.processed += 1;
      result.failed += 1;
      this.recordError(result, task, entry.error);
      return;
    }

    const { outcome, error } = entry.value;
    if (outcome === "skipped") return;
    result.processed += 1;
    result[outcome] += 1;
    if (error !== undefined) this.recordError(result, task, error);
  }

  private recordError(result: BatchResult, task: SyncTask | undefined, error: unknown): void {
    if (result.errors.length >= MAX_ERROR_SAMPLES) return;
    const label = task ? `task ${task.id} (${task.action})` : "task";
    result.errors.push(`${label}: ${errorMessage(error)}`);
  }
}
