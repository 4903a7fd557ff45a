import { ChangeDetector, planChangeAction } from "./change-detector";
import type { AppConfig } from "./config";
import { InvalidRemoteUrlError, RemoteIssueNotFoundError, errorMessage } from "./errors";
import type { IssueTracker } from "./gitlab-client";
import { parseIssueIid } from "./issue-url";
import { extractProgressFromLabels } from "./labels";
import { createLogger, type Logger } from "./logger";
import { sleep as defaultSleep } from "./pool";
import { formatTimestamp, type IssueRecord } from "./records";
import type { RemoteSync } from "./remote-sync";
import { DEFAULT_TASK_PRIORITY, type IssueStore, type TaskStore } from "./store";

const MAX_ERROR_SAMPLES = 10;

export type CheckResult = {
  updated: number;
  failed: number;
  skipped: number;
  errors: string[];
};

export type ChangeScanResult = {
  scanned: number;
  changed: number;
  enqueued: number;
  errors: string[];
};

export type MonitorStats = {
  linkedOpenIssues: number;
  cachedRecords: number;
  lastCheckAt: string | null;
};

export type MonitorContinuousOptions = {
  intervalSeconds?: number;
  iterations?: number;
  onCheck?: (result: CheckResult, iteration: number) => void;
};

export type ProgressMonitorDeps = {
  store: IssueStore & Pick<TaskStore, "enqueueTask">;
  tracker: IssueTracker;
  sync: Pick<RemoteSync, "closeFor">;
  config: Pick<AppConfig, "monitor" | "queue">;
  detector?: ChangeDetector;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

type RecordCheck = "updated" | "skipped";

export class ProgressMonitor {
  private readonly store: ProgressMonitorDeps["store"];
  private readonly tracker: IssueTracker;
  private readonly sync: ProgressMonitorDeps["sync"];
  private readonly config: ProgressMonitorDeps["config"];
  private readonly detector: ChangeDetector;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastCheckAt: string | null = null;

  constructor(deps: ProgressMonitorDeps) {
    this.store = deps.store;
    this.tracker = deps.tracker;
    this.sync = deps.sync;
    this.config = deps.config;
    this.detector = deps.detector ?? new ChangeDetector();
    this.logger = deps.logger ?? createLogger("monitor");
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async runSingleCheck(): Promise<CheckResult> {
    const result: CheckResult = { updated: 0, failed: 0, skipped: 0, errors: [] };
    const records = await this.store.listLinkedOpenIssues();

    for (const record of records) {
      try {
        const outcome = await this.checkRecord(record);
        result[outcome] += 1;
      } catch (error) {
        result.failed += 1;
        if (result.errors.length < MAX_ERROR_SAMPLES) {
          result.errors.push(`issue ${record.id}: ${errorMessage(error)}`);
        }
      }
    }

    this.lastCheckAt = formatTimestamp(this.now());
    this.logger.log(
      `checked ${records.length} linked issue(s): updated=${result.updated} skipped=${result.skipped} failed=${result.failed}`,
    );
    return result;
  }

  async runChangeScan(since: string): Promise<ChangeScanResult> {
    const result: ChangeScanResult = { scanned: 0, changed: 0, enqueued: 0, errors: [] };
    const records = await this.store.listIssuesUpdatedSince(since);

    for (const record of records) {
      result.scanned += 1;
      if (!this.detector.hasChanged(record)) continue;
      result.changed += 1;

      const action = planChangeAction(record);
      if (!action) continue;

      try {
        const enqueued = await this.store.enqueueTask({
          issueId: record.id,
          action,
          priority: DEFAULT_TASK_PRIORITY[action],
          maxRetries: this.config.queue.maxRetries,
          metadata: { source: "change-scan" },
        });
        if (enqueued.result === "added") result.enqueued += 1;
      } catch (error) {
        // Drop the cached hash so the next scan sees the record as changed again.
        this.detector.forget(record.id);
        if (result.errors.length < MAX_ERROR_SAMPLES) {
          result.errors.push(`issue ${record.id}: ${errorMessage(error)}`);
        }
      }
    }

    this.logger.log(`scanned ${result.scanned} record(s) since ${since}: changed=${result.changed} queued=${result.enqueued}`);
    return result;
  }

  async runContinuous(options: MonitorContinuousOptions = {}): Promise<number> {
    const intervalMs = (options.intervalSeconds ?? this.config.monitor.intervalSeconds) * 1000;
    let iteration = 0;

    while (options.iterations === undefined || iteration < options.iterations) {
      iteration += 1;
      try {
        const result = await this.runSingleCheck();
        options.onCheck?.(result, iteration);
      } catch (error) {
        this.logger.error(`check ${iteration} failed: ${errorMessage(error)}`);
      }

      if (options.iterations !== undefined && iteration >= options.iterations) break;
      await this.sleep(intervalMs);
    }
    return iteration;
  }

  async stats(): Promise<MonitorStats> {
    const linked = await this.store.listLinkedOpenIssues();
    return {
      linkedOpenIssues: linked.length,
      cachedRecords: this.detector.size,
      lastCheckAt: this.lastCheckAt,
    };
  }

  private async checkRecord(record: IssueRecord): Promise<RecordCheck> {
    const iid = parseIssueIid(record.remoteUrl);
    if (iid === null) {
      throw new InvalidRemoteUrlError(record.remoteUrl ?? "");
    }

    const remote = await this.tracker.getIssue(iid);
    if (!remote) {
      throw new RemoteIssueNotFoundError(iid);
    }

    if (record.status === "closed") {
      await this.sync.closeFor(record);
      return "updated";
    }

    const progress = extractProgressFromLabels(remote.labels, remote.state);
    if (progress === record.remoteProgress) {
      return "skipped";
    }

    await this.store.updateIssue(record.id, {
      remoteProgress: progress,
      syncStatus: "synced",
      lastSyncTime: formatTimestamp(this.now()),
    });
    this.logger.log(`issue ${record.id}: progress ${record.remoteProgress ?? "(none)"} -> ${progress}`);
    return "updated";
  }
}
