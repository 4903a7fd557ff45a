import type { AppConfig } from "./config";
import { ValidationError } from "./errors";
import { hasRemoteLink } from "./issue-url";
import { createLogger, type Logger } from "./logger";
import {
  formatTimestamp,
  isIssueStatus,
  parseSheetTimestamp,
  type IssuePatch,
  type IssueRecord,
  type IssueStatus,
  type TaskAction,
} from "./records";
import { DEFAULT_TASK_PRIORITY, type EnqueueResult, type IssueStore, type TaskStore } from "./store";

const STATUS_CODES: Record<string, IssueStatus> = {
  O: "open",
  C: "closed",
  P: "in_progress",
  R: "resolved",
};

/** Incoming row after cell cleaning; status and timestamps are still raw. */
export type IncomingIssue = {
  serialNumber: string;
  projectName: string;
  problemCategory: string;
  severityLevel: number;
  problemDescription: string;
  solution: string;
  actionPriority: number;
  actionRecord: string;
  initiator: string;
  responsiblePerson: string;
  status: string;
  startTime: string | null;
  targetCompletionTime: string | null;
  actualCompletionTime: string | null;
  remarks: string;
};

export type ReconcileAction = "INSERT" | "UPDATE_STATUS" | "NOOP";

export type EnqueuedTask = EnqueueResult & { action: TaskAction };

export type ReconcileResult = {
  action: ReconcileAction;
  recordId: number;
  oldStatus: IssueStatus | null;
  newStatus: IssueStatus;
  /** The remote action this change calls for, whether or not it was enqueued. */
  plannedAction: TaskAction | null;
  task: EnqueuedTask | null;
};

export type ReconcileOptions = {
  enqueue?: boolean;
  source?: string;
};

export type ReconcilerDeps = {
  store: IssueStore & Pick<TaskStore, "enqueueTask">;
  config: Pick<AppConfig, "reconcile" | "queue">;
  logger?: Logger;
  now?: () => Date;
};

export function canonicalStatus(raw: string | null | undefined): IssueStatus {
  const trimmed = raw?.trim() ?? "";
  const fromCode = STATUS_CODES[trimmed.toUpperCase()];
  if (fromCode) return fromCode;

  const lowered = trimmed.toLowerCase();
  return isIssueStatus(lowered) ? lowered : "open";
}

export function planTaskAction(
  change: Exclude<ReconcileAction, "NOOP">,
  newStatus: IssueStatus,
  remoteUrl: string | null,
): TaskAction | null {
  const linked = hasRemoteLink(remoteUrl);
  if (change === "INSERT") {
    return newStatus === "closed" ? null : "create";
  }
  if (newStatus === "closed") {
    return linked ? "close" : null;
  }
  return linked ? "update" : "create";
}

export class Reconciler {
  private readonly store: ReconcilerDeps["store"];
  private readonly config: ReconcilerDeps["config"];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: ReconcilerDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.logger = deps.logger ?? createLogger("reconcile");
    this.now = deps.now ?? (() => new Date());
  }

  async reconcile(row: IncomingIssue, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const enqueue = options.enqueue ?? true;
    const status = canonicalStatus(row.status);
    const projectName = row.projectName.trim();
    const problemDescription = row.problemDescription.trim();

    const existing = problemDescription ? await this.findExisting(projectName, problemDescription) : null;

    if (!existing) {
      this.validateNew(projectName, problemDescription);
      const recordId = await this.store.insertIssue({
        serialNumber: row.serialNumber,
        projectName,
        problemCategory: row.problemCategory,
        severityLevel: row.severityLevel,
        problemDescription,
        solution: row.solution,
        actionPriority: row.actionPriority,
        actionRecord: row.actionRecord,
        initiator: row.initiator,
        responsiblePerson: row.responsiblePerson,
        status,
        startTime: parseSheetTimestamp(row.startTime),
        targetCompletionTime: parseSheetTimestamp(row.targetCompletionTime),
        actualCompletionTime: parseSheetTimestamp(row.actualCompletionTime),
        remarks: row.remarks,
        remoteUrl: null,
        remoteProgress: null,
        syncStatus: "pending",
        lastSyncTime: null,
      });

      const plannedAction = planTaskAction("INSERT", status, null);
      const task = enqueue && plannedAction ? await this.enqueue(recordId, plannedAction, options.source) : null;
      return { action: "INSERT", recordId, oldStatus: null, newStatus: status, plannedAction, task };
    }

    if (existing.status === status) {
      return {
        action: "NOOP",
        recordId: existing.id,
        oldStatus: existing.status,
        newStatus: status,
        plannedAction: null,
        task: null,
      };
    }

    const patch: IssuePatch = { status, syncStatus: "pending" };
    const completedAt = parseSheetTimestamp(row.actualCompletionTime);
    if (completedAt) {
      patch.actualCompletionTime = completedAt;
    } else if (status === "closed") {
      patch.actualCompletionTime = formatTimestamp(this.now());
    }
    await this.store.updateIssue(existing.id, patch);
    this.logger.log(`issue ${existing.id}: ${existing.status} -> ${status}`);

    const plannedAction = planTaskAction("UPDATE_STATUS", status, existing.remoteUrl);
    const task = enqueue && plannedAction ? await this.enqueue(existing.id, plannedAction, options.source) : null;
    return {
      action: "UPDATE_STATUS",
      recordId: existing.id,
      oldStatus: existing.status,
      newStatus: status,
      plannedAction,
      task,
    };
  }

  async enqueue(issueId: number, action: TaskAction, source = "reconcile"): Promise<EnqueuedTask> {
    const result = await this.store.enqueueTask({
      issueId,
      action,
      priority: DEFAULT_TASK_PRIORITY[action],
      maxRetries: this.config.queue.maxRetries,
      metadata: { source },
    });
    return { ...result, action };
  }

  private async findExisting(projectName: string, problemDescription: string): Promise<IssueRecord | null> {
    const matches = await this.store.findByBusinessKey(projectName, problemDescription);
    if (matches.length > 1) {
      this.logger.warn(
        `${matches.length} records share the key (${projectName}, ${problemDescription.slice(0, 40)}); using #${matches[0]?.id}`,
      );
    }
    return matches[0] ?? null;
  }

  private validateNew(projectName: string, problemDescription: string): void {
    const missing: string[] = [];
    if (!projectName) missing.push("project_name");
    if (!problemDescription && this.config.reconcile.requireDescription) missing.push("problem_description");
    if (missing.length) {
      throw new ValidationError(`missing required field(s): ${missing.join(", ")}`, missing);
    }
  }
}
