import type {
  IssuePatch,
  IssueRecord,
  IssueStatus,
  NewIssueRecord,
  NewSyncTask,
  SyncTask,
  TaskAction,
  TaskStatus,
} from "./records";

export const DEFAULT_TASK_PRIORITY: Record<TaskAction, number> = {
  close: 2,
  create_and_close: 2,
  create: 3,
  update: 5,
  sync_progress: 7,
};

export type EnqueueResult = {
  taskId: number;
  result: "added" | "updated" | "exists";
};

export type QueueStatusRow = {
  status: TaskStatus;
  count: number;
  avgAgeMinutes: number;
};

export type IssueStats = {
  total: number;
  byStatus: Partial<Record<IssueStatus, number>>;
  linked: number;
  unlinkedOpen: number;
  syncFailed: number;
};

export type IssueStore = {
  /** Most recently updated first. */
  findByBusinessKey(projectName: string, problemDescription: string): Promise<IssueRecord[]>;
  getIssue(id: number): Promise<IssueRecord | null>;
  insertIssue(record: NewIssueRecord): Promise<number>;
  updateIssue(id: number, patch: IssuePatch): Promise<void>;
  listLinkedOpenIssues(): Promise<IssueRecord[]>;
  listUnlinkedOpenIssues(): Promise<IssueRecord[]>;
  listIssuesUpdatedSince(since: string): Promise<IssueRecord[]>;
  issueStats(): Promise<IssueStats>;
};

export type TaskStore = {
  enqueueTask(task: NewSyncTask): Promise<EnqueueResult>;
  /**
   * `pending` or `retry` tasks due at `now`, priority at most `maxPriority`,
   * ordered by priority then creation.
   */
  selectReadyTasks(batchSize: number, maxPriority: number, now: string): Promise<SyncTask[]>;
  /** Moves a task from pending/retry to processing; false when another claim won. */
  claimTask(taskId: number, now: string): Promise<boolean>;
  completeTask(taskId: number, now: string): Promise<void>;
  scheduleRetry(taskId: number, retryCount: number, scheduledAt: string, errorMessage: string): Promise<void>;
  failTask(taskId: number, retryCount: number, errorMessage: string, now: string): Promise<void>;
  queueStatus(): Promise<QueueStatusRow[]>;
  cleanupTasks(olderThan: string): Promise<number>;
  releaseStaleTasks(claimedBefore: string, now: string): Promise<number>;
};

export type SyncStore = IssueStore &
  TaskStore & {
    close(): Promise<void>;
  };
