export const ISSUE_STATUS_VALUES = ["open", "in_progress", "paused", "resolved", "closed"] as const;
export type IssueStatus = (typeof ISSUE_STATUS_VALUES)[number];

export const SYNC_STATUS_VALUES = ["pending", "synced", "failed"] as const;
export type SyncStatus = (typeof SYNC_STATUS_VALUES)[number];

export const TASK_ACTION_VALUES = ["create", "close", "create_and_close", "update", "sync_progress"] as const;
export type TaskAction = (typeof TASK_ACTION_VALUES)[number];

export const TASK_STATUS_VALUES = ["pending", "processing", "retry", "completed", "failed"] as const;
export type TaskStatus = (typeof TASK_STATUS_VALUES)[number];

export const PROGRESS_LABEL_PREFIX = "进度::";

export type IssueRecord = {
  id: number;
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
  status: IssueStatus;
  startTime: string | null;
  targetCompletionTime: string | null;
  actualCompletionTime: string | null;
  remarks: string;
  remoteUrl: string | null;
  remoteProgress: string | null;
  syncStatus: SyncStatus | null;
  lastSyncTime: string | null;
  createdAt: string;
  updatedAt: string;
};

export type NewIssueRecord = Omit<IssueRecord, "id" | "createdAt" | "updatedAt">;

export type IssuePatch = Partial<
  Pick<
    IssueRecord,
    "status" | "actualCompletionTime" | "remoteUrl" | "remoteProgress" | "syncStatus" | "lastSyncTime"
  >
>;

export type TaskMetadata = {
  removeLabels?: string[];
  source?: string;
  [key: string]: unknown;
};

export type SyncTask = {
  id: number;
  issueId: number;
  action: TaskAction;
  priority: number;
  retryCount: number;
  maxRetries: number;
  scheduledAt: string;
  status: TaskStatus;
  errorMessage: string | null;
  createdAt: string;
  processedAt: string | null;
  metadata: TaskMetadata;
};

export type NewSyncTask = {
  issueId: number;
  action: TaskAction;
  priority: number;
  maxRetries: number;
  metadata?: TaskMetadata;
};

export function isIssueStatus(value: string): value is IssueStatus {
  return (ISSUE_STATUS_VALUES as readonly string[]).includes(value);
}

export function isTaskAction(value: string): value is TaskAction {
  return (TASK_ACTION_VALUES as readonly string[]).includes(value);
}

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// Local wall-clock time, the same shape MySQL DATETIME columns return under dateStrings.
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Accepts only `YYYY-MM-DD HH:MM:SS` naming a real calendar instant; everything
 * else (blank cells, dates without time, `2025-02-30 ...`) becomes null.
 */
export function parseSheetTimestamp(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  const match = TIMESTAMP_PATTERN.exec(trimmed);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map((part) => Number.parseInt(part, 10));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }

  const probe = new Date(year, month - 1, day, hour, minute, second);
  if (
    probe.getFullYear() !== year ||
    probe.getMonth() !== month - 1 ||
    probe.getDate() !== day ||
    probe.getHours() !== hour ||
    probe.getMinutes() !== minute ||
    probe.getSeconds() !== second
  ) {
    return null;
  }

  return trimmed;
}

export function parseLooseInt(value: string | number | null | undefined): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  const trimmed = value?.trim() ?? "";
  if (!trimmed) return 0;
  const parsed = Number.parseFloat(trimmed);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
}
