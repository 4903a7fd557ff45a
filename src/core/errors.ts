export class SyncError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean) {
    super(message);
    this.name = "SyncError";
    this.retryable = retryable;
  }
}

export class ValidationError extends SyncError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, false);
    this.name = "ValidationError";
    this.fields = fields;
  }
}

export class RemoteTrackerError extends SyncError {
  readonly status: number | null;

  constructor(message: string, status: number | null, retryable: boolean) {
    super(message, retryable);
    this.name = "RemoteTrackerError";
    this.status = status;
  }
}

export class InvalidRemoteUrlError extends SyncError {
  readonly url: string;

  constructor(url: string) {
    super(`cannot derive remote issue iid from '${url}'`, false);
    this.name = "InvalidRemoteUrlError";
    this.url = url;
  }
}

export class RemoteIssueNotFoundError extends SyncError {
  readonly iid: number;

  constructor(iid: number) {
    super(`remote issue #${iid} not found`, false);
    this.name = "RemoteIssueNotFoundError";
    this.iid = iid;
  }
}

export class RecordNotFoundError extends SyncError {
  readonly issueId: number;

  constructor(issueId: number) {
    super(`issue record #${issueId} does not exist`, false);
    this.name = "RecordNotFoundError";
    this.issueId = issueId;
  }
}

/** Remote issue was created but the follow-up close failed. */
export class PartialSyncError extends SyncError {
  readonly remoteUrl: string;

  constructor(remoteUrl: string, cause: unknown) {
    super(`created but not closed (${remoteUrl}): ${errorMessage(cause)}`, true);
    this.name = "PartialSyncError";
    this.remoteUrl = remoteUrl;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

const TRANSIENT_SQL_CODES = new Set([
  "ER_LOCK_DEADLOCK",
  "ER_LOCK_WAIT_TIMEOUT",
  "ER_CON_COUNT_ERROR",
  "ER_TOO_MANY_USER_CONNECTIONS",
  "PROTOCOL_CONNECTION_LOST",
]);

function errorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "";
}

/**
 * Typed sync errors carry their own verdict. SQL errors are transient only for
 * lock and connection codes. Programming errors are never retried; anything else
 * (network failures, timeouts) is, with the attempt cap bounding it.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SyncError) {
    return error.retryable;
  }

  if (error instanceof TypeError || error instanceof ReferenceError || error instanceof SyntaxError) {
    return false;
  }

  const code = errorCode(error);
  if (code.startsWith("ER_")) {
    return TRANSIENT_SQL_CODES.has(code);
  }

  return true;
}
