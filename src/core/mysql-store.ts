import { readFile } from "node:fs/promises";
import path from "node:path";
import * as mysql from "mysql2/promise";
import { z } from "zod";
import type { DatabaseConfig } from "./config";
import {
  ISSUE_STATUS_VALUES,
  SYNC_STATUS_VALUES,
  TASK_ACTION_VALUES,
  TASK_STATUS_VALUES,
  formatTimestamp,
  type IssuePatch,
  type IssueRecord,
  type NewIssueRecord,
  type NewSyncTask,
  type SyncTask,
} from "./records";
import type { EnqueueResult, IssueStats, QueueStatusRow, SyncStore } from "./store";

export const SCHEMA_FILE = path.resolve(__dirname, "../../sql/schema.sql");

type SqlValue = string | number | null;

/** The slice of a mysql2 pool the store talks to; tests hand in a `vi.fn` double. */
export type SqlExecutor = {
  execute(sql: string, values?: SqlValue[]): Promise<unknown>;
  end(): Promise<void>;
};

export function createMysqlExecutor(config: DatabaseConfig): SqlExecutor {
  const pool = mysql.createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password || undefined,
    database: config.name,
    charset: "utf8mb4",
    connectionLimit: config.connectionLimit,
    waitForConnections: true,
    dateStrings: true,
    enableKeepAlive: true,
  });

  return {
    async execute(sql, values = []) {
      const [result] = await pool.execute({ sql, timeout: config.queryTimeoutMs }, values);
      return result;
    },
    async end() {
      await pool.end();
    },
  };
}

const nullableText = z
  .string()
  .nullable()
  .transform((value) => value ?? "");

const IssueRowSchema = z
  .object({
    id: z.number().int(),
    serial_number: nullableText,
    project_name: z.string(),
    problem_category: nullableText,
    severity_level: z.coerce.number().int(),
    problem_description: nullableText,
    solution: nullableText,
    action_priority: z.coerce.number().int(),
    action_record: nullableText,
    initiator: nullableText,
    responsible_person: nullableText,
    status: z.enum(ISSUE_STATUS_VALUES),
    start_time: z.string().nullable(),
    target_completion_time: z.string().nullable(),
    actual_completion_time: z.string().nullable(),
    remarks: nullableText,
    gitlab_url: z.string().nullable(),
    gitlab_progress: z.string().nullable(),
    sync_status: z.enum(SYNC_STATUS_VALUES).nullable(),
    last_sync_time: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (row): IssueRecord => ({
      id: row.id,
      serialNumber: row.serial_number,
      projectName: row.project_name,
      problemCategory: row.problem_category,
      severityLevel: row.severity_level,
      problemDescription: row.problem_description,
      solution: row.solution,
      actionPriority: row.action_priority,
      actionRecord: row.action_record,
      initiator: row.initiator,
      responsiblePerson: row.responsible_person,
      status: row.status,
      startTime: row.start_time,
      targetCompletionTime: row.target_completion_time,
      actualCompletionTime: row.actual_completion_time,
      remarks: row.remarks,
      remoteUrl: row.gitlab_url,
      remoteProgress: row.gitlab_progress,
      syncStatus: row.sync_status,
      lastSyncTime: row.last_sync_time,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

const MetadataSchema = z.preprocess((value) => {
  if (value === null || value === undefined || value === "") return {};
  if (typeof value === "string") {
    try {
      return JSON.parse(value);
    } catch {
      return {};
    }
  }
  return value;
}, z.object({ removeLabels: z.array(z.string()).optional(), source: z.string().optional() }).passthrough());

const TaskRowSchema = z
  .object({
    id: z.number().int(),
    issue_id: z.number().int(),
    action: z.enum(TASK_ACTION_VALUES),
    status: z.enum(TASK_STATUS_VALUES),
    priority: z.number().int(),
    retry_count: z.number().int(),
    max_retries: z.number().int(),
    created_at: z.string(),
    scheduled_at: z.string(),
    processed_at: z.string().nullable(),
    error_message: z.string().nullable(),
    metadata: MetadataSchema,
  })
  .transform(
    (row): SyncTask => ({
      id: row.id,
      issueId: row.issue_id,
      action: row.action,
      status: row.status,
      priority: row.priority,
      retryCount: row.retry_count,
      maxRetries: row.max_retries,
      createdAt: row.created_at,
      scheduledAt: row.scheduled_at,
      processedAt: row.processed_at,
      errorMessage: row.error_message,
      metadata: row.metadata,
    }),
  );

const WriteResultSchema = z.object({
  affectedRows: z.number(),
  insertId: z.number(),
});

const CountRowSchema = z.object({ total: z.coerce.number() });

const ISSUE_COLUMNS = [
  "id",
  "serial_number",
  "project_name",
  "problem_category",
  "severity_level",
  "problem_description",
  "solution",
  "action_priority",
  "action_record",
  "initiator",
  "responsible_person",
  "status",
  "start_time",
  "target_completion_time",
  "actual_completion_time",
  "remarks",
  "gitlab_url",
  "gitlab_progress",
  "sync_status",
  "last_sync_time",
  "created_at",
  "updated_at",
].join(", ");

const TASK_COLUMNS =
  "id, issue_id, action, status, priority, retry_count, max_retries, created_at, scheduled_at, processed_at, error_message, metadata";

const PATCH_COLUMNS: Array<[keyof IssuePatch, string]> = [
  ["status", "status"],
  ["actualCompletionTime", "actual_completion_time"],
  ["remoteUrl", "gitlab_url"],
  ["remoteProgress", "gitlab_progress"],
  ["syncStatus", "sync_status"],
  ["lastSyncTime", "last_sync_time"],
];

const LINKED = "gitlab_url IS NOT NULL AND gitlab_url <> '' AND UPPER(gitlab_url) <> 'NULL'";

function positiveLimit(value: number): number {
  const limit = Math.trunc(value);
  if (!Number.isFinite(limit) || limit <= 0) {
    throw new Error(`store: limit must be a positive integer (got ${value}).`);
  }
  return limit;
}

export function splitSqlStatements(sql: string): string[] {
  return sql
    .split(/;\s*(?:\r?\n|$)/)
    .map((statement) =>
      statement
        .split(/\r?\n/)
        .filter((line) => !line.trim().startsWith("--"))
        .join("\n")
        .trim(),
    )
    .filter(Boolean);
}

export async function applySchema(executor: SqlExecutor, schemaFile: string = SCHEMA_FILE): Promise<number> {
  const statements = splitSqlStatements(await readFile(schemaFile, "utf8"));
  for (const statement of statements) {
    await executor.execute(statement);
  }
  return statements.length;
}

/**
 * Every timestamp the store writes or compares against comes from `now`, so
 * the server's session time zone never meets the process clock.
 */
export class MysqlSyncStore implements SyncStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private timestamp(): string {
    return formatTimestamp(this.now());
  }

  private async rows<S extends z.ZodTypeAny>(schema: S, sql: string, values: SqlValue[] = []): Promise<z.infer<S>[]> {
    const result = await this.db.execute(sql, values);
    return z.array(schema).parse(result);
  }

  private async write(sql: string, values: SqlValue[]): Promise<z.infer<typeof WriteResultSchema>> {
    return WriteResultSchema.parse(await this.db.execute(sql, values));
  }

  async findByBusinessKey(projectName: string, problemDescription: string): Promise<IssueRecord[]> {
    return this.rows(
      IssueRowSchema,
      `SELECT ${ISSUE_COLUMNS} FROM issues WHERE project_name = ? COLLATE utf8mb4_bin AND problem_description = ? COLLATE utf8mb4_bin ORDER BY updated_at DESC, id DESC`,
      [projectName, problemDescription],
    );
  }

  async getIssue(id: number): Promise<IssueRecord | null> {
    const [issue] = await this.rows(IssueRowSchema, `SELECT ${ISSUE_COLUMNS} FROM issues WHERE id = ?`, [id]);
    return issue ?? null;
  }

  async insertIssue(record: NewIssueRecord): Promise<number> {
    const now = this.timestamp();
    const result = await this.write(
      `INSERT INTO issues (
        serial_number, project_name, problem_category, severity_level, problem_description,
        solution, action_priority, action_record, initiator, responsible_person, status,
        start_time, target_completion_time, actual_completion_time, remarks,
        gitlab_url, gitlab_progress, sync_status, last_sync_time, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        record.serialNumber,
        record.projectName,
        record.problemCategory,
        record.severityLevel,
        record.problemDescription,
        record.solution,
        record.actionPriority,
        record.actionRecord,
        record.initiator,
        record.responsiblePerson,
        record.status,
        record.startTime,
        record.targetCompletionTime,
        record.actualCompletionTime,
        record.remarks,
        record.remoteUrl,
        record.remoteProgress,
        record.syncStatus,
        record.lastSyncTime,
        now,
        now,
      ],
    );
    return result.insertId;
  }

  async updateIssue(id: number, patch: IssuePatch): Promise<void> {
    const assignments: string[] = [];
    const values: SqlValue[] = [];
    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      assignments.push(`${column} = ?`);
      values.push(value);
    }
    if (!assignments.length) return;

    assignments.push("updated_at = ?");
    await this.write(`UPDATE issues SET ${assignments.join(", ")} WHERE id = ?`, [...values, this.timestamp(), id]);
  }

  async listLinkedOpenIssues(): Promise<IssueRecord[]> {
    return this.rows(
      IssueRowSchema,
      `SELECT ${ISSUE_COLUMNS} FROM issues WHERE ${LINKED} AND status <> 'closed' ORDER BY id`,
    );
  }

  async listUnlinkedOpenIssues(): Promise<IssueRecord[]> {
    return this.rows(
      IssueRowSchema,
      `SELECT ${ISSUE_COLUMNS} FROM issues WHERE NOT (${LINKED}) AND status <> 'closed' ORDER BY id`,
    );
  }

  async listIssuesUpdatedSince(since: string): Promise<IssueRecord[]> {
    return this.rows(
      IssueRowSchema,
      `SELECT ${ISSUE_COLUMNS} FROM issues WHERE updated_at >= ? ORDER BY updated_at, id`,
      [since],
    );
  }

  async issueStats(): Promise<IssueStats> {
    const byStatusRows = await this.rows(
      z.object({ status: z.enum(ISSUE_STATUS_VALUES), total: z.coerce.number() }),
      "SELECT status, COUNT(*) AS total FROM issues GROUP BY status",
    );
    const [linked] = await this.rows(CountRowSchema, `SELECT COUNT(*) AS total FROM issues WHERE ${LINKED}`);
    const [unlinkedOpen] = await this.rows(
      CountRowSchema,
      `SELECT COUNT(*) AS total FROM issues WHERE NOT (${LINKED}) AND status <> 'closed'`,
    );
    const [syncFailed] = await this.rows(
      CountRowSchema,
      "SELECT COUNT(*) AS total FROM issues WHERE sync_status = 'failed'",
    );

    const byStatus: IssueStats["byStatus"] = {};
    let total = 0;
    for (const row of byStatusRows) {
      byStatus[row.status] = row.total;
      total += row.total;
    }

    return {
      total,
      byStatus,
      linked: linked?.total ?? 0,
      unlinkedOpen: unlinkedOpen?.total ?? 0,
      syncFailed: syncFailed?.total ?? 0,
    };
  }

  async enqueueTask(task: NewSyncTask): Promise<EnqueueResult> {
    const [existing] = await this.rows(
      z.object({ id: z.number().int(), priority: z.number().int(), status: z.enum(TASK_STATUS_VALUES) }),
      `SELECT id, priority, status FROM sync_queue
        WHERE issue_id = ? AND action = ? AND status IN ('pending', 'retry', 'processing')
        ORDER BY priority, id LIMIT 1`,
      [task.issueId, task.action],
    );

    if (existing) {
      if (task.priority < existing.priority && existing.status !== "processing") {
        await this.write(
          "UPDATE sync_queue SET priority = ?, scheduled_at = LEAST(scheduled_at, ?) WHERE id = ?",
          [task.priority, this.timestamp(), existing.id],
        );
        return { taskId: existing.id, result: "updated" };
      }
      return { taskId: existing.id, result: "exists" };
    }

    const now = this.timestamp();
    const result = await this.write(
      `INSERT INTO sync_queue (issue_id, action, status, priority, retry_count, max_retries, metadata, created_at, scheduled_at)
        VALUES (?, ?, 'pending', ?, 0, ?, ?, ?, ?)`,
      [task.issueId, task.action, task.priority, task.maxRetries, JSON.stringify(task.metadata ?? {}), now, now],
    );
    return { taskId: result.insertId, result: "added" };
  }

  async selectReadyTasks(batchSize: number, maxPriority: number, now: string): Promise<SyncTask[]> {
    // LIMIT placeholders are rejected by some server versions in prepared statements.
    return this.rows(
      TaskRowSchema,
      `SELECT ${TASK_COLUMNS} FROM sync_queue
        WHERE status IN ('pending', 'retry') AND scheduled_at <= ? AND priority <= ?
        ORDER BY priority ASC, created_at ASC, id ASC
        LIMIT ${positiveLimit(batchSize)}`,
      [now, maxPriority],
    );
  }

  async claimTask(taskId: number, now: string): Promise<boolean> {
    const result = await this.write(
      "UPDATE sync_queue SET status = 'processing', claimed_at = ? WHERE id = ? AND status IN ('pending', 'retry')",
      [now, taskId],
    );
    return result.affectedRows === 1;
  }

  async completeTask(taskId: number, now: string): Promise<void> {
    await this.write(
      "UPDATE sync_queue SET status = 'completed', processed_at = ?, error_message = NULL WHERE id = ?",
      [now, taskId],
    );
  }

  async scheduleRetry(taskId: number, retryCount: number, scheduledAt: string, errorMessage: string): Promise<void> {
    await this.write(
      "UPDATE sync_queue SET status = 'retry', retry_count = ?, scheduled_at = ?, error_message = ? WHERE id = ?",
      [retryCount, scheduledAt, errorMessage, taskId],
    );
  }

  async failTask(taskId: number, retryCount: number, errorMessage: string, now: string): Promise<void> {
    await this.write(
      "UPDATE sync_queue SET status = 'failed', retry_count = ?, error_message = ?, processed_at = ? WHERE id = ?",
      [retryCount, errorMessage, now, taskId],
    );
  }

  async queueStatus(): Promise<QueueStatusRow[]> {
    const rows = await this.rows(
      z.object({
        status: z.enum(TASK_STATUS_VALUES),
        total: z.coerce.number(),
        avg_age_minutes: z.coerce.number().nullable(),
      }),
      `SELECT status, COUNT(*) AS total, AVG(TIMESTAMPDIFF(MINUTE, created_at, ?)) AS avg_age_minutes
        FROM sync_queue GROUP BY status ORDER BY status`,
      [this.timestamp()],
    );
    return rows.map((row) => ({
      status: row.status,
      count: row.total,
      avgAgeMinutes: Math.round((row.avg_age_minutes ?? 0) * 10) / 10,
    }));
  }

  async cleanupTasks(olderThan: string): Promise<number> {
    const result = await this.write(
      "DELETE FROM sync_queue WHERE status IN ('completed', 'failed') AND created_at < ?",
      [olderThan],
    );
    return result.affectedRows;
  }

  async releaseStaleTasks(claimedBefore: string, now: string): Promise<number> {
    const result = await this.write(
      `UPDATE sync_queue SET status = 'retry', scheduled_at = ?, error_message = 'released after stale claim'
        WHERE status = 'processing' AND (claimed_at IS NULL OR claimed_at < ?)`,
      [now, claimedBefore],
    );
    return result.affectedRows;
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
