import { readFileSync } from "node:fs";

import { describe, expect, it, vi } from "vitest";

import { applySchema, MysqlSyncStore, SCHEMA_FILE, splitSqlStatements, type SqlExecutor } from "../src/core/mysql-store";
import { fixedNow } from "./helpers/config";
import { issueRecord } from "./helpers/memory-store";

function issueRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 4,
    serial_number: "12",
    project_name: "Line A",
    problem_category: "软件",
    severity_level: "2",
    problem_description: "label export drops rows",
    solution: null,
    action_priority: 1,
    action_record: "",
    initiator: "王五",
    responsible_person: "张三",
    status: "in_progress",
    start_time: "2026-02-27 10:00:00",
    target_completion_time: null,
    actual_completion_time: null,
    remarks: null,
    gitlab_url: "https://gitlab.example.test/team/board/-/issues/3",
    gitlab_progress: "进度::Doing",
    sync_status: "synced",
    last_sync_time: "2026-03-01 18:00:00",
    created_at: "2026-02-27 10:00:00",
    updated_at: "2026-03-01 18:00:00",
    ...overrides,
  };
}

function taskRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 8,
    issue_id: 4,
    action: "close",
    status: "pending",
    priority: 2,
    retry_count: 0,
    max_retries: 3,
    created_at: "2026-03-02 08:00:00",
    scheduled_at: "2026-03-02 08:00:00",
    processed_at: null,
    error_message: null,
    metadata: '{"source":"reconcile","removeLabels":["stale"]}',
    ...overrides,
  };
}

function setup() {
  const execute = vi.fn<SqlExecutor["execute"]>();
  const end = vi.fn(async () => {});
  const store = new MysqlSyncStore({ execute, end }, fixedNow);
  return { execute, end, store };
}

const written = (affectedRows: number, insertId = 0) => ({ affectedRows, insertId });

describe("MysqlSyncStore issues", () => {
  it("maps issue rows to records", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue([issueRow()]);

    const record = await store.getIssue(4);

    expect(record).toMatchObject({
      id: 4,
      serialNumber: "12",
      severityLevel: 2,
      solution: "",
      remarks: "",
      status: "in_progress",
      remoteUrl: "https://gitlab.example.test/team/board/-/issues/3",
      remoteProgress: "进度::Doing",
      syncStatus: "synced",
    });
    expect(execute.mock.calls[0]?.[1]).toEqual([4]);
  });

  it("returns null when no row matches", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue([]);
    expect(await store.getIssue(99)).toBeNull();
  });

  it("rejects rows with an unknown status", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue([issueRow({ status: "archived" })]);
    await expect(store.getIssue(4)).rejects.toThrow("status");
  });

  it("updates only the patched columns", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue(written(1));

    await store.updateIssue(4, { remoteProgress: "", syncStatus: "synced" });
    await store.updateIssue(4, {});

    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledWith(
      "UPDATE issues SET gitlab_progress = ?, sync_status = ?, updated_at = ? WHERE id = ?",
      ["", "synced", "2026-03-02 09:00:00", 4],
    );
  });

  it("matches the business key byte for byte", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue([]);

    expect(await store.findByBusinessKey("P1", "crash on save")).toEqual([]);
    expect(execute.mock.calls[0]?.[0]).toContain(
      "WHERE project_name = ? COLLATE utf8mb4_bin AND problem_description = ? COLLATE utf8mb4_bin",
    );
    expect(execute.mock.calls[0]?.[1]).toEqual(["P1", "crash on save"]);
  });

  it("stamps inserted issues with the process clock", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue(written(1, 5));
    const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...record } = issueRecord();

    expect(await store.insertIssue(record)).toBe(5);
    expect(execute.mock.calls[0]?.[1]?.slice(-2)).toEqual(["2026-03-02 09:00:00", "2026-03-02 09:00:00"]);
  });

  it("aggregates issue statistics", async () => {
    const { execute, store } = setup();
    execute
      .mockResolvedValueOnce([
        { status: "open", total: "3" },
        { status: "closed", total: 2 },
      ])
      .mockResolvedValueOnce([{ total: "4" }])
      .mockResolvedValueOnce([{ total: 1 }])
      .mockResolvedValueOnce([{ total: 0 }]);

    expect(await store.issueStats()).toEqual({
      total: 5,
      byStatus: { open: 3, closed: 2 },
      linked: 4,
      unlinkedOpen: 1,
      syncFailed: 0,
    });
  });
});

describe("MysqlSyncStore queue", () => {
  it("inserts a new task with serialized metadata", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValueOnce([]).mockResolvedValueOnce(written(1, 12));

    const result = await store.enqueueTask({
      issueId: 4,
      action: "create",
      priority: 3,
      maxRetries: 3,
      metadata: { source: "upload" },
    });

    expect(result).toEqual({ taskId: 12, result: "added" });
    expect(execute.mock.calls[1]?.[1]).toEqual([
      4,
      "create",
      3,
      3,
      '{"source":"upload"}',
      "2026-03-02 09:00:00",
      "2026-03-02 09:00:00",
    ]);
  });

  it("raises the priority of a waiting duplicate", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValueOnce([{ id: 8, priority: 5, status: "retry" }]).mockResolvedValueOnce(written(1));

    const result = await store.enqueueTask({ issueId: 4, action: "update", priority: 2, maxRetries: 3 });

    expect(result).toEqual({ taskId: 8, result: "updated" });
    expect(execute.mock.calls[1]).toEqual([
      "UPDATE sync_queue SET priority = ?, scheduled_at = LEAST(scheduled_at, ?) WHERE id = ?",
      [2, "2026-03-02 09:00:00", 8],
    ]);
  });

  it("leaves a running or equally urgent duplicate alone", async () => {
    const { execute, store } = setup();
    execute
      .mockResolvedValueOnce([{ id: 8, priority: 5, status: "processing" }])
      .mockResolvedValueOnce([{ id: 9, priority: 2, status: "pending" }]);

    expect(await store.enqueueTask({ issueId: 4, action: "update", priority: 2, maxRetries: 3 })).toEqual({
      taskId: 8,
      result: "exists",
    });
    expect(await store.enqueueTask({ issueId: 4, action: "close", priority: 2, maxRetries: 3 })).toEqual({
      taskId: 9,
      result: "exists",
    });
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it("selects ready tasks with an inlined limit and parses their metadata", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue([taskRow(), taskRow({ id: 9, metadata: null })]);

    const tasks = await store.selectReadyTasks(10, 5, "2026-03-02 09:00:00");

    expect(tasks.map((task) => [task.id, task.metadata])).toEqual([
      [8, { source: "reconcile", removeLabels: ["stale"] }],
      [9, {}],
    ]);
    expect(execute.mock.calls[0]?.[0]).toContain("LIMIT 10");
    expect(execute.mock.calls[0]?.[1]).toEqual(["2026-03-02 09:00:00", 5]);
    await expect(store.selectReadyTasks(0, 5, "2026-03-02 09:00:00")).rejects.toThrow(
      "store: limit must be a positive integer (got 0).",
    );
  });

  it("claims a task only when the conditional update hits a row", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValueOnce(written(1)).mockResolvedValueOnce(written(0));

    expect(await store.claimTask(8, "2026-03-02 09:00:00")).toBe(true);
    expect(await store.claimTask(8, "2026-03-02 09:00:00")).toBe(false);
  });

  it("rounds the average queue age", async () => {
    const { execute, store } = setup();
    execute.mockResolvedValue([
      { status: "pending", total: 2, avg_age_minutes: "12.3456" },
      { status: "completed", total: "5", avg_age_minutes: null },
    ]);

    expect(await store.queueStatus()).toEqual([
      { status: "pending", count: 2, avgAgeMinutes: 12.3 },
      { status: "completed", count: 5, avgAgeMinutes: 0 },
    ]);
    expect(execute.mock.calls[0]?.[1]).toEqual(["2026-03-02 09:00:00"]);
  });

  it("reports affected rows from cleanup and stale recovery and closes the pool", async () => {
    const { execute, end, store } = setup();
    execute.mockResolvedValueOnce(written(3)).mockResolvedValueOnce(written(1));

    expect(await store.cleanupTasks("2026-02-23 09:00:00")).toBe(3);
    expect(await store.releaseStaleTasks("2026-03-02 08:30:00", "2026-03-02 09:00:00")).toBe(1);
    expect(execute.mock.calls[1]?.[1]).toEqual(["2026-03-02 09:00:00", "2026-03-02 08:30:00"]);

    await store.close();
    expect(end).toHaveBeenCalledTimes(1);
  });
});

describe("schema statements", () => {
  it("splits on statement terminators and drops comment lines", () => {
    const sql = ["-- issues", "CREATE TABLE a (id INT);", "", "-- queue", "CREATE TABLE b (", "  note TEXT", ");", ""].join(
      "\n",
    );

    expect(splitSqlStatements(sql)).toEqual(["CREATE TABLE a (id INT)", "CREATE TABLE b (\n  note TEXT\n)"]);
  });

  it("applies every statement of the bundled schema", async () => {
    const { execute } = setup();
    execute.mockResolvedValue(written(0));

    const count = await applySchema({ execute, end: async () => {} });

    expect(count).toBe(2);
    expect(execute.mock.calls.map(([sql]) => sql.split("(")[0]?.trim())).toEqual([
      "CREATE TABLE IF NOT EXISTS issues",
      "CREATE TABLE IF NOT EXISTS sync_queue",
    ]);
  });

  it("declares the business key columns with a binary collation", () => {
    const schema = readFileSync(SCHEMA_FILE, "utf8");

    expect(schema).toContain("    project_name VARCHAR(255) COLLATE utf8mb4_bin NOT NULL,");
    expect(schema).toContain("    problem_description TEXT COLLATE utf8mb4_bin NOT NULL,");
  });
});
