import { describe, expect, it, vi } from "vitest";

import { silentLogger } from "../src/core/logger";
import { Reconciler } from "../src/core/reconcile";
import { RemoteSync } from "../src/core/remote-sync";
import { parseUploadPayload, runUpload, toIncomingIssue } from "../src/core/upload";
import { fixedNow, testConfig } from "./helpers/config";
import { FakeTracker, REMOTE_BASE } from "./helpers/fake-tracker";
import { MemoryStore } from "./helpers/memory-store";

function row(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    序号: 1,
    项目名称: "Line A",
    问题分类: "软件",
    严重程度: "2",
    "问题/需求描述": "label export drops rows",
    责任人: "张三",
    状态: "O",
    ...overrides,
  };
}

function setup() {
  const config = testConfig();
  const store = new MemoryStore();
  const tracker = new FakeTracker();
  const reconciler = new Reconciler({ store, config, logger: silentLogger, now: fixedNow });
  const remoteSync = new RemoteSync({ store, tracker, config, logger: silentLogger, now: fixedNow });
  return { store, tracker, reconciler, remoteSync };
}

describe("upload payload", () => {
  it("rejects a payload without table_data", () => {
    expect(() => parseUploadPayload({})).toThrow("upload: invalid payload\ntable_data: Required");
  });

  it("maps sheet headers, cleans empty markers and keeps the first non-empty duplicate", () => {
    const issue = toIncomingIssue({
      " 项目名称 ": " Line A ",
      "问题/需求描述": "label export drops rows",
      严重程度: "2.0",
      状态: "P",
      status: "",
      开始时间: "nan",
      备注: null,
      unrelated: "x",
    });

    expect(issue).toMatchObject({
      projectName: "Line A",
      problemDescription: "label export drops rows",
      severityLevel: 2,
      status: "P",
      startTime: null,
      remarks: "",
      actionPriority: 0,
    });
  });

  it("defaults a missing status to open", () => {
    expect(toIncomingIssue({ project_name: "Line A" }).status).toBe("open");
  });
});

describe("runUpload", () => {
  it("reconciles every row and queues remote work", async () => {
    const { store, reconciler } = setup();
    const payload = parseUploadPayload({
      table_data: [
        row(),
        row(),
        row({ "问题/需求描述": "scanner misses barcodes", 状态: "C" }),
        row({ 项目名称: "", "问题/需求描述": "orphan row" }),
      ],
    });

    const summary = await runUpload(payload, { reconciler, logger: silentLogger });

    expect(summary).toEqual({
      total: 4,
      inserted: 2,
      updated: 0,
      skipped: 1,
      failed: 1,
      tasksEnqueued: 1,
      remoteApplied: 0,
      errors: ["row 4: missing required field(s): project_name"],
      skippedRecords: [{ row: 2, projectName: "Line A", reason: "duplicate of #1" }],
    });
    expect(store.tasks).toHaveLength(1);
    expect(store.task(1)).toMatchObject({ issueId: 1, action: "create", metadata: { source: "upload" } });
  });

  it("skips rows outside the category filter", async () => {
    const { store, reconciler } = setup();
    const payload = parseUploadPayload({ table_data: [row({ 问题分类: "硬件" }), row()] });

    const summary = await runUpload(payload, { reconciler, logger: silentLogger }, { categoryKeyword: "软件" });

    expect(summary.inserted).toBe(1);
    expect(summary.skippedRecords).toEqual([{ row: 1, projectName: "Line A", reason: "category '硬件' filtered" }]);
    expect(store.issues).toHaveLength(1);
  });

  it("applies remote changes immediately and queues the ones that fail", async () => {
    const { store, tracker, reconciler, remoteSync } = setup();
    const payload = parseUploadPayload({
      table_data: [row(), row({ "问题/需求描述": "scanner misses barcodes" })],
    });
    tracker.failNext("createIssue", new Error("socket hang up"));

    // The first create fails, so row 1 falls back to the queue and row 2 is created as iid 1.
    const summary = await runUpload(payload, { reconciler, remoteSync, logger: silentLogger }, { immediate: true });

    expect(summary).toMatchObject({ inserted: 2, remoteApplied: 1, tasksEnqueued: 1, failed: 0 });
    expect(store.tasks).toHaveLength(1);
    expect(store.task(1)).toMatchObject({ issueId: 1, action: "create", priority: 3, metadata: { source: "upload-fallback" } });
    expect(store.issue(1)?.remoteUrl).toBeNull();
    expect(store.issue(2)).toMatchObject({ remoteUrl: `${REMOTE_BASE}/1`, syncStatus: "synced" });
    expect(tracker.created[0]?.labels).toEqual(["客户需求", "紧急", "进度::To do", "议题类型::功能优化"]);
  });

  it("counts a row once when its immediate sync and queue fallback both fail", async () => {
    const { store, tracker, reconciler, remoteSync } = setup();
    const payload = parseUploadPayload({ table_data: [row()] });
    tracker.failNext("createIssue", new Error("socket hang up"));
    vi.spyOn(store, "enqueueTask").mockRejectedValueOnce(new Error("pool is closed"));

    const summary = await runUpload(payload, { reconciler, remoteSync, logger: silentLogger }, { immediate: true });

    expect(summary).toMatchObject({ inserted: 1, failed: 0, tasksEnqueued: 0, remoteApplied: 0 });
    expect(summary.errors).toEqual([
      "row 1: immediate create failed (socket hang up) and could not be queued: pool is closed",
    ]);
    expect(store.issues).toHaveLength(1);
  });
});
