import { describe, expect, it, vi } from "vitest";

import { ChangeDetector, computeRecordHash, planChangeAction } from "../src/core/change-detector";
import { silentLogger } from "../src/core/logger";
import { ProgressMonitor } from "../src/core/monitor";
import type { IssueRecord } from "../src/core/records";
import type { RemoteSync } from "../src/core/remote-sync";
import { fixedNow, testConfig } from "./helpers/config";
import { FakeTracker, REMOTE_BASE } from "./helpers/fake-tracker";
import { issueRecord, MemoryStore } from "./helpers/memory-store";

function setup() {
  const store = new MemoryStore();
  const tracker = new FakeTracker();
  const closeFor = vi.fn<RemoteSync["closeFor"]>();
  const detector = new ChangeDetector();
  const sleep = vi.fn(async (_ms: number) => {});
  const monitor = new ProgressMonitor({
    store,
    tracker,
    sync: { closeFor },
    config: testConfig(),
    detector,
    logger: silentLogger,
    now: fixedNow,
    sleep,
  });
  return { store, tracker, closeFor, detector, sleep, monitor };
}

describe("ChangeDetector", () => {
  it("hashes only the tracked business fields", () => {
    const base = issueRecord();
    expect(computeRecordHash(base)).toMatch(/^[0-9a-f]{32}$/);
    const withSolution: IssueRecord = { ...base, solution: "reset the exporter" };
    expect(computeRecordHash(withSolution)).toBe(computeRecordHash(base));
    expect(computeRecordHash({ ...base, severityLevel: 1 })).not.toBe(computeRecordHash(base));
  });

  it("reports the first sighting and later edits as changes", () => {
    const detector = new ChangeDetector();
    const record = issueRecord();

    expect(detector.hasChanged(record)).toBe(true);
    expect(detector.hasChanged(record)).toBe(false);
    expect(detector.hasChanged({ ...record, status: "in_progress" })).toBe(true);
    detector.forget(record.id);
    expect(detector.size).toBe(0);
    expect(detector.hasChanged({ ...record, status: "in_progress" })).toBe(true);
  });

  it("plans status-change actions from the link state", () => {
    expect(planChangeAction({ status: "closed", remoteUrl: `${REMOTE_BASE}/3` })).toBe("close");
    expect(planChangeAction({ status: "closed", remoteUrl: null })).toBeNull();
    expect(planChangeAction({ status: "open", remoteUrl: null })).toBe("create");
  });
});

describe("ProgressMonitor", () => {
  it("pulls remote progress into linked open records", async () => {
    const { store, tracker, monitor } = setup();
    tracker.seed({ iid: 3, labels: ["客户需求", "进度::Doing"] });
    tracker.seed({ iid: 4, labels: ["进度::Doing"] });
    store.seedIssue({ remoteUrl: `${REMOTE_BASE}/3`, remoteProgress: "进度::To do" });
    store.seedIssue({ remoteUrl: `${REMOTE_BASE}/4`, remoteProgress: "进度::Doing" });
    store.seedIssue({ remoteUrl: `${REMOTE_BASE}/99` });
    store.seedIssue();

    const result = await monitor.runSingleCheck();

    expect(result).toEqual({ updated: 1, failed: 1, skipped: 1, errors: ["issue 3: remote issue #99 not found"] });
    expect(store.issue(1)).toMatchObject({
      remoteProgress: "进度::Doing",
      syncStatus: "synced",
      lastSyncTime: "2026-03-02 09:00:00",
    });
    expect(await monitor.stats()).toEqual({ linkedOpenIssues: 3, cachedRecords: 0, lastCheckAt: "2026-03-02 09:00:00" });
  });

  it("closes the remote issue for a record closed since it was listed", async () => {
    const { store, tracker, closeFor, monitor } = setup();
    tracker.seed({ iid: 3, labels: ["进度::Doing"] });
    const record = issueRecord({ status: "closed", remoteUrl: `${REMOTE_BASE}/3` });
    vi.spyOn(store, "listLinkedOpenIssues").mockResolvedValueOnce([record]);
    closeFor.mockResolvedValue({
      action: "close",
      issueId: 1,
      status: "applied",
      remoteUrl: record.remoteUrl,
      progress: "",
      detail: "closed",
    });

    const result = await monitor.runSingleCheck();

    expect(result.updated).toBe(1);
    expect(closeFor).toHaveBeenCalledWith(record);
  });

  it("queues work for changed records and ignores unchanged ones", async () => {
    const { store, monitor } = setup();
    store.seedIssue({ remoteUrl: `${REMOTE_BASE}/3` });
    store.seedIssue({ problemDescription: "scanner misses barcodes" });
    store.seedIssue({ problemDescription: "printer jams", status: "closed" });

    const first = await monitor.runChangeScan("2026-03-02 08:55:00");
    expect(first).toEqual({ scanned: 3, changed: 3, enqueued: 2, errors: [] });
    expect(store.tasks.map((task) => [task.issueId, task.action, task.priority])).toEqual([
      [1, "update", 5],
      [2, "create", 3],
    ]);
    expect(store.task(1)?.metadata).toEqual({ source: "change-scan" });

    const second = await monitor.runChangeScan("2026-03-02 08:55:00");
    expect(second).toEqual({ scanned: 3, changed: 0, enqueued: 0, errors: [] });

    const edited = store.issue(1);
    if (edited) edited.responsiblePerson = "李四";
    const third = await monitor.runChangeScan("2026-03-02 08:55:00");
    expect(third).toEqual({ scanned: 3, changed: 1, enqueued: 0, errors: [] });
    expect(store.tasks).toHaveLength(2);
  });

  it("forgets a record whose task could not be queued", async () => {
    const { store, detector, monitor } = setup();
    store.seedIssue();
    vi.spyOn(store, "enqueueTask").mockRejectedValueOnce(new Error("pool is closed"));

    const first = await monitor.runChangeScan("2026-03-02 08:55:00");
    expect(first.errors).toEqual(["issue 1: pool is closed"]);
    expect(detector.size).toBe(0);

    const retry = await monitor.runChangeScan("2026-03-02 08:55:00");
    expect(retry).toEqual({ scanned: 1, changed: 1, enqueued: 1, errors: [] });
  });

  it("waits the monitor interval between continuous checks", async () => {
    const { sleep, monitor } = setup();
    const onCheck = vi.fn();

    expect(await monitor.runContinuous({ iterations: 3, onCheck })).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenLastCalledWith(300_000);
    expect(onCheck).toHaveBeenCalledTimes(3);
  });
});
