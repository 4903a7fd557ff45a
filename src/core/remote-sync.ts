import { resolveAssigneeUsernames } from "./assignees";
import type { AppConfig } from "./config";
import {
  InvalidRemoteUrlError,
  PartialSyncError,
  RecordNotFoundError,
  RemoteIssueNotFoundError,
  errorMessage,
} from "./errors";
import type { IssueTracker, RemoteIssue } from "./gitlab-client";
import { buildIssueUrl, hasRemoteLink, parseIssueIid } from "./issue-url";
import {
  buildIssueLabels,
  extractProgressFromLabels,
  isProgressLabel,
  replaceProgressLabel,
  statusToProgressLabel,
  stripProgressLabels,
} from "./labels";
import { createLogger, type Logger } from "./logger";
import { formatTimestamp, type IssueRecord, type TaskAction, type TaskMetadata } from "./records";
import type { IssueStore } from "./store";

export type SyncOutcome = {
  action: TaskAction;
  issueId: number;
  status: "applied" | "skipped";
  remoteUrl: string | null;
  progress: string | null;
  detail: string;
};

export type RemoteSyncDeps = {
  store: IssueStore;
  tracker: IssueTracker;
  config: Pick<AppConfig, "gitlab" | "labels" | "users">;
  logger?: Logger;
  now?: () => Date;
};

function line(label: string, value: string | number | null): string {
  return `- **${label}**: ${value ?? ""}`;
}

export function buildIssueTitle(record: Pick<IssueRecord, "id" | "projectName" | "problemDescription">): string {
  const project = record.projectName.trim();
  const description = record.problemDescription.trim();
  if (project && description) return `${project}: ${description}`;
  if (project) return project;
  return `Issue #${record.id}`;
}

export function buildIssueDescription(record: IssueRecord): string {
  const sections = [
    record.initiator ? `提出人: ${record.initiator}` : "",
    `## 问题描述\n${record.problemDescription}`,
    `## 解决方案\n${record.solution}`,
    [
      "## 详细信息",
      line("项目名称", record.projectName),
      line("问题分类", record.problemCategory),
      line("严重程度", record.severityLevel),
      line("行动优先级", record.actionPriority),
      line("发起人", record.initiator),
      line("责任人", record.responsiblePerson),
      line("状态", record.status),
      line("开始时间", record.startTime),
      line("目标完成时间", record.targetCompletionTime),
      line("行动记录", record.actionRecord),
      line("备注", record.remarks),
    ].join("\n"),
    "---\n*由表格同步自动创建*",
  ];
  return sections.filter(Boolean).join("\n\n");
}

export function buildClosingNote(record: IssueRecord, closedAt: string): string {
  return [
    "",
    "",
    "---",
    "",
    "## 议题关闭信息",
    line("关闭时间", closedAt),
    line("关闭原因", "本地状态已更新为 closed"),
    line("项目名称", record.projectName),
    line("问题分类", record.problemCategory),
    line("解决方案", record.solution),
    line("行动记录", record.actionRecord),
    line("备注", record.remarks),
  ].join("\n");
}

export class RemoteSync {
  private readonly store: IssueStore;
  private readonly tracker: IssueTracker;
  private readonly config: RemoteSyncDeps["config"];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: RemoteSyncDeps) {
    this.store = deps.store;
    this.tracker = deps.tracker;
    this.config = deps.config;
    this.logger = deps.logger ?? createLogger("sync");
    this.now = deps.now ?? (() => new Date());
  }

  async run(action: TaskAction, issueId: number, metadata: TaskMetadata = {}): Promise<SyncOutcome> {
    const record = await this.store.getIssue(issueId);
    if (!record) {
      throw new RecordNotFoundError(issueId);
    }

    // A close queued before the record was reopened must not close the remote issue.
    if ((action === "close" || action === "create_and_close") && record.status !== "closed") {
      return this.skipped(action, record, `record is ${record.status}`);
    }

    switch (action) {
      case "create":
        return this.createFor(record);
      case "close":
        return this.closeFor(record, metadata);
      case "create_and_close":
        return this.createAndClose(record, metadata);
      case "update":
        return this.updateFor(record);
      case "sync_progress":
        return this.syncProgressFor(record);
    }
  }

  async createFor(record: IssueRecord): Promise<SyncOutcome> {
    if (hasRemoteLink(record.remoteUrl)) {
      return this.skipped("create", record, "already linked");
    }
    if (record.status === "closed") {
      return this.skipped("create", record, "record is closed");
    }
    return this.createRemote(record);
  }

  async closeFor(record: IssueRecord, metadata: TaskMetadata = {}): Promise<SyncOutcome> {
    if (!hasRemoteLink(record.remoteUrl)) {
      return this.skipped("close", record, "no remote link");
    }

    const remote = await this.fetchLinked(record.remoteUrl);
    const labels = stripProgressLabels(remote.labels, metadata.removeLabels ?? []);

    if (remote.state === "closed") {
      if (labels.length !== remote.labels.length) {
        await this.tracker.updateIssue(remote.iid, { labels });
      }
    } else {
      const closedAt = formatTimestamp(this.now());
      await this.tracker.updateIssue(remote.iid, {
        description: remote.description + buildClosingNote(record, closedAt),
        labels,
        stateEvent: "close",
      });
    }

    await this.store.updateIssue(record.id, {
      remoteProgress: "",
      syncStatus: "synced",
      lastSyncTime: formatTimestamp(this.now()),
    });
    this.logger.log(`closed ${record.remoteUrl} for issue ${record.id}`);
    return this.applied("close", record, record.remoteUrl, "", remote.state === "closed" ? "already closed" : "closed");
  }

  /**
   * Creates the remote issue (unless already linked) and closes it. A close
   * failure after a successful create surfaces as a retryable PartialSyncError;
   * the retry then finds the link and only closes.
   */
  async createAndClose(record: IssueRecord, metadata: TaskMetadata = {}): Promise<SyncOutcome> {
    let linked = record;
    if (!hasRemoteLink(record.remoteUrl)) {
      const created = await this.createRemote(record);
      linked = { ...record, remoteUrl: created.remoteUrl, remoteProgress: created.progress };
    }

    try {
      const closed = await this.closeFor(linked, metadata);
      return { ...closed, action: "create_and_close" };
    } catch (error) {
      if (linked !== record && linked.remoteUrl) {
        throw new PartialSyncError(linked.remoteUrl, error);
      }
      throw error;
    }
  }

  async updateFor(record: IssueRecord): Promise<SyncOutcome> {
    if (record.status === "closed") {
      const closed = await this.closeFor(record);
      return { ...closed, action: "update" };
    }
    if (!hasRemoteLink(record.remoteUrl)) {
      const created = await this.createRemote(record);
      return { ...created, action: "update" };
    }

    const remote = await this.fetchLinked(record.remoteUrl);
    const progress = statusToProgressLabel(record.status, this.config.labels.progressMapping);
    const labels = replaceProgressLabel(remote.labels, progress);
    const reopen = remote.state === "closed";
    const currentProgress = remote.labels.filter(isProgressLabel);

    if (reopen || currentProgress.length !== 1 || currentProgress[0] !== progress) {
      await this.tracker.updateIssue(remote.iid, { labels, stateEvent: reopen ? "reopen" : undefined });
    }

    await this.store.updateIssue(record.id, {
      remoteProgress: progress,
      syncStatus: "synced",
      lastSyncTime: formatTimestamp(this.now()),
    });
    return this.applied("update", record, record.remoteUrl, progress, reopen ? "reopened" : "relabelled");
  }

  async syncProgressFor(record: IssueRecord): Promise<SyncOutcome> {
    if (!hasRemoteLink(record.remoteUrl)) {
      return this.skipped("sync_progress", record, "no remote link");
    }

    const remote = await this.fetchLinked(record.remoteUrl);
    const progress = record.status === "closed" ? "" : extractProgressFromLabels(remote.labels, remote.state);
    if (progress === record.remoteProgress) {
      return this.skipped("sync_progress", record, "progress unchanged");
    }

    await this.store.updateIssue(record.id, {
      remoteProgress: progress,
      syncStatus: "synced",
      lastSyncTime: formatTimestamp(this.now()),
    });
    return this.applied("sync_progress", record, record.remoteUrl, progress, `${record.remoteProgress ?? "(none)"} -> ${progress}`);
  }

  private async createRemote(record: IssueRecord): Promise<SyncOutcome> {
    const assigneeIds = await this.resolveAssigneeIds(record);
    const remote = await this.tracker.createIssue({
      title: buildIssueTitle(record),
      description: buildIssueDescription(record),
      labels: buildIssueLabels(record, this.config.labels),
      assigneeIds,
    });

    const remoteUrl = remote.webUrl || buildIssueUrl(this.config.gitlab.url, this.config.gitlab.projectPath, remote.iid);
    const progress = extractProgressFromLabels(remote.labels, remote.state);
    await this.store.updateIssue(record.id, {
      remoteUrl,
      remoteProgress: progress,
      syncStatus: "synced",
      lastSyncTime: formatTimestamp(this.now()),
    });
    this.logger.log(`created ${remoteUrl} for issue ${record.id}`);
    return this.applied("create", record, remoteUrl, progress, "created");
  }

  private async resolveAssigneeIds(record: IssueRecord): Promise<number[]> {
    const resolution = resolveAssigneeUsernames(record.responsiblePerson, this.config.users);
    if (resolution.unresolved.length) {
      this.logger.warn(`issue ${record.id}: no username for ${resolution.unresolved.join(", ")}`);
    }

    const ids: number[] = [];
    for (const username of resolution.usernames) {
      try {
        const id = await this.tracker.findUserId(username);
        if (id === null) {
          this.logger.warn(`issue ${record.id}: remote user ${username} not found`);
        } else {
          ids.push(id);
        }
      } catch (error) {
        // Assignment is best effort; the issue is still created unassigned.
        this.logger.warn(`issue ${record.id}: user lookup for ${username} failed: ${errorMessage(error)}`);
      }
    }
    return ids;
  }

  private async fetchLinked(remoteUrl: string): Promise<RemoteIssue> {
    const iid = parseIssueIid(remoteUrl);
    if (iid === null) {
      throw new InvalidRemoteUrlError(remoteUrl);
    }
    const remote = await this.tracker.getIssue(iid);
    if (!remote) {
      throw new RemoteIssueNotFoundError(iid);
    }
    return remote;
  }

  private applied(
    action: TaskAction,
    record: IssueRecord,
    remoteUrl: string | null,
    progress: string | null,
    detail: string,
  ): SyncOutcome {
    return { action, issueId: record.id, status: "applied", remoteUrl, progress, detail };
  }

  private skipped(action: TaskAction, record: IssueRecord, detail: string): SyncOutcome {
    return {
      action,
      issueId: record.id,
      status: "skipped",
      remoteUrl: record.remoteUrl,
      progress: record.remoteProgress,
      detail,
    };
  }
}
