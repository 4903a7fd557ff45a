import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { GitLabConfig } from "./config";
import { RemoteTrackerError } from "./errors";
import type { RemoteIssueState } from "./labels";

export type RemoteIssue = {
  iid: number;
  title: string;
  description: string;
  labels: string[];
  state: RemoteIssueState;
  webUrl: string;
};

export type CreateIssueInput = {
  title: string;
  description: string;
  labels: string[];
  assigneeIds?: number[];
};

export type UpdateIssueInput = {
  title?: string;
  description?: string;
  labels?: string[];
  stateEvent?: "close" | "reopen";
  assigneeIds?: number[];
};

export type IssueListState = RemoteIssueState | "all";

export type IssueTracker = {
  createIssue(input: CreateIssueInput): Promise<RemoteIssue>;
  updateIssue(iid: number, input: UpdateIssueInput): Promise<RemoteIssue>;
  /** null when the issue does not exist (404). */
  getIssue(iid: number): Promise<RemoteIssue | null>;
  listIssues(state: IssueListState): Promise<RemoteIssue[]>;
  findUserId(username: string): Promise<number | null>;
};

export type HttpClient = Pick<AxiosInstance, "get" | "post" | "put">;

const GitLabIssueSchema = z
  .object({
    iid: z.number().int().positive(),
    title: z.string(),
    description: z.string().nullable().optional(),
    labels: z.array(z.string()).default([]),
    state: z.enum(["opened", "closed"]),
    web_url: z.string(),
  })
  .transform(
    (issue): RemoteIssue => ({
      iid: issue.iid,
      title: issue.title,
      description: issue.description ?? "",
      labels: issue.labels,
      state: issue.state,
      webUrl: issue.web_url,
    }),
  );

const GitLabUserSchema = z.object({ id: z.number().int(), username: z.string() });

const PAGE_SIZE = 100;
const MAX_PAGES = 50;

function isRetryableStatus(status: number | null): boolean {
  return status === null || status >= 500 || status === 408 || status === 429;
}

function responseDetail(data: unknown): string {
  if (typeof data === "string") return data.trim().slice(0, 200);
  if (typeof data === "object" && data !== null) {
    if ("message" in data) return JSON.stringify(data.message);
    if ("error" in data) return JSON.stringify(data.error);
  }
  return "";
}

export function toRemoteTrackerError(operation: string, error: unknown): RemoteTrackerError {
  if (error instanceof RemoteTrackerError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    const detail = responseDetail(error.response?.data) || error.message;
    const label = status === null ? (error.code ?? "network error") : `HTTP ${status}`;
    return new RemoteTrackerError(`gitlab: ${operation} failed (${label}): ${detail}`, status, isRetryableStatus(status));
  }

  if (error instanceof z.ZodError) {
    const issue = error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unexpected shape";
    return new RemoteTrackerError(`gitlab: ${operation} returned an unexpected response (${where})`, null, false);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RemoteTrackerError(`gitlab: ${operation} failed: ${message}`, null, true);
}

function issueBody(input: UpdateIssueInput): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (input.title !== undefined) body.title = input.title;
  if (input.description !== undefined) body.description = input.description;
  if (input.labels !== undefined) body.labels = input.labels.join(",");
  if (input.stateEvent !== undefined) body.state_event = input.stateEvent;
  if (input.assigneeIds?.length) body.assignee_ids = input.assigneeIds;
  return body;
}

export class GitLabClient implements IssueTracker {
  constructor(
    private readonly http: HttpClient,
    private readonly projectId: number,
  ) {}

  static fromConfig(config: GitLabConfig): GitLabClient {
    const http = axios.create({
      baseURL: `${config.url}/api/v4`,
      headers: {
        "PRIVATE-TOKEN": config.token,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      timeout: config.timeoutMs,
    });
    return new GitLabClient(http, config.projectId);
  }

  private get issuesPath(): string {
    return `/projects/${encodeURIComponent(String(this.projectId))}/issues`;
  }

  async createIssue(input: CreateIssueInput): Promise<RemoteIssue> {
    try {
      const response = await this.http.post(this.issuesPath, issueBody(input));
      return GitLabIssueSchema.parse(response.data);
    } catch (error) {
      throw toRemoteTrackerError("create issue", error);
    }
  }

  async updateIssue(iid: number, input: UpdateIssueInput): Promise<RemoteIssue> {
    try {
      const response = await this.http.put(`${this.issuesPath}/${iid}`, issueBody(input));
      return GitLabIssueSchema.parse(response.data);
    } catch (error) {
      throw toRemoteTrackerError(`update issue #${iid}`, error);
    }
  }

  async getIssue(iid: number): Promise<RemoteIssue | null> {
    try {
      const response = await this.http.get(`${this.issuesPath}/${iid}`);
      return GitLabIssueSchema.parse(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw toRemoteTrackerError(`get issue #${iid}`, error);
    }
  }

  async listIssues(state: IssueListState): Promise<RemoteIssue[]> {
    const issues: RemoteIssue[] = [];
    try {
      for (let page = 1; page <= MAX_PAGES; page += 1) {
        const response = await this.http.get(this.issuesPath, {
          params: { state, per_page: PAGE_SIZE, page },
        });
        const batch = z.array(GitLabIssueSchema).parse(response.data);
        issues.push(...batch);
        if (batch.length < PAGE_SIZE) break;
      }
    } catch (error) {
      throw toRemoteTrackerError(`list ${state} issues`, error);
    }
    return issues;
  }

  async findUserId(username: string): Promise<number | null> {
    try {
      const response = await this.http.get("/users", { params: { username } });
      const users = z.array(GitLabUserSchema).parse(response.data);
      return users.find((user) => user.username === username)?.id ?? users[0]?.id ?? null;
    } catch (error) {
      throw toRemoteTrackerError(`look up user ${username}`, error);
    }
  }
}
