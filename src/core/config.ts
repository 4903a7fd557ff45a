import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";

const DEFAULT_CONFIG_FILE = "issue-sync.yml";
const CONFIG_ENV_KEY = "ISSUE_SYNC_CONFIG";

export const DEFAULT_SEVERITY_MAPPING: Record<string, string[]> = {
  "1": ["客户需求", "紧急"],
  "2": ["客户需求", "紧急"],
  "3": ["客户需求", "中等"],
  "4": ["客户需求", "一般"],
  "5": ["客户需求", "一般"],
};

export const DEFAULT_PROGRESS_MAPPING: Record<string, string> = {
  open: "进度::To do",
  in_progress: "进度::Doing",
  paused: "进度::Pausing",
  resolved: "进度::Done",
  closed: "进度::Done",
};

export const DEFAULT_ISSUE_TYPE = "议题类型::功能优化";

const IssueTypeRuleSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  label: z.string().min(1),
});

export type IssueTypeRule = z.infer<typeof IssueTypeRuleSchema>;

export const DEFAULT_ISSUE_TYPE_RULES: IssueTypeRule[] = [
  { name: "bug", keywords: ["bug", "崩溃", "闪退", "报错", "错误", "异常", "故障", "crash"], label: "议题类型::Bug" },
  { name: "algorithm", keywords: ["算法", "模型", "识别", "检测", "标注", "algorithm"], label: "议题类型::算法优化" },
];

const LabelsSchema = z
  .object({
    severity_mapping: z.record(z.string(), z.array(z.string().min(1))).default(DEFAULT_SEVERITY_MAPPING),
    default_severity_labels: z.array(z.string().min(1)).default(["客户需求", "一般"]),
    progress_mapping: z.record(z.string(), z.string().min(1)).default(DEFAULT_PROGRESS_MAPPING),
    additional_labels: z.array(z.string().min(1)).default([]),
    issue_type_rules: z.array(IssueTypeRuleSchema).default(DEFAULT_ISSUE_TYPE_RULES),
    default_issue_type: z.string().min(1).default(DEFAULT_ISSUE_TYPE),
  })
  .default({});

const UsersSchema = z
  .object({
    mapping: z.record(z.string(), z.string().min(1)).default({}),
    default_assignee: z.string().min(1).nullable().default(null),
  })
  .default({});

export const ConfigFileSchema = z.object({
  gitlab: z
    .object({
      url: z.string().default(""),
      token: z.string().default(""),
      project_id: z.coerce.number().int().nonnegative().default(0),
      project_path: z.string().default(""),
      timeout_ms: z.number().int().positive().default(30_000),
    })
    .default({}),
  database: z
    .object({
      host: z.string().default("localhost"),
      port: z.coerce.number().int().positive().default(3306),
      user: z.string().default("issue"),
      password: z.string().default(""),
      name: z.string().default("issue_database"),
      connection_limit: z.number().int().positive().default(5),
      query_timeout_ms: z.number().int().positive().default(30_000),
    })
    .default({}),
  labels: LabelsSchema,
  users: UsersSchema,
  queue: z
    .object({
      batch_size: z.number().int().positive().default(10),
      max_priority: z.number().int().default(5),
      workers: z.number().int().positive().default(3),
      max_retries: z.number().int().positive().default(3),
      interval_seconds: z.number().int().positive().default(60),
    })
    .default({}),
  monitor: z
    .object({
      interval_seconds: z.number().int().positive().default(300),
    })
    .default({}),
  reconcile: z
    .object({
      require_description: z.boolean().default(true),
    })
    .default({}),
  upload: z
    .object({
      category_keyword: z.string().min(1).nullable().default(null),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type GitLabConfig = {
  url: string;
  token: string;
  projectId: number;
  projectPath: string;
  timeoutMs: number;
};

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  connectionLimit: number;
  queryTimeoutMs: number;
};

export type LabelConfig = {
  severityMapping: Record<string, string[]>;
  defaultSeverityLabels: string[];
  progressMapping: Record<string, string>;
  additionalLabels: string[];
  issueTypeRules: IssueTypeRule[];
  defaultIssueType: string;
};

export type UserConfig = {
  mapping: Record<string, string>;
  defaultAssignee: string | null;
};

export type QueueConfig = {
  batchSize: number;
  maxPriority: number;
  workers: number;
  maxRetries: number;
  intervalSeconds: number;
};

export type AppConfig = {
  sourcePath: string | null;
  gitlab: GitLabConfig;
  database: DatabaseConfig;
  labels: LabelConfig;
  users: UserConfig;
  queue: QueueConfig;
  monitor: { intervalSeconds: number };
  reconcile: { requireDescription: boolean };
  upload: { categoryKeyword: string | null };
};

export type LoadConfigOptions = {
  configPath?: string | null;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

function resolveConfigPath(options: LoadConfigOptions): { filePath: string; explicit: boolean } {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.configPath?.trim()) {
    return { filePath: path.resolve(cwd, options.configPath.trim()), explicit: true };
  }

  const fromEnv = env[CONFIG_ENV_KEY]?.trim();
  if (fromEnv) {
    return { filePath: path.resolve(cwd, fromEnv), explicit: true };
  }

  return { filePath: path.resolve(cwd, DEFAULT_CONFIG_FILE), explicit: false };
}

async function readConfigSource(filePath: string, explicit: boolean): Promise<unknown> {
  try {
    const raw = await readFile(filePath, "utf8");
    return parse(raw) ?? {};
  } catch (error) {
    if (!explicit && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = envString(env, key);
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed)) {
    throw new Error(`config: ${key} must be an integer (got '${value}').`);
  }
  return parsed;
}

export function toAppConfig(file: ConfigFile, env: NodeJS.ProcessEnv = {}, sourcePath: string | null = null): AppConfig {
  return {
    sourcePath,
    gitlab: {
      url: (envString(env, "GITLAB_URL") ?? file.gitlab.url).replace(/\/+$/, ""),
      token: envString(env, "GITLAB_PRIVATE_TOKEN") ?? file.gitlab.token,
      projectId: envInt(env, "GITLAB_PROJECT_ID") ?? file.gitlab.project_id,
      projectPath: envString(env, "GITLAB_PROJECT_PATH") ?? file.gitlab.project_path,
      timeoutMs: file.gitlab.timeout_ms,
    },
    database: {
      host: envString(env, "ISSUE_DB_HOST") ?? file.database.host,
      port: envInt(env, "ISSUE_DB_PORT") ?? file.database.port,
      user: envString(env, "ISSUE_DB_USER") ?? file.database.user,
      password: envString(env, "ISSUE_DB_PASSWORD") ?? file.database.password,
      name: envString(env, "ISSUE_DB_NAME") ?? file.database.name,
      connectionLimit: file.database.connection_limit,
      queryTimeoutMs: file.database.query_timeout_ms,
    },
    labels: {
      severityMapping: file.labels.severity_mapping,
      defaultSeverityLabels: file.labels.default_severity_labels,
      progressMapping: file.labels.progress_mapping,
      additionalLabels: file.labels.additional_labels,
      issueTypeRules: file.labels.issue_type_rules,
      defaultIssueType: file.labels.default_issue_type,
    },
    users: {
      mapping: file.users.mapping,
      defaultAssignee: file.users.default_assignee,
    },
    queue: {
      batchSize: file.queue.batch_size,
      maxPriority: file.queue.max_priority,
      workers: file.queue.workers,
      maxRetries: file.queue.max_retries,
      intervalSeconds: file.queue.interval_seconds,
    },
    monitor: { intervalSeconds: file.monitor.interval_seconds },
    reconcile: { requireDescription: file.reconcile.require_description },
    upload: { categoryKeyword: file.upload.category_keyword },
  };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const { filePath, explicit } = resolveConfigPath(options);
  const source = await readConfigSource(filePath, explicit);

  const parsed = ConfigFileSchema.safeParse(source ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`config: invalid ${path.basename(filePath)}\n${issues.join("\n")}`);
  }

  return toAppConfig(parsed.data, env, source === null ? null : filePath);
}

export function missingGitLabSettings(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.gitlab.url) missing.push("gitlab.url");
  if (!config.gitlab.token) missing.push("gitlab.token");
  if (!config.gitlab.projectId) missing.push("gitlab.project_id");
  return missing;
}

export function maskSecret(value: string): string {
  if (!value) return "(unset)";
  if (value.length <= 4) return "****";
  return `${value.slice(0, 2)}****${value.slice(-2)}`;
}
