import { z } from "zod";
import { ValidationError, errorMessage } from "./errors";
import { createLogger, type Logger } from "./logger";
import { parseLooseInt } from "./records";
import type { IncomingIssue, Reconciler } from "./reconcile";
import type { RemoteSync } from "./remote-sync";

const MAX_ERROR_SAMPLES = 10;
const MAX_SKIPPED_SAMPLES = 5;

const CANONICAL_FIELDS = {
  serial_number: true,
  project_name: true,
  problem_category: true,
  severity_level: true,
  problem_description: true,
  solution: true,
  action_priority: true,
  action_record: true,
  initiator: true,
  responsible_person: true,
  status: true,
  start_time: true,
  target_completion_time: true,
  actual_completion_time: true,
  remarks: true,
} as const;

type CanonicalField = keyof typeof CANONICAL_FIELDS;

/** Spreadsheet header → column name. */
export const SHEET_FIELD_MAP: Record<string, CanonicalField> = {
  序号: "serial_number",
  项目名称: "project_name",
  问题分类: "problem_category",
  严重程度: "severity_level",
  "问题/需求描述": "problem_description",
  解决方案: "solution",
  行动优先级: "action_priority",
  行动记录: "action_record",
  发起人: "initiator",
  责任人: "responsible_person",
  状态: "status",
  开始时间: "start_time",
  目标完成时间: "target_completion_time",
  实完时间: "actual_completion_time",
  备注: "remarks",
};

const EMPTY_MARKERS = new Set(["nan", "none", "null"]);

export const UploadPayloadSchema = z.object({
  table_data: z.array(z.record(z.string(), z.unknown())),
  client_info: z.record(z.string(), z.unknown()).optional(),
});

export type UploadPayload = z.infer<typeof UploadPayloadSchema>;

export type SkippedRecord = {
  row: number;
  projectName: string;
  reason: string;
};

export type UploadSummary = {
  total: number;
  inserted: number;
  updated: number;
  skipped: number;
  failed: number;
  tasksEnqueued: number;
  remoteApplied: number;
  errors: string[];
  skippedRecords: SkippedRecord[];
};

export type UploadOptions = {
  immediate?: boolean;
  categoryKeyword?: string | null;
};

export type UploadDeps = {
  reconciler: Reconciler;
  remoteSync?: RemoteSync;
  logger?: Logger;
};

export function cleanCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  if (typeof value !== "string" && typeof value !== "boolean") return "";
  const text = String(value).trim();
  return EMPTY_MARKERS.has(text.toLowerCase()) ? "" : text;
}

function isCanonicalField(key: string): key is CanonicalField {
  return Object.prototype.hasOwnProperty.call(CANONICAL_FIELDS, key);
}

function fieldFor(key: string): CanonicalField | undefined {
  if (Object.prototype.hasOwnProperty.call(SHEET_FIELD_MAP, key)) return SHEET_FIELD_MAP[key];
  return isCanonicalField(key) ? key : undefined;
}

export function normalizeRow(row: Record<string, unknown>): Partial<Record<CanonicalField, string>> {
  const normalized: Partial<Record<CanonicalField, string>> = {};
  for (const [rawKey, value] of Object.entries(row)) {
    const key = rawKey.trim();
    const field = fieldFor(key);
    if (!field) continue;
    const cell = cleanCell(value);
    // A later empty duplicate column must not erase an earlier value.
    if (cell || normalized[field] === undefined) {
      normalized[field] = cell;
    }
  }
  return normalized;
}

export function toIncomingIssue(row: Record<string, unknown>): IncomingIssue {
  const fields = normalizeRow(row);
  const text = (field: CanonicalField): string => fields[field] ?? "";
  const optional = (field: CanonicalField): string | null => fields[field] || null;

  return {
    serialNumber: text("serial_number"),
    projectName: text("project_name"),
    problemCategory: text("problem_category"),
    severityLevel: parseLooseInt(text("severity_level")),
    problemDescription: text("problem_description"),
    solution: text("solution"),
    actionPriority: parseLooseInt(text("action_priority")),
    actionRecord: text("action_record"),
    initiator: text("initiator"),
    responsiblePerson: text("responsible_person"),
    status: text("status") || "open",
    startTime: optional("start_time"),
    targetCompletionTime: optional("target_completion_time"),
    actualCompletionTime: optional("actual_completion_time"),
    remarks: text("remarks"),
  };
}

export function parseUploadPayload(raw: unknown): UploadPayload {
  const parsed = UploadPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ValidationError(`upload: invalid payload\n${detail.join("\n")}`, ["table_data"]);
  }
  return parsed.data;
}

export async function runUpload(
  payload: UploadPayload,
  deps: UploadDeps,
  options: UploadOptions = {},
): Promise<UploadSummary> {
  const logger = deps.logger ?? createLogger("upload");
  const immediate = Boolean(options.immediate && deps.remoteSync);
  const keyword = options.categoryKeyword?.trim() ?? "";

  if (options.immediate && !deps.remoteSync) {
    logger.warn("immediate mode requested without a remote tracker; queueing instead");
  }

  const summary: UploadSummary = {
    total: payload.table_data.length,
    inserted: 0,
    updated: 0,
    skipped: 0,
    failed: 0,
    tasksEnqueued: 0,
    remoteApplied: 0,
    errors: [],
    skippedRecords: [],
  };

  const skip = (row: number, projectName: string, reason: string): void => {
    summary.skipped += 1;
    if (summary.skippedRecords.length < MAX_SKIPPED_SAMPLES) {
      summary.skippedRecords.push({ row, projectName, reason });
    }
  };

  const note = (row: number, message: string): void => {
    if (summary.errors.length < MAX_ERROR_SAMPLES) {
      summary.errors.push(`row ${row}: ${message}`);
    }
  };

  const fail = (row: number, message: string): void => {
    summary.failed += 1;
    note(row, message);
  };

  for (const [index, raw] of payload.table_data.entries()) {
    const rowNumber = index + 1;
    const issue = toIncomingIssue(raw);

    if (keyword && !issue.problemCategory.includes(keyword)) {
      skip(rowNumber, issue.projectName, `category '${issue.problemCategory}' filtered`);
      continue;
    }

    try {
      const result = await deps.reconciler.reconcile(issue, { enqueue: !immediate, source: "upload" });
      if (result.action === "NOOP") {
        skip(rowNumber, issue.projectName, `duplicate of #${result.recordId}`);
        continue;
      }
      if (result.action === "INSERT") summary.inserted += 1;
      if (result.action === "UPDATE_STATUS") summary.updated += 1;
      if (result.task) summary.tasksEnqueued += 1;

      if (immediate && deps.remoteSync && result.plannedAction) {
        try {
          const outcome = await deps.remoteSync.run(result.plannedAction, result.recordId);
          if (outcome.status === "applied") summary.remoteApplied += 1;
        } catch (error) {
          logger.warn(`row ${rowNumber}: immediate ${result.plannedAction} failed, queueing: ${errorMessage(error)}`);
          // The row itself is stored; a lost fallback is reported without counting the row twice.
          try {
            await deps.reconciler.enqueue(result.recordId, result.plannedAction, "upload-fallback");
            summary.tasksEnqueued += 1;
          } catch (enqueueError) {
            note(
              rowNumber,
              `immediate ${result.plannedAction} failed (${errorMessage(error)}) and could not be queued: ${errorMessage(enqueueError)}`,
            );
          }
        }
      }
    } catch (error) {
      fail(rowNumber, errorMessage(error));
    }
  }

  logger.log(
    `total=${summary.total} inserted=${summary.inserted} updated=${summary.updated} ` +
      `skipped=${summary.skipped} failed=${summary.failed} queued=${summary.tasksEnqueued}`,
  );
  return summary;
}
