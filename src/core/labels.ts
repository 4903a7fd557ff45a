import type { IssueTypeRule, LabelConfig } from "./config";
import { DEFAULT_ISSUE_TYPE } from "./config";
import { PROGRESS_LABEL_PREFIX, type IssueRecord } from "./records";

export const DEFAULT_PROGRESS_LABEL = `${PROGRESS_LABEL_PREFIX}To do`;

export type RemoteIssueState = "opened" | "closed";

export function isProgressLabel(label: string): boolean {
  return label.startsWith(PROGRESS_LABEL_PREFIX);
}

export function severityToLabels(
  level: number,
  mapping: Record<string, string[]>,
  fallback: readonly string[] = ["客户需求", "一般"],
): string[] {
  const labels = mapping[String(level)];
  return labels ? [...labels] : [...fallback];
}

export function statusToProgressLabel(status: string, mapping: Record<string, string>): string {
  return mapping[status] ?? DEFAULT_PROGRESS_LABEL;
}

export function classifyIssueType(
  description: string,
  rules: readonly IssueTypeRule[],
  fallback: string = DEFAULT_ISSUE_TYPE,
): string {
  const text = description.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
      return rule.label;
    }
  }
  return fallback;
}

/**
 * Closed issues carry no progress stage, so a closed issue without a progress
 * label yields "" rather than the open default.
 */
export function extractProgressFromLabels(labels: readonly string[], state: RemoteIssueState = "opened"): string {
  const progress = labels.find(isProgressLabel);
  if (progress) return progress;
  return state === "closed" ? "" : DEFAULT_PROGRESS_LABEL;
}

export function stripProgressLabels(labels: readonly string[], extraRemovals: readonly string[] = []): string[] {
  const removals = new Set(extraRemovals);
  return labels.filter((label) => !isProgressLabel(label) && !removals.has(label));
}

export function replaceProgressLabel(labels: readonly string[], progressLabel: string): string[] {
  return [...stripProgressLabels(labels), progressLabel];
}

function uniqueInOrder(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (!value || seen.has(value)) continue;
    seen.add(value);
    result.push(value);
  }
  return result;
}

export function buildIssueLabels(
  record: Pick<IssueRecord, "severityLevel" | "status" | "problemDescription">,
  config: LabelConfig,
): string[] {
  return uniqueInOrder([
    ...severityToLabels(record.severityLevel, config.severityMapping, config.defaultSeverityLabels),
    statusToProgressLabel(record.status, config.progressMapping),
    ...config.additionalLabels,
    classifyIssueType(record.problemDescription, config.issueTypeRules, config.defaultIssueType),
  ]);
}
