const ISSUE_PATH_PATTERN = /\/-\/issues\/(\d+)\/?(?:[?#].*)?$/;

export function parseIssueIid(url: string | null | undefined): number | null {
  const trimmed = url?.trim() ?? "";
  if (!trimmed || trimmed.toUpperCase() === "NULL") return null;

  const match = ISSUE_PATH_PATTERN.exec(trimmed);
  if (!match?.[1]) return null;

  const iid = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(iid) && iid > 0 ? iid : null;
}

export function buildIssueUrl(baseUrl: string, projectPath: string, iid: number): string {
  const base = baseUrl.trim().replace(/\/+$/, "");
  const project = projectPath.trim().replace(/^\/+|\/+$/g, "");
  if (!base || !project) {
    throw new Error("issue url: base url and project path are required.");
  }
  if (!Number.isSafeInteger(iid) || iid <= 0) {
    throw new Error(`issue url: iid must be a positive integer (got ${iid}).`);
  }
  return `${base}/${project}/-/issues/${iid}`;
}

export function hasRemoteLink(url: string | null | undefined): url is string {
  const trimmed = url?.trim() ?? "";
  return trimmed !== "" && trimmed.toUpperCase() !== "NULL";
}
