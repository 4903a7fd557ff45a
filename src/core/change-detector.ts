import { createHash } from "node:crypto";
import type { IssueRecord, TaskAction } from "./records";
import { planTaskAction } from "./reconcile";

type HashedFields = Pick<
  IssueRecord,
  "projectName" | "problemDescription" | "status" | "responsiblePerson" | "severityLevel" | "problemCategory"
>;

export function computeRecordHash(record: HashedFields): string {
  const raw = JSON.stringify({
    problem_category: record.problemCategory,
    problem_description: record.problemDescription,
    project_name: record.projectName,
    responsible_person: record.responsiblePerson,
    severity_level: String(record.severityLevel),
    status: record.status,
  });
  return createHash("md5").update(raw).digest("hex");
}

/** The remote action a locally changed record calls for, or null when none applies. */
export function planChangeAction(record: Pick<IssueRecord, "status" | "remoteUrl">): TaskAction | null {
  return planTaskAction("UPDATE_STATUS", record.status, record.remoteUrl);
}

export class ChangeDetector {
  private readonly hashes = new Map<number, string>();

  /** First sighting of a record always counts as a change. */
  hasChanged(record: HashedFields & Pick<IssueRecord, "id">): boolean {
    const hash = computeRecordHash(record);
    const previous = this.hashes.get(record.id);
    this.hashes.set(record.id, hash);
    return previous !== hash;
  }

  forget(recordId: number): void {
    this.hashes.delete(recordId);
  }

  get size(): number {
    return this.hashes.size;
  }
}
