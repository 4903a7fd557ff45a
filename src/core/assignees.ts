import type { UserConfig } from "./config";

export const RESPONSIBLE_PERSON_SEPARATORS = ["/", "、", ",", "，", ";", "；"] as const;

export type UsernameMatch = {
  name: string;
  username: string;
  via: "exact" | "contains" | "surname";
};

/** Splits on the first separator present; later separators are not considered. */
export function splitResponsiblePersons(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];

  const separator = RESPONSIBLE_PERSON_SEPARATORS.find((candidate) => trimmed.includes(candidate));
  const parts = separator ? trimmed.split(separator) : [trimmed];
  return parts.map((part) => part.trim()).filter(Boolean);
}

/**
 * Heuristic name → username lookup, tried in order:
 * 1. exact key in the mapping;
 * 2. case-insensitive containment in either direction ("张三丰" matches key "张三");
 * 3. a mapped name ending with the same last character as `name`.
 * Step 3 is deliberately loose and can pick the wrong person when two mapped
 * names share that character; the first mapping entry wins.
 */
export function resolveUsername(name: string, mapping: Record<string, string>): UsernameMatch | null {
  const trimmed = name.trim();
  if (!trimmed) return null;

  const exact = mapping[trimmed];
  if (exact) return { name: trimmed, username: exact, via: "exact" };

  const lowered = trimmed.toLowerCase();
  for (const [mappedName, username] of Object.entries(mapping)) {
    const mappedLower = mappedName.toLowerCase();
    if (mappedLower.includes(lowered) || lowered.includes(mappedLower)) {
      return { name: trimmed, username, via: "contains" };
    }
  }

  if (trimmed.length >= 2) {
    const lastChar = trimmed.slice(-1);
    for (const [mappedName, username] of Object.entries(mapping)) {
      if (mappedName.endsWith(lastChar)) {
        return { name: trimmed, username, via: "surname" };
      }
    }
  }

  return null;
}

export type AssigneeResolution = {
  usernames: string[];
  matches: UsernameMatch[];
  unresolved: string[];
  usedDefault: boolean;
};

export function resolveAssigneeUsernames(text: string, users: UserConfig): AssigneeResolution {
  const matches: UsernameMatch[] = [];
  const unresolved: string[] = [];

  for (const name of splitResponsiblePersons(text)) {
    const match = resolveUsername(name, users.mapping);
    if (match) {
      matches.push(match);
    } else {
      unresolved.push(name);
    }
  }

  const usernames = Array.from(new Set(matches.map((match) => match.username)));
  if (!usernames.length && users.defaultAssignee) {
    return { usernames: [users.defaultAssignee], matches, unresolved, usedDefault: true };
  }

  return { usernames, matches, unresolved, usedDefault: false };
}
