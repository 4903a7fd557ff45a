import { describe, expect, it } from "vitest";

import { resolveAssigneeUsernames, resolveUsername, splitResponsiblePersons } from "../src/core/assignees";

const mapping = { 张三: "zhangsan", 李四: "lisi", "Wang Wu": "wangwu" };

describe("assignee resolution", () => {
  it("splits on the first separator present and drops blanks", () => {
    expect(splitResponsiblePersons("张三/李四")).toEqual(["张三", "李四"]);
    expect(splitResponsiblePersons(" 张三 、 李四 、")).toEqual(["张三", "李四"]);
    expect(splitResponsiblePersons("张三，李四")).toEqual(["张三", "李四"]);
    expect(splitResponsiblePersons("张三/李四,王五")).toEqual(["张三", "李四,王五"]);
    expect(splitResponsiblePersons("  ")).toEqual([]);
    expect(splitResponsiblePersons("张三")).toEqual(["张三"]);
  });

  it("resolves exact, containment and surname matches in that order", () => {
    expect(resolveUsername("张三", mapping)).toEqual({ name: "张三", username: "zhangsan", via: "exact" });
    expect(resolveUsername("张三丰", mapping)).toEqual({ name: "张三丰", username: "zhangsan", via: "contains" });
    expect(resolveUsername("wang wu", mapping)).toEqual({ name: "wang wu", username: "wangwu", via: "contains" });
    expect(resolveUsername("赵四", mapping)).toEqual({ name: "赵四", username: "lisi", via: "surname" });
    expect(resolveUsername("钱七", mapping)).toBeNull();
    expect(resolveUsername("七", mapping)).toBeNull();
  });

  it("de-duplicates usernames and falls back to the default assignee", () => {
    expect(resolveAssigneeUsernames("张三/张三丰", { mapping, defaultAssignee: null })).toEqual({
      usernames: ["zhangsan"],
      matches: [
        { name: "张三", username: "zhangsan", via: "exact" },
        { name: "张三丰", username: "zhangsan", via: "contains" },
      ],
      unresolved: [],
      usedDefault: false,
    });

    const fallback = resolveAssigneeUsernames("钱七", { mapping, defaultAssignee: "triage" });
    expect(fallback.usernames).toEqual(["triage"]);
    expect(fallback.unresolved).toEqual(["钱七"]);
    expect(fallback.usedDefault).toBe(true);

    expect(resolveAssigneeUsernames("", { mapping, defaultAssignee: null }).usernames).toEqual([]);
  });
});
