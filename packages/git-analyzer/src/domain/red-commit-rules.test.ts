import { describe, expect, it } from "vitest";
import {
  classifyChangeStats,
  computePercentDeleted,
  isMergeCommit,
} from "./red-commit-rules.js";

const defaults = { minLines: 10, minPercent: 95 };

describe("computePercentDeleted", () => {
  it("returns zero when nothing changed", () => {
    expect(computePercentDeleted({ added: 0, deleted: 0 })).toBe(0);
  });

  it("returns the deleted share of all changed lines", () => {
    expect(computePercentDeleted({ added: 2, deleted: 98 })).toBe(98);
    expect(computePercentDeleted({ added: 0, deleted: 12 })).toBe(100);
  });
});

describe("classifyChangeStats", () => {
  it("flags deletion-dominated commits", () => {
    expect(classifyChangeStats({ added: 2, deleted: 98 }, defaults)).toBe("red");
  });

  it("rejects balanced commits on percentage", () => {
    expect(classifyChangeStats({ added: 50, deleted: 45 }, defaults)).toBe("below_min_percent");
  });

  it("rejects small commits before looking at percentage", () => {
    expect(classifyChangeStats({ added: 0, deleted: 5 }, defaults)).toBe("below_min_lines");
  });

  it("treats both thresholds as inclusive", () => {
    expect(classifyChangeStats({ added: 0, deleted: 10 }, defaults)).toBe("red");
    expect(classifyChangeStats({ added: 1, deleted: 19 }, defaults)).toBe("red");
  });

  it("accepts empty commits only when both thresholds are zero", () => {
    expect(classifyChangeStats({ added: 0, deleted: 0 }, { minLines: 0, minPercent: 0 })).toBe("red");
    expect(classifyChangeStats({ added: 0, deleted: 0 }, { minLines: 0, minPercent: 1 })).toBe(
      "below_min_percent",
    );
  });
});

describe("isMergeCommit", () => {
  it("matches subjects starting with the merge prefix", () => {
    expect(isMergeCommit({ hash: "a", subject: "Merge branch 'main' into feature" })).toBe(true);
  });

  it("ignores other merge wordings and mid-subject mentions", () => {
    expect(isMergeCommit({ hash: "a", subject: "Merge pull request #12 from x/y" })).toBe(false);
    expect(isMergeCommit({ hash: "a", subject: "Revert \"Merge branch 'x'\"" })).toBe(false);
  });
});
