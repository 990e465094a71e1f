import type { RedCommitMatch } from "@git-red/core";
import { describe, expect, it } from "vitest";
import {
  formatRedCommitJson,
  formatRedCommitLine,
  formatSearchBanner,
  roundHalfToEven,
} from "./format-red-commit-output.js";

const match = (added: number, deleted: number, percentDeleted: number, author = "Ada Lovelace"): RedCommitMatch => ({
  commit: { hash: "0123456789abcdef0123456789abcdef01234567", subject: "Remove importer" },
  stats: { added, deleted },
  percentDeleted,
  author,
});

describe("formatRedCommitLine", () => {
  it("aligns counts and percentage in fixed-width columns", () => {
    expect(formatRedCommitLine(match(2, 98, 98))).toBe("01234567 |    +2,    -98 |  98% | Ada Lovelace");
  });

  it("pads the documented widths", () => {
    expect(formatRedCommitLine(match(42, 7, 14.285714285714285))).toBe(
      "01234567 |   +42,     -7 |  14% | Ada Lovelace",
    );
  });

  it("lets wide values overflow their columns", () => {
    expect(formatRedCommitLine(match(123456, 1234567, 100))).toBe(
      "01234567 | +123456, -1234567 | 100% | Ada Lovelace",
    );
  });

  it("leaves an empty author unpadded", () => {
    expect(formatRedCommitLine(match(0, 0, 0, ""))).toBe("01234567 |    +0,     -0 |   0% | ");
  });
});

describe("roundHalfToEven", () => {
  it("rounds to the nearest integer", () => {
    expect(roundHalfToEven(97.4)).toBe(97);
    expect(roundHalfToEven(97.6)).toBe(98);
  });

  it("sends exact halves to the even neighbour", () => {
    expect(roundHalfToEven(96.5)).toBe(96);
    expect(roundHalfToEven(97.5)).toBe(98);
  });
});

describe("formatSearchBanner", () => {
  it("names the start date", () => {
    expect(formatSearchBanner("2026-09-18")).toBe("Searching for commits since 2026-09-18...");
  });
});

describe("formatRedCommitJson", () => {
  it("serializes matches with short hashes and rounded percentages", () => {
    const output = formatRedCommitJson({
      repositoryPath: "/repo",
      thresholds: { sinceDate: "2026-09-18", minLines: 10, minPercent: 95 },
      candidateCount: 4,
      mergeCommitsSkipped: 1,
      matches: [match(1, 39, 97.5)],
    });

    expect(JSON.parse(output)).toEqual({
      repositoryPath: "/repo",
      thresholds: { sinceDate: "2026-09-18", minLines: 10, minPercent: 95 },
      candidateCount: 4,
      mergeCommitsSkipped: 1,
      matches: [
        {
          hash: "0123456789abcdef0123456789abcdef01234567",
          shortHash: "01234567",
          subject: "Remove importer",
          added: 1,
          deleted: 39,
          percentDeleted: 98,
          author: "Ada Lovelace",
        },
      ],
    });
  });
});
