import type { ChangeStats, CommitRecord, Thresholds } from "@git-red/core";

export const MERGE_SUBJECT_PREFIX = "Merge branch";

export type RedCommitVerdict = "red" | "below_min_lines" | "below_min_percent";

export const isMergeCommit = (commit: CommitRecord): boolean =>
  commit.subject.startsWith(MERGE_SUBJECT_PREFIX);

export const totalChangedLines = (stats: ChangeStats): number => stats.added + stats.deleted;

export const computePercentDeleted = (stats: ChangeStats): number => {
  const total = totalChangedLines(stats);
  if (total === 0) {
    return 0;
  }

  return (stats.deleted / total) * 100;
};

// Both bounds are inclusive.
export const classifyChangeStats = (
  stats: ChangeStats,
  thresholds: Pick<Thresholds, "minLines" | "minPercent">,
): RedCommitVerdict => {
  if (totalChangedLines(stats) < thresholds.minLines) {
    return "below_min_lines";
  }

  if (computePercentDeleted(stats) < thresholds.minPercent) {
    return "below_min_percent";
  }

  return "red";
};
