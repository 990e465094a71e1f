import type {
  ChangeStats,
  CommitRecord,
  RedCommitMatch,
  RedCommitScanSummary,
  Thresholds,
} from "@git-red/core";
import {
  AuthorRetrievalError,
  HistoryRetrievalError,
  StatParseError,
  StatRetrievalError,
} from "../domain/errors.js";
import {
  classifyChangeStats,
  computePercentDeleted,
  isMergeCommit,
  type RedCommitVerdict,
} from "../domain/red-commit-rules.js";
import type { VersionControlClient } from "./version-control-client.js";

export type FindRedCommitsInput = {
  repositoryPath: string;
  thresholds: Thresholds;
};

export type RedCommitScanEvent =
  | { stage: "history_loaded"; commits: number }
  | { stage: "history_failed"; error: HistoryRetrievalError }
  | { stage: "merge_commit_skipped"; commit: CommitRecord }
  | { stage: "stats_failed"; commit: CommitRecord; error: StatRetrievalError | StatParseError }
  | {
      stage: "commit_evaluated";
      commit: CommitRecord;
      stats: ChangeStats;
      percentDeleted: number;
      verdict: RedCommitVerdict;
    }
  | { stage: "author_failed"; commit: CommitRecord; error: AuthorRetrievalError }
  | { stage: "red_commit_found"; match: RedCommitMatch }
  | { stage: "scan_completed"; candidates: number; matches: number };

const EMPTY_STATS: ChangeStats = { added: 0, deleted: 0 };

const loadCandidates = (
  client: VersionControlClient,
  sinceDate: string,
  onEvent?: (event: RedCommitScanEvent) => void,
): readonly CommitRecord[] => {
  try {
    const commits = client.listCommitsSince(sinceDate);
    onEvent?.({ stage: "history_loaded", commits: commits.length });
    return commits;
  } catch (error) {
    if (error instanceof HistoryRetrievalError) {
      onEvent?.({ stage: "history_failed", error });
      return [];
    }

    throw error;
  }
};

const loadStats = (
  client: VersionControlClient,
  commit: CommitRecord,
  onEvent?: (event: RedCommitScanEvent) => void,
): ChangeStats => {
  try {
    return client.getChangeSummary(commit.hash);
  } catch (error) {
    if (error instanceof StatRetrievalError || error instanceof StatParseError) {
      onEvent?.({ stage: "stats_failed", commit, error });
      return EMPTY_STATS;
    }

    throw error;
  }
};

const loadAuthor = (
  client: VersionControlClient,
  commit: CommitRecord,
  onEvent?: (event: RedCommitScanEvent) => void,
): string => {
  try {
    return client.getAuthor(commit.hash);
  } catch (error) {
    if (error instanceof AuthorRetrievalError) {
      onEvent?.({ stage: "author_failed", commit, error });
      return "";
    }

    throw error;
  }
};

/**
 * Walks the commits since `thresholds.sinceDate` newest first and reports
 * the ones dominated by deletions.
 *
 * Merge branch commits are skipped before their stats are fetched. Every git
 * failure is reported through `onEvent` and degrades to empty history, zero
 * stats or an empty author, so a scan always completes. Matches are emitted
 * as `red_commit_found` events in input order as soon as they are known.
 */
export const findRedCommits = (
  input: FindRedCommitsInput,
  client: VersionControlClient,
  onEvent?: (event: RedCommitScanEvent) => void,
): RedCommitScanSummary => {
  const { thresholds } = input;
  const candidates = loadCandidates(client, thresholds.sinceDate, onEvent);
  const matches: RedCommitMatch[] = [];
  let mergeCommitsSkipped = 0;

  for (const commit of candidates) {
    if (isMergeCommit(commit)) {
      mergeCommitsSkipped += 1;
      onEvent?.({ stage: "merge_commit_skipped", commit });
      continue;
    }

    const stats = loadStats(client, commit, onEvent);
    const percentDeleted = computePercentDeleted(stats);
    const verdict = classifyChangeStats(stats, thresholds);
    onEvent?.({ stage: "commit_evaluated", commit, stats, percentDeleted, verdict });
    if (verdict !== "red") {
      continue;
    }

    const match: RedCommitMatch = {
      commit,
      stats,
      percentDeleted,
      author: loadAuthor(client, commit, onEvent),
    };
    matches.push(match);
    onEvent?.({ stage: "red_commit_found", match });
  }

  onEvent?.({ stage: "scan_completed", candidates: candidates.length, matches: matches.length });
  return {
    repositoryPath: input.repositoryPath,
    thresholds,
    candidateCount: candidates.length,
    mergeCommitsSkipped,
    matches,
  };
};
