import type { ChangeStats, CommitRecord } from "@git-red/core";

/**
 * Read-only view of a repository's history.
 *
 * Implementations throw `HistoryRetrievalError`, `StatRetrievalError`,
 * `StatParseError` and `AuthorRetrievalError` respectively; `findRedCommits`
 * recovers from each of them.
 */
export interface VersionControlClient {
  listCommitsSince(sinceDate: string): readonly CommitRecord[];
  getChangeSummary(commitHash: string): ChangeStats;
  getAuthor(commitHash: string): string;
}
