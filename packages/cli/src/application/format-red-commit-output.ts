import { shortenHash, type RedCommitMatch, type RedCommitScanSummary } from "@git-red/core";

export type RedCommitOutputMode = "text" | "json";

// Exact halves go to the even neighbour.
export const roundHalfToEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }

  if (fraction < 0.5) {
    return floor;
  }

  return floor % 2 === 0 ? floor : floor + 1;
};

export const formatSearchBanner = (sinceDate: string): string =>
  `Searching for commits since ${sinceDate}...`;

export const formatRedCommitLine = (match: RedCommitMatch): string => {
  const added = `+${match.stats.added}`.padStart(5);
  const deleted = `-${match.stats.deleted}`.padStart(6);
  const percent = String(roundHalfToEven(match.percentDeleted)).padStart(3);
  return `${shortenHash(match.commit.hash)} | ${added}, ${deleted} | ${percent}% | ${match.author}`;
};

type JsonShape = {
  repositoryPath: string;
  thresholds: RedCommitScanSummary["thresholds"];
  candidateCount: number;
  mergeCommitsSkipped: number;
  matches: ReadonlyArray<{
    hash: string;
    shortHash: string;
    subject: string;
    added: number;
    deleted: number;
    percentDeleted: number;
    author: string;
  }>;
};

const createJsonShape = (summary: RedCommitScanSummary): JsonShape => ({
  repositoryPath: summary.repositoryPath,
  thresholds: summary.thresholds,
  candidateCount: summary.candidateCount,
  mergeCommitsSkipped: summary.mergeCommitsSkipped,
  matches: summary.matches.map((match) => ({
    hash: match.commit.hash,
    shortHash: shortenHash(match.commit.hash),
    subject: match.commit.subject,
    added: match.stats.added,
    deleted: match.stats.deleted,
    percentDeleted: roundHalfToEven(match.percentDeleted),
    author: match.author,
  })),
});

export const formatRedCommitJson = (summary: RedCommitScanSummary): string =>
  JSON.stringify(createJsonShape(summary), null, 2);
