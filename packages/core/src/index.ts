import { resolve } from "node:path";

export type CommitRecord = {
  hash: string;
  subject: string;
};

export type ChangeStats = {
  added: number;
  deleted: number;
};

export type Thresholds = {
  sinceDate: string;
  minLines: number;
  minPercent: number;
};

export type RedCommitMatch = {
  commit: CommitRecord;
  stats: ChangeStats;
  percentDeleted: number;
  author: string;
};

export type RedCommitScanSummary = {
  repositoryPath: string;
  thresholds: Thresholds;
  candidateCount: number;
  mergeCommitsSkipped: number;
  matches: readonly RedCommitMatch[];
};

export const SHORT_HASH_LENGTH = 8;

export const shortenHash = (hash: string): string => hash.slice(0, SHORT_HASH_LENGTH);

export type TargetPath = {
  inputPath: string | undefined;
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  inputPath,
  absolutePath: resolve(cwd, inputPath ?? "."),
});
