import type { CommitRecord } from "@git-red/core";
import { COMMIT_FIELD_SEPARATOR } from "../domain/git-log-format.js";

const parseCommitLine = (line: string): CommitRecord | null => {
  const separatorIndex = line.indexOf(COMMIT_FIELD_SEPARATOR);
  if (separatorIndex === -1) {
    return null;
  }

  const hash = line.slice(0, separatorIndex).trim();
  if (hash.length === 0) {
    return null;
  }

  return {
    hash,
    subject: line.slice(separatorIndex + COMMIT_FIELD_SEPARATOR.length),
  };
};

// Keeps git's own ordering (newest first).
export const parseCommitList = (rawLog: string): readonly CommitRecord[] => {
  const commits: CommitRecord[] = [];

  for (const line of rawLog.split("\n")) {
    const parsed = parseCommitLine(line.replace(/\r$/, ""));
    if (parsed !== null) {
      commits.push(parsed);
    }
  }

  return commits;
};
