import { shortenHash } from "@git-red/core";

export type VersionControlOperation =
  | "list_commits"
  | "read_change_summary"
  | "parse_change_summary"
  | "read_author";

export class VersionControlError extends Error {
  readonly operation: VersionControlOperation;
  readonly commitHash: string | null;

  constructor(
    operation: VersionControlOperation,
    message: string,
    commitHash: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "VersionControlError";
    this.operation = operation;
    this.commitHash = commitHash;
  }
}

export class HistoryRetrievalError extends VersionControlError {
  readonly sinceDate: string;

  constructor(sinceDate: string, detail: string, options?: { cause?: unknown }) {
    super("list_commits", `failed to list commits since ${sinceDate}: ${detail}`, null, options);
    this.name = "HistoryRetrievalError";
    this.sinceDate = sinceDate;
  }
}

export class StatRetrievalError extends VersionControlError {
  constructor(commitHash: string, detail: string, options?: { cause?: unknown }) {
    super(
      "read_change_summary",
      `failed to read change summary for commit ${shortenHash(commitHash)}: ${detail}`,
      commitHash,
      options,
    );
    this.name = "StatRetrievalError";
  }
}

export class StatParseError extends VersionControlError {
  readonly malformedLine: string;

  constructor(commitHash: string, malformedLine: string) {
    super(
      "parse_change_summary",
      `failed to parse change summary for commit ${shortenHash(commitHash)}: unreadable line "${malformedLine.trim()}"`,
      commitHash,
    );
    this.name = "StatParseError";
    this.malformedLine = malformedLine;
  }
}

export class AuthorRetrievalError extends VersionControlError {
  constructor(commitHash: string, detail: string, options?: { cause?: unknown }) {
    super(
      "read_author",
      `failed to read author for commit ${shortenHash(commitHash)}: ${detail}`,
      commitHash,
      options,
    );
    this.name = "AuthorRetrievalError";
  }
}
