import type { ChangeStats, CommitRecord } from "@git-red/core";
import type { VersionControlClient } from "../application/version-control-client.js";
import {
  AuthorRetrievalError,
  HistoryRetrievalError,
  StatParseError,
  StatRetrievalError,
} from "../domain/errors.js";
import { AUTHOR_NAME_FORMAT, COMMIT_LIST_FORMAT } from "../domain/git-log-format.js";
import { parseChangeSummary } from "../parsing/change-summary-parser.js";
import { parseCommitList } from "../parsing/git-log-parser.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const describeFailure = (error: GitCommandError): string =>
  error.message.replace(/\s*\n\s*/g, " ").trim();

export class GitCliVersionControlClient implements VersionControlClient {
  constructor(
    private readonly gitClient: GitCommandClient,
    private readonly repositoryPath: string,
  ) {}

  listCommitsSince(sinceDate: string): readonly CommitRecord[] {
    let output: string;
    try {
      output = this.gitClient.run(this.repositoryPath, [
        "log",
        `--since=${sinceDate}`,
        `--pretty=format:${COMMIT_LIST_FORMAT}`,
      ]);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new HistoryRetrievalError(sinceDate, describeFailure(error), { cause: error });
      }

      throw error;
    }

    return parseCommitList(output);
  }

  getChangeSummary(commitHash: string): ChangeStats {
    let output: string;
    try {
      output = this.gitClient.run(this.repositoryPath, ["show", "--stat", "--format=", commitHash]);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new StatRetrievalError(commitHash, describeFailure(error), { cause: error });
      }

      throw error;
    }

    const parsed = parseChangeSummary(output);
    if (!parsed.ok) {
      throw new StatParseError(commitHash, parsed.malformedLine);
    }

    return parsed.stats;
  }

  getAuthor(commitHash: string): string {
    try {
      return this.gitClient
        .run(this.repositoryPath, ["log", "-1", `--pretty=format:${AUTHOR_NAME_FORMAT}`, commitHash])
        .trim();
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new AuthorRetrievalError(commitHash, describeFailure(error), { cause: error });
      }

      throw error;
    }
  }
}
