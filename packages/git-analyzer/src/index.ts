import type { VersionControlClient } from "./application/version-control-client.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliVersionControlClient } from "./infrastructure/git-version-control-client.js";

export { findRedCommits } from "./application/find-red-commits.js";
export type { FindRedCommitsInput, RedCommitScanEvent } from "./application/find-red-commits.js";
export type { VersionControlClient } from "./application/version-control-client.js";
export {
  AuthorRetrievalError,
  HistoryRetrievalError,
  StatParseError,
  StatRetrievalError,
  VersionControlError,
  type VersionControlOperation,
} from "./domain/errors.js";
export type { RedCommitVerdict } from "./domain/red-commit-rules.js";
export { GitCommandError, type GitCommandClient } from "./infrastructure/git-command-client.js";
export { GitCliVersionControlClient } from "./infrastructure/git-version-control-client.js";

export const createGitVersionControlClient = (repositoryPath: string): VersionControlClient =>
  new GitCliVersionControlClient(new ExecGitCommandClient(), repositoryPath);
