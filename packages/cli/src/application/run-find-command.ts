import { resolveTargetPath, shortenHash, type RedCommitScanSummary } from "@git-red/core";
import {
  createGitVersionControlClient,
  findRedCommits,
  type RedCommitScanEvent,
  type VersionControlClient,
} from "@git-red/git-analyzer";
import {
  formatRedCommitJson,
  formatRedCommitLine,
  formatSearchBanner,
  type RedCommitOutputMode,
} from "./format-red-commit-output.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { resolveThresholds, type ThresholdOverrides } from "./resolve-thresholds.js";

export type FindCommandOptions = ThresholdOverrides & {
  output: RedCommitOutputMode;
};

export type FindCommandEnvironment = {
  cwd: string;
  now: () => Date;
  writeLine: (line: string) => void;
  createClient: (repositoryPath: string) => VersionControlClient;
};

export const createProcessEnvironment = (): FindCommandEnvironment => ({
  cwd: process.env["INIT_CWD"] ?? process.cwd(),
  now: () => new Date(),
  writeLine: (line) => {
    process.stdout.write(`${line}\n`);
  },
  createClient: createGitVersionControlClient,
});

const createScanReporter = (
  logger: Logger,
  output: RedCommitOutputMode,
  writeLine: (line: string) => void,
): ((event: RedCommitScanEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "history_loaded":
        logger.debug(`loaded ${event.commits} commits`);
        break;
      case "history_failed":
        logger.error(event.error.message);
        break;
      case "merge_commit_skipped":
        logger.debug(`skipping merge commit ${shortenHash(event.commit.hash)}`);
        break;
      case "stats_failed":
        logger.error(event.error.message);
        break;
      case "commit_evaluated":
        logger.debug(
          `commit ${shortenHash(event.commit.hash)}: +${event.stats.added} -${event.stats.deleted} (${event.verdict})`,
        );
        break;
      case "author_failed":
        logger.warn(event.error.message);
        break;
      case "red_commit_found":
        if (output === "text") {
          writeLine(formatRedCommitLine(event.match));
        }
        break;
      case "scan_completed":
        logger.info(`scan completed: ${event.matches} red of ${event.candidates} commits`);
        break;
    }
  };
};

export const runFindCommand = (
  inputPath: string | undefined,
  options: FindCommandOptions,
  environment: FindCommandEnvironment,
  logger: Logger = createSilentLogger(),
): RedCommitScanSummary => {
  const target = resolveTargetPath(inputPath, environment.cwd);
  const thresholds = resolveThresholds(options, environment.now());

  if (options.output === "text") {
    environment.writeLine(formatSearchBanner(thresholds.sinceDate));
  }

  logger.debug(
    `scanning ${target.absolutePath} (minLines=${thresholds.minLines}, minPercent=${thresholds.minPercent})`,
  );
  const summary = findRedCommits(
    { repositoryPath: target.absolutePath, thresholds },
    environment.createClient(target.absolutePath),
    createScanReporter(logger, options.output, environment.writeLine),
  );

  if (options.output === "json") {
    environment.writeLine(formatRedCommitJson(summary));
  }

  return summary;
};
