import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { RedCommitOutputMode } from "./application/format-red-commit-output.js";
import { createStreamLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import {
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_MIN_LINES,
  DEFAULT_MIN_PERCENT,
  parseIntegerArgument,
} from "./application/resolve-thresholds.js";
import { createProcessEnvironment, runFindCommand } from "./application/run-find-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("git-red")
  .description("Find git commits that are predominantly deletions")
  .version(version)
  .argument("[path]", "path to the repository to scan")
  .option(
    "--since <date>",
    `start date for filtering commits (YYYY-MM-DD, default: ${DEFAULT_LOOKBACK_DAYS} days ago)`,
  )
  .option(
    "--min-lines <count>",
    `minimum number of changed lines (default: ${DEFAULT_MIN_LINES})`,
    parseIntegerArgument,
  )
  .option(
    "--min-pct <percent>",
    `minimum percentage of lines deleted (default: ${DEFAULT_MIN_PERCENT})`,
    parseIntegerArgument,
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn (default), info, debug",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["GIT_RED_LOG_LEVEL"])),
  )
  .addOption(
    new Option("--output <mode>", "output mode: text (default) or json")
      .choices(["text", "json"])
      .default("text"),
  )
  .option("--json", "shortcut for --output json")
  .action(
    (
      path: string | undefined,
      options: {
        since?: string;
        minLines?: number;
        minPct?: number;
        logLevel: LogLevel;
        output: RedCommitOutputMode;
        json?: boolean;
      },
    ) => {
      const output: RedCommitOutputMode = options.json === true ? "json" : options.output;
      // Diagnostics share stdout with the report, except when stdout carries JSON.
      const logger = createStreamLogger(options.logLevel, output === "json" ? process.stderr : process.stdout);
      runFindCommand(
        path,
        {
          since: options.since,
          minLines: options.minLines,
          minPercent: options.minPct,
          output,
        },
        createProcessEnvironment(),
        logger,
      );
    },
  );

await program.parseAsync(process.argv);
