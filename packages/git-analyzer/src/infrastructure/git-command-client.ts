import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];

  constructor(message: string, args: readonly string[]) {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

const readStderr = (error: Error): string => {
  if (!("stderr" in error)) {
    return "";
  }

  const { stderr } = error;
  if (typeof stderr === "string") {
    return stderr.trim();
  }

  return Buffer.isBuffer(stderr) ? stderr.toString("utf8").trim() : "";
};

export class ExecGitCommandClient implements GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: 1024 * 1024 * 64,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      if (!(error instanceof Error)) {
        throw new GitCommandError("Unknown git execution error", args);
      }

      const stderr = readStderr(error);
      throw new GitCommandError(stderr.length > 0 ? stderr : error.message, args);
    }
  }
}
