import { describe, expect, it } from "vitest";
import { createStreamLogger, parseLogLevel } from "./logger.js";

const captureStream = () => {
  const chunks: string[] = [];
  return { chunks, stream: { write: (chunk: string) => chunks.push(chunk) } };
};

describe("createStreamLogger", () => {
  it("prefixes messages with the tool name and level", () => {
    const { chunks, stream } = captureStream();
    const logger = createStreamLogger("debug", stream);

    logger.error("failed to list commits since 2026-09-18: fatal: bad date");
    logger.debug("loaded 3 commits");

    expect(chunks).toEqual([
      "[git-red] ERROR failed to list commits since 2026-09-18: fatal: bad date\n",
      "[git-red] DEBUG loaded 3 commits\n",
    ]);
  });

  it("drops messages below the configured level", () => {
    const { chunks, stream } = captureStream();
    const logger = createStreamLogger("warn", stream);

    logger.info("hidden");
    logger.debug("hidden");
    logger.warn("shown");

    expect(chunks).toEqual(["[git-red] WARN shown\n"]);
  });

  it("writes nothing when silent", () => {
    const { chunks, stream } = captureStream();
    createStreamLogger("silent", stream).error("hidden");

    expect(chunks).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back to warn", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("warn");
  });
});
