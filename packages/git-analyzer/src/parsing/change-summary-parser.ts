import type { ChangeStats } from "@git-red/core";

const INSERTION_TOKEN = /insertions?\(/;
const DELETION_TOKEN = /deletions?\(/;
const FILE_ROW_MARKER = " | ";

const INSERTION_COUNT = /(\d+)\s+insertions?\(/;
const DELETION_COUNT = /(\d+)\s+deletions?\(/;

export type ChangeSummaryParseResult =
  | { ok: true; stats: ChangeStats }
  | { ok: false; malformedLine: string };

const isTrailerLine = (line: string): boolean =>
  !line.includes(FILE_ROW_MARKER) && (INSERTION_TOKEN.test(line) || DELETION_TOKEN.test(line));

const readCount = (line: string, token: RegExp, pattern: RegExp): number | null => {
  if (!token.test(line)) {
    return 0;
  }

  const match = line.match(pattern);
  const raw = match?.[1];
  if (raw === undefined) {
    return null;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

/**
 * Sums the insertion and deletion counts of every `--stat` trailer line, e.g.
 * ` 3 files changed, 12 insertions(+), 1 deletion(-)`.
 *
 * Per-file rows (`path | 4 ++--`) are ignored even when the path itself
 * contains one of the tokens.
 */
export const parseChangeSummary = (rawSummary: string): ChangeSummaryParseResult => {
  let added = 0;
  let deleted = 0;

  for (const line of rawSummary.split("\n")) {
    if (!isTrailerLine(line)) {
      continue;
    }

    const insertions = readCount(line, INSERTION_TOKEN, INSERTION_COUNT);
    const deletions = readCount(line, DELETION_TOKEN, DELETION_COUNT);
    if (insertions === null || deletions === null) {
      return { ok: false, malformedLine: line };
    }

    added += insertions;
    deleted += deletions;
  }

  return { ok: true, stats: { added, deleted } };
};
