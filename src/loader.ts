import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { REPORT_BASENAME, isReportFileName } from "./report-file";
import type { ReportRecord } from "./types";

/** Logs the reason and terminates the process; the loader never recovers. */
export function fatal(message: string): never {
  console.error(`[waterfalls] ${message}`);
  process.exit(1);
}

const MAIN_REPORT = `${REPORT_BASENAME}.json`;

/** Main report first, then the child reports by file name. */
function compareReportNames(a: string, b: string): number {
  if (a === MAIN_REPORT || b === MAIN_REPORT) return a === MAIN_REPORT ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Report files in `directory`, main report first. Exits when the directory
 * does not exist.
 */
export function findReportFiles(directory: string): string[] {
  const dir = resolve(directory);
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    fatal(`Directory '${dir}' does not exist. Specify the directory containing report files.`);
  }
  return readdirSync(dir)
    .filter(isReportFileName)
    .sort(compareReportNames)
    .map(fileName => join(dir, fileName));
}

/**
 * Validates one parsed record. `text` and `thread_duration` may be missing
 * in hand-written reports and default to null and 0.
 */
export function toReportRecord(value: unknown): ReportRecord | null {
  if (typeof value !== "object" || value == null) return null;
  const row = value as Record<string, unknown>;
  const { name, text, start_time, stop_time, thread_duration, thread_id } = row;
  if (
    typeof name !== "string" ||
    typeof start_time !== "number" ||
    typeof stop_time !== "number" ||
    typeof thread_id !== "number"
  ) {
    return null;
  }
  if (text !== undefined && text !== null && typeof text !== "string") return null;
  if (thread_duration !== undefined && typeof thread_duration !== "number") return null;
  return {
    name,
    text: text ?? null,
    start_time,
    stop_time,
    thread_duration: thread_duration ?? 0,
    thread_id,
  };
}

export function readReportFile(filePath: string): ReportRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    fatal(`Report file '${filePath}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!Array.isArray(parsed)) fatal(`Report file '${filePath}' does not contain a JSON array.`);

  return parsed.map((value: unknown, index) => {
    const record = toReportRecord(value);
    if (record === null) fatal(`Report file '${filePath}' has a malformed record at index ${index}.`);
    return record;
  });
}

/** Concatenates records of every file in the given order. Exits when nothing was recorded. */
export function loadRecords(filePaths: string[]): ReportRecord[] {
  const records = filePaths.flatMap(readReportFile);
  if (records.length === 0) {
    fatal("No timing block found in any report file.");
  }
  return records;
}

/** Discover and merge every report in `directory`. */
export function loadReports(directory: string): ReportRecord[] {
  return loadRecords(findReportFiles(directory));
}
