import { createHash } from "node:crypto";
import { resolveTimeUnit } from "./time-units";
import type { TimeUnit } from "./time-units";
import type { ReportRecord } from "./types";

export type Interval = Pick<ReportRecord, "start_time" | "stop_time">;

export interface GroupedRecords {
  /** name → records, both in merge order */
  groups: Map<string, ReportRecord[]>;
  /** Earliest start across all records */
  timeMin: number;
  /** Latest stop minus `timeMin` */
  timeTotal: number;
}

export interface DisplayGroup {
  /** Row label: the timer name, with `\nthread: <id>` when split or annotated. */
  label: string;
  name: string;
  /** Thread id of the first record */
  threadId: number;
  records: ReportRecord[];
  color: string;
  /** Some blocks of this row intersect; advisory only. */
  overlapping: boolean;
}

export interface AggregateOptions {
  showThreadId?: boolean;
  unit?: TimeUnit | null;
}

export interface Aggregation {
  groups: DisplayGroup[];
  unit: TimeUnit;
  timeMin: number;
  timeTotal: number;
}

export const GROUP_PALETTE: readonly string[] = [
  "#008080", "#70a494", "#b4c8a8", "#f6edbd", "#edbb8a", "#de8a5a", "#ca562c",
];

/**
 * True when any two intervals intersect. Expects `blocks` sorted by start
 * time; intervals are half-open, so touching ends do not count.
 */
export function detectOverlap(blocks: readonly Interval[]): boolean {
  for (let i = 1; i < blocks.length; i++) {
    if (blocks[i].start_time < blocks[i - 1].stop_time) return true;
  }
  return false;
}

export function groupByName(records: readonly ReportRecord[]): GroupedRecords {
  const groups = new Map<string, ReportRecord[]>();
  let timeMin = Infinity;
  let timeMax = -Infinity;
  for (const record of records) {
    const group = groups.get(record.name);
    if (group) group.push(record);
    else groups.set(record.name, [record]);
    timeMin = Math.min(timeMin, record.start_time);
    timeMax = Math.max(timeMax, record.stop_time);
  }
  if (records.length === 0) return { groups, timeMin: 0, timeTotal: 0 };
  return { groups, timeMin, timeTotal: timeMax - timeMin };
}

export const threadLabel = (name: string, threadId: number): string => `${name}\nthread: ${threadId}`;

/**
 * Names used by several threads are always split into one group per thread.
 * A single-thread name is annotated with its thread only when `showThreadId`.
 */
export function formatGroupNames(
  groups: ReadonlyMap<string, ReportRecord[]>,
  showThreadId = false,
): Map<string, ReportRecord[]> {
  const formatted = new Map<string, ReportRecord[]>();
  for (const [name, records] of groups) {
    const byThread = new Map<number, ReportRecord[]>();
    for (const record of records) {
      const bucket = byThread.get(record.thread_id);
      if (bucket) bucket.push(record);
      else byThread.set(record.thread_id, [record]);
    }
    if (byThread.size === 1 && !showThreadId) {
      formatted.set(name, records);
      continue;
    }
    for (const [threadId, bucket] of byThread) {
      formatted.set(threadLabel(name, threadId), bucket);
    }
  }
  return formatted;
}

/**
 * Orders groups by the start of their first record; by thread id first when
 * `showThreadId`. Groups are never empty.
 */
export function sortGroups(
  groups: ReadonlyMap<string, ReportRecord[]>,
  showThreadId = false,
): Array<[string, ReportRecord[]]> {
  const entries = [...groups.entries()];
  return entries.sort(([, left], [, right]) => {
    const a = left[0];
    const b = right[0];
    if (showThreadId && a.thread_id !== b.thread_id) return a.thread_id - b.thread_id;
    return a.start_time - b.start_time;
  });
}

/** Stable color per timer name, so split thread rows of one timer match. */
export function colorForName(name: string): string {
  const digest = createHash("sha224").update(name).digest("hex");
  let sum = 0;
  for (const char of digest) sum += char.charCodeAt(0);
  return GROUP_PALETTE[sum % GROUP_PALETTE.length];
}

/** Group, name, sort and time-scale merged records for the renderer. */
export function aggregate(records: readonly ReportRecord[], options: AggregateOptions = {}): Aggregation {
  const showThreadId = options.showThreadId ?? false;
  const { groups, timeMin, timeTotal } = groupByName(records);
  const sorted = sortGroups(formatGroupNames(groups, showThreadId), showThreadId);

  const displayGroups = sorted.map(([label, rows]): DisplayGroup => {
    const byStart = [...rows].sort((a, b) => a.start_time - b.start_time);
    const name = rows[0].name;
    return {
      label,
      name,
      threadId: rows[0].thread_id,
      records: rows,
      color: colorForName(name),
      overlapping: detectOverlap(byStart),
    };
  });

  return {
    groups: displayGroups,
    unit: resolveTimeUnit(timeTotal, options.unit),
    timeMin,
    timeTotal,
  };
}
