/**
 * One completed start → stop measurement.
 * All times are nanoseconds read from a monotonic clock shared by every
 * process on the host, so blocks from different reports can be compared.
 */
export interface TimingBlock {
  readonly startTime: number;
  readonly stopTime: number;
  /** CPU time consumed between start and stop */
  readonly threadCpuDuration: number;
  readonly text: string | null;
}

/**
 * Flattened block as written to a report file. Keys are snake_case because
 * they are the on-disk exchange format.
 */
export interface ReportRecord {
  name: string;
  text: string | null;
  start_time: number;
  stop_time: number;
  thread_duration: number;
  thread_id: number;
}

/**
 * Whether the code runs in the process that owns the fixed report file name
 * (`main`) or in a forked process / worker thread (`child`).
 */
export type ProcessRole = "main" | "child";

export type DiagnosticKind =
  | "double-start"
  | "stop-without-start"
  | "empty-report"
  | "report-saved";

export type DiagnosticLevel = "info" | "warning";

/** Structured event emitted instead of logging directly from the library. */
export interface Diagnostic {
  kind: DiagnosticKind;
  level: DiagnosticLevel;
  message: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/** Clock source; injectable so tests can drive exact timestamps. */
export interface Clock {
  /** Monotonic wall-clock time in nanoseconds. */
  wallNs(): number;
  /** CPU time consumed so far in nanoseconds. */
  cpuNs(): number;
}

/** Anything that can be used as a block label; non-strings are stringified. */
export type BlockText = string | number | boolean | null | undefined;
