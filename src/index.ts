/**
 * waterfall-timings — named timing blocks recorded per process, saved as
 * JSON reports, and aggregated offline into waterfall chart rows.
 *
 * Recording side: {@link TimerRecorder}, {@link timed}, {@link Registry}.
 * Viewing side: {@link loadReports}, {@link aggregate}, {@link resolveTimeUnit}.
 */

// Public type exports
export type {
  TimingBlock, ReportRecord, ProcessRole, Diagnostic, DiagnosticKind,
  DiagnosticLevel, DiagnosticSink, Clock, BlockText,
} from "./types";
export type { TimerOptions } from "./timer";
export type { RegistryOptions, SaveOptions, RecorderEntry } from "./registry";
export type { DirectorySources } from "./report-file";
export type { TimeUnit, TimeUnitName } from "./time-units";
export type {
  Interval, GroupedRecords, DisplayGroup, AggregateOptions, Aggregation,
} from "./aggregate";

export { TimerRecorder, timed } from "./timer";
export { Registry, getProcessRegistry, resetProcessRegistry, consoleDiagnostics } from "./registry";
export { systemClock } from "./clock";
export { resolveProcessRole, currentThreadId, reportQualifier } from "./process-info";
export {
  REPORT_BASENAME, DIRECTORY_ENV_VAR, REPORT_FILE_PATTERN,
  resolveReportDirectory, reportFileName, isReportFileName,
} from "./report-file";
export { fatal, findReportFiles, toReportRecord, readReportFile, loadRecords, loadReports } from "./loader";
export { TIME_UNITS, TIME_UNIT_CODES, parseTimeUnit, resolveTimeUnit, formatDuration } from "./time-units";
export {
  GROUP_PALETTE, detectOverlap, groupByName, threadLabel, formatGroupNames,
  sortGroups, colorForName, aggregate,
} from "./aggregate";
