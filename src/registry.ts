import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { systemClock } from "./clock";
import { resolveProcessRole, reportQualifier } from "./process-info";
import { reportFileName, resolveReportDirectory } from "./report-file";
import type { Clock, Diagnostic, DiagnosticSink, ProcessRole, ReportRecord, TimingBlock } from "./types";

/** What the registry needs to know about each recorder it flattens. */
export interface RecorderEntry {
  readonly name: string;
  readonly threadId: number;
  readonly blocks: readonly TimingBlock[];
}

export interface RegistryOptions {
  /** Defaults to the role resolved from the current process / thread. */
  role?: ProcessRole;
  clock?: Clock;
  /** Report directory used when `saveReport` gets none. */
  directory?: string;
  env?: NodeJS.ProcessEnv;
  /** Suffix for child report files; defaults to the pid (and worker id). */
  qualifier?: string;
  onDiagnostic?: DiagnosticSink;
}

export interface SaveOptions {
  directory?: string;
  role?: ProcessRole;
}

/** Prints diagnostics through `console`, tagged like the rest of the tooling. */
export const consoleDiagnostics: DiagnosticSink = (diagnostic: Diagnostic) => {
  if (diagnostic.level === "warning") {
    console.warn(`[waterfalls] ${diagnostic.message}`);
  } else {
    console.log(`[waterfalls] ${diagnostic.message}`);
  }
};

/**
 * Ordered, append-only collection of the recorders created in one isolate
 * (main thread or worker). JS runs one isolate single-threaded, so the
 * synchronous append in `register` is never interleaved.
 */
export class Registry {
  readonly role: ProcessRole;
  readonly clock: Clock;
  directory: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly qualifier: string;
  private readonly sink: DiagnosticSink;
  private readonly recorders: RecorderEntry[] = [];

  constructor(options: RegistryOptions = {}) {
    this.role = options.role ?? resolveProcessRole();
    this.clock = options.clock ?? systemClock;
    this.directory = options.directory;
    this.env = options.env ?? process.env;
    this.qualifier = options.qualifier ?? reportQualifier();
    this.sink = options.onDiagnostic ?? consoleDiagnostics;
  }

  get size(): number {
    return this.recorders.length;
  }

  register(recorder: RecorderEntry): void {
    this.recorders.push(recorder);
  }

  /** Drops every recorder. Only meant for isolating tests. */
  reset(): void {
    this.recorders.length = 0;
  }

  emit(diagnostic: Diagnostic): void {
    this.sink(diagnostic);
  }

  /** Records in creation order of the recorders, then completion order of their blocks. */
  generateReport(): ReportRecord[] {
    const report: ReportRecord[] = [];
    for (const recorder of this.recorders) {
      for (const block of recorder.blocks) {
        report.push({
          name: recorder.name,
          text: block.text,
          start_time: block.startTime,
          stop_time: block.stopTime,
          thread_duration: block.threadCpuDuration,
          thread_id: recorder.threadId,
        });
      }
    }
    return report;
  }

  /** Directory the next save would write to, following the override chain. */
  reportDirectory(explicit?: string): string {
    return resolveReportDirectory({ explicit, override: this.directory, env: this.env });
  }

  /**
   * Write the full report as one JSON file. Returns the file path, or null
   * when there was nothing to write.
   */
  saveReport(options: SaveOptions = {}): string | null {
    // Nothing was ever instrumented in this process.
    if (this.recorders.length === 0) return null;

    const report = this.generateReport();
    if (report.length === 0) {
      this.emit({
        kind: "empty-report",
        level: "warning",
        message: "No timing block has been completed, report will not be saved.",
      });
      return null;
    }

    const directory = this.reportDirectory(options.directory);
    const filePath = join(directory, reportFileName(options.role ?? this.role, this.qualifier));
    mkdirSync(directory, { recursive: true });
    writeFileSync(filePath, JSON.stringify(report));

    this.emit({
      kind: "report-saved",
      level: "info",
      message: `Report saved into file '${filePath}'`,
    });
    return filePath;
  }
}

let processRegistry: Registry | null = null;

/**
 * The registry shared by every recorder of this process (or worker) that is
 * not given one explicitly. Created on first use; its report is saved when
 * the process exits normally.
 */
export function getProcessRegistry(): Registry {
  if (processRegistry === null) {
    const registry = new Registry();
    // `exit` listeners must be synchronous, which saveReport is.
    process.once("exit", () => {
      registry.saveReport();
    });
    processRegistry = registry;
  }
  return processRegistry;
}

/** Empties the process registry without dropping its exit hook. */
export function resetProcessRegistry(): void {
  processRegistry?.reset();
  if (processRegistry !== null) processRegistry.directory = undefined;
}
