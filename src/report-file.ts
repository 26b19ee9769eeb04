import { resolve } from "node:path";
import type { ProcessRole } from "./types";

export const REPORT_BASENAME = "waterfalls";
export const DIRECTORY_ENV_VAR = "WATERFALLS_DIRECTORY";

/** Matches `waterfalls.json`, `waterfalls.<pid>.json` and `waterfalls.<pid>-<thread>.json`. */
export const REPORT_FILE_PATTERN = /^waterfalls(\.\d+(-\d+)?)?\.json$/;

export interface DirectorySources {
  /** Directory passed to the save call. */
  explicit?: string;
  /** Registry-level override. */
  override?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Pick the report directory: explicit argument, then registry override,
 * then `WATERFALLS_DIRECTORY`, then the working directory.
 */
export function resolveReportDirectory(sources: DirectorySources = {}): string {
  const env = sources.env ?? process.env;
  const chosen =
    sources.explicit ??
    sources.override ??
    env[DIRECTORY_ENV_VAR] ??
    sources.cwd ??
    process.cwd();
  return resolve(chosen);
}

export function reportFileName(role: ProcessRole, qualifier: string): string {
  return role === "main" ? `${REPORT_BASENAME}.json` : `${REPORT_BASENAME}.${qualifier}.json`;
}

export function isReportFileName(fileName: string): boolean {
  return REPORT_FILE_PATTERN.test(fileName);
}
