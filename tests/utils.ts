/**
 * Test utility functions for waterfall-timings
 */

import { vi } from 'vitest';
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Registry } from '../src/index';
import type { Clock, Diagnostic, RegistryOptions } from '../src/index';

/** Fresh directory under the OS temp dir. */
export function makeTempDir(prefix = 'waterfalls-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** File names in `dir`, sorted. */
export function listFiles(dir: string): string[] {
  return readdirSync(dir).sort();
}

export function writeJson(dir: string, fileName: string, value: unknown): void {
  writeFileSync(join(dir, fileName), JSON.stringify(value));
}

/**
 * Deterministic clock: each read returns the next value of its sequence,
 * repeating the last one when exhausted.
 */
export function sequenceClock(wall: number[], cpu: number[] = [0]): Clock {
  let wallIndex = 0;
  let cpuIndex = 0;
  const next = (values: number[], index: number): number =>
    values[Math.min(index, values.length - 1)] ?? 0;
  return {
    wallNs: () => next(wall, wallIndex++),
    cpuNs: () => next(cpu, cpuIndex++),
  };
}

export interface TestRegistry {
  registry: Registry;
  diagnostics: Diagnostic[];
}

/**
 * Registry detached from the process one: main role, empty environment,
 * fixed child qualifier and diagnostics captured in an array.
 *
 * @example
 * const { registry, diagnostics } = testRegistry({ clock: sequenceClock([10, 20]) });
 */
export function testRegistry(options: RegistryOptions = {}): TestRegistry {
  const diagnostics: Diagnostic[] = [];
  const registry = new Registry({
    role: 'main',
    env: {},
    qualifier: '4242',
    clock: sequenceClock([0]),
    onDiagnostic: (d) => diagnostics.push(d),
    ...options,
  });
  return { registry, diagnostics };
}

/**
 * Makes `process.exit` throw instead of ending the test run, and silences
 * `console.error`. Undo with `vi.restoreAllMocks()`.
 */
export function mockExit() {
  const exit = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new Error(`process.exit(${String(code)})`);
  });
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  return { exit, error };
}
