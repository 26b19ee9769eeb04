import { currentThreadId } from "./process-info";
import { getProcessRegistry } from "./registry";
import type { Registry } from "./registry";
import type { BlockText, ProcessRole, TimingBlock } from "./types";

export interface TimerOptions {
  /** Label of the first block; handy for `scope()` / `wrap()` use. */
  text?: BlockText;
  /** Registry to append to; the process registry when omitted. */
  registry?: Registry;
}

type InFlight = { startTime: number; startCpu: number };

const toText = (text: BlockText): string | null =>
  text === null || text === undefined ? null : String(text);

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";

/**
 * Named recorder of timing blocks.
 *
 * ```ts
 * const timer = new TimerRecorder("load");
 * timer.start();
 * // ...
 * timer.stop();
 *
 * {
 *   using _ = new TimerRecorder("parse").scope();
 *   // ...
 * }
 *
 * const fetchAll = new TimerRecorder("fetch").wrap(async () => { ... });
 * ```
 *
 * Misuse (starting twice, stopping while idle) is reported as a warning
 * diagnostic and otherwise ignored. In a child process or worker thread
 * every `stop()` rewrites that child's report file.
 */
export class TimerRecorder {
  readonly name: string;
  readonly threadId: number;
  readonly role: ProcessRole;
  private readonly registry: Registry;
  private readonly completed: TimingBlock[] = [];
  private text: string | null;
  private inFlight: InFlight | null = null;

  constructor(name: string, options: TimerOptions = {}) {
    this.name = name;
    this.text = toText(options.text);
    this.registry = options.registry ?? getProcessRegistry();
    this.threadId = currentThreadId();
    this.role = this.registry.role;
    this.registry.register(this);
  }

  get blocks(): readonly TimingBlock[] {
    return this.completed;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  start(text?: BlockText): void {
    if (this.inFlight !== null) {
      this.registry.emit({
        kind: "double-start",
        level: "warning",
        message: `Timer '${this.name}' can't be started twice. Use .stop() to stop it first.`,
      });
      return;
    }
    if (text !== undefined && text !== null) this.text = String(text);

    const clock = this.registry.clock;
    this.inFlight = { startTime: clock.wallNs(), startCpu: clock.cpuNs() };
  }

  stop(text?: BlockText): void {
    const inFlight = this.inFlight;
    if (inFlight === null) {
      this.registry.emit({
        kind: "stop-without-start",
        level: "warning",
        message: `Timer '${this.name}' hasn't been started yet. Use .start() to start it first.`,
      });
      return;
    }
    if (text !== undefined && text !== null) this.text = String(text);

    const clock = this.registry.clock;
    const stopTime = Math.max(clock.wallNs(), inFlight.startTime);
    const cpu = clock.cpuNs() - inFlight.startCpu;
    this.completed.push({
      startTime: inFlight.startTime,
      stopTime,
      threadCpuDuration: Math.max(cpu, 0),
      text: this.text,
    });
    this.inFlight = null;
    this.text = null;

    // A forked process or worker may never reach the parent's exit hook.
    if (this.role === "child") this.registry.saveReport({ role: "child" });
  }

  /** Starts a block that ends when the returned handle is disposed. */
  scope(text?: BlockText): Disposable {
    this.start(text);
    return { [Symbol.dispose]: () => this.stop() };
  }

  /**
   * Wraps `fn` so that each call is one block. A returned promise ends the
   * block once it settles and is passed on as a `Promise` that also rejects
   * when stopping fails (a child's report flush).
   */
  wrap<A extends unknown[], T>(fn: (...args: A) => PromiseLike<T>): (...args: A) => Promise<T>;
  wrap<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R;
  wrap<A extends unknown[]>(fn: (...args: A) => unknown): (...args: A) => unknown {
    return (...args: A): unknown => {
      this.start();
      let result: unknown;
      try {
        result = fn(...args);
      } catch (error) {
        this.stop();
        throw error;
      }
      if (!isPromiseLike(result)) {
        this.stop();
        return result;
      }
      return Promise.resolve(result).then(
        (value) => {
          this.stop();
          return value;
        },
        (error: unknown) => {
          this.stop();
          throw error;
        },
      );
    };
  }

  toString(): string {
    const text = this.text === null ? "null" : `'${this.text}'`;
    return `TimerRecorder (name='${this.name}', text=${text})`;
  }
}

/** Shorthand for `new TimerRecorder(name, options).wrap(fn)`. */
export function timed<A extends unknown[], T>(
  name: string,
  fn: (...args: A) => PromiseLike<T>,
  options?: TimerOptions,
): (...args: A) => Promise<T>;
export function timed<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R,
  options?: TimerOptions,
): (...args: A) => R;
export function timed<A extends unknown[]>(
  name: string,
  fn: (...args: A) => unknown,
  options?: TimerOptions,
): (...args: A) => unknown {
  return new TimerRecorder(name, options).wrap(fn);
}
