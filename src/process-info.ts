import { isMainThread, threadId } from "node:worker_threads";
import type { ProcessRole } from "./types";

// Linux caps pids below 2^22, so worker ids above it never collide with a pid.
const WORKER_ID_STRIDE = 2 ** 22;

/**
 * `child` inside a worker thread or a process forked with an IPC channel,
 * `main` otherwise.
 */
export function resolveProcessRole(): ProcessRole {
  if (!isMainThread) return "child";
  return typeof process.send === "function" ? "child" : "main";
}

/**
 * Integer identifying the current thread across every process on the host.
 * The main thread reuses the pid (its OS thread id on Linux).
 */
export function currentThreadId(): number {
  return threadId === 0 ? process.pid : threadId * WORKER_ID_STRIDE + process.pid;
}

/** Suffix that makes a child's report file name unique. */
export function reportQualifier(): string {
  return isMainThread ? String(process.pid) : `${process.pid}-${threadId}`;
}
