import type { Clock } from "./types";

/**
 * Clock backed by `process.hrtime.bigint()` and `process.cpuUsage()`.
 *
 * Node 20 exposes no per-thread CPU counter, so `cpuNs` is the CPU time of
 * the whole process (user + system).
 *
 * `wallNs` converts the `bigint` to a `number`, which stays exact only below
 * 2^53 ns: once the host's monotonic clock passes about 104 days, readings
 * are rounded to a few ns. Timestamps are shared by every process on the
 * host, so no per-process baseline can be subtracted first.
 */
export const systemClock: Clock = {
  wallNs: () => Number(process.hrtime.bigint()),
  cpuNs: () => {
    const { user, system } = process.cpuUsage();
    return (user + system) * 1000;
  },
};
