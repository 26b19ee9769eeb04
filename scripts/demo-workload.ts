/**
 * Instrumented sample workload: the main process times its own steps and
 * forks two children that time theirs. Every process leaves its own report,
 * ready for `npm run view`.
 *
 * Usage:  npx tsx scripts/demo-workload.ts [--dir <directory>] [--children <n>]
 * Output: <directory>/waterfalls.json + one waterfalls.<pid>.json per child
 */

import { fork } from "node:child_process";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { setTimeout as sleep } from "node:timers/promises";
import { DIRECTORY_ENV_VAR, TimerRecorder, getProcessRegistry, timed } from "../src/index.ts";
import { parseArgs } from "./lib/args.ts";

const { options } = parseArgs(process.argv.slice(2));
const directory = resolve(options.dir ?? "tmp/demo-reports");

/** Keeps the CPU busy for roughly `ms` milliseconds. */
function spin(ms: number): number {
  const until = Date.now() + ms;
  let acc = 0;
  while (Date.now() < until) acc += Math.sqrt(acc + 1);
  return acc;
}

// ── Child ──────────────────────────────────────────────────────────────────

if (options.child !== undefined) {
  const id = options.child;
  const work = new TimerRecorder("work");
  for (let batch = 0; batch < 3; batch++) {
    using _ = work.scope(`child ${id}, batch ${batch}`);
    spin(15 + 10 * batch);
  }
  // Reports were already written by each stop(); leave the IPC channel.
  process.disconnect?.();
  process.exit(0);
}

// ── Main ───────────────────────────────────────────────────────────────────

getProcessRegistry().directory = directory;
const childCount = Number(options.children ?? "2");
if (!Number.isInteger(childCount) || childCount < 0) {
  console.error("[demo] --children must be a non-negative integer");
  process.exit(1);
}

const setup = new TimerRecorder("setup", { text: "prepare input" });
setup.start();
spin(20);
setup.stop();

const runChild = (id: number): Promise<number | null> =>
  new Promise((resolveExit, reject) => {
    const child = fork(fileURLToPath(import.meta.url), ["--child", String(id)], {
      env: { ...process.env, [DIRECTORY_ENV_VAR]: directory },
    });
    child.once("error", reject);
    child.once("exit", code => resolveExit(code));
  });

const poll = timed("poll", async (round: number) => {
  await sleep(10);
  return spin(5 * round);
});

const children = timed("children", (count: number) =>
  Promise.all(Array.from({ length: count }, (_, id) => runChild(id))),
);

const [codes] = await Promise.all([
  children(childCount),
  (async () => {
    for (let round = 1; round <= 3; round++) await poll(round);
  })(),
]);

const failed = codes.filter(code => code !== 0).length;
if (failed > 0) {
  console.error(`[demo] ${failed} child process(es) failed`);
  process.exit(1);
}

const saved = getProcessRegistry().saveReport();
console.log(`[demo] Reports written to ${directory}${saved === null ? "" : ` (main: ${saved})`}`);
