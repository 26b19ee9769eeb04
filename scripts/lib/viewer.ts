/**
 * Load → aggregate → render pipeline behind `scripts/view.ts`.
 */

import { resolve } from "node:path";
import { aggregate, fatal, loadReports, parseTimeUnit, TIME_UNIT_CODES } from "../../src/index.ts";
import type { Aggregation, TimeUnit } from "../../src/index.ts";
import type { ViewArgs } from "./args.ts";
import { writeChart } from "./svg-helpers.ts";
import { renderWaterfallHtml, renderWaterfallSvg } from "./waterfall-svg.ts";

export const IMAGE_FILE = "waterfalls.svg";
export const PAGE_FILE = "waterfalls.html";

/** Aggregation of every report in `args.directory`. Exits on unusable input. */
export function buildAggregation(args: Pick<ViewArgs, "directory" | "unit" | "threadId">): Aggregation {
  let unit: TimeUnit | null = null;
  if (args.unit !== null) {
    unit = parseTimeUnit(args.unit);
    if (unit === null) fatal(`Unknown time unit '${args.unit}'. Use one of: ${TIME_UNIT_CODES.join(", ")}`);
  }

  const records = loadReports(args.directory);
  const agg = aggregate(records, { showThreadId: args.threadId, unit });

  for (const group of agg.groups) {
    if (group.overlapping) {
      console.log(`[view] Blocks of '${group.label.replace("\n", " ")}' overlap in time.`);
    }
  }
  return agg;
}

/**
 * Writes the chart next to the reports: a static SVG with `image`, an
 * HTML page with hover tooltips otherwise. Returns the written path.
 */
export function visualizeReport(args: ViewArgs): string {
  const directory = resolve(args.directory);
  const agg = buildAggregation({ ...args, directory });
  const svg = renderWaterfallSvg(agg, { lines: args.lines });

  const outPath = resolve(directory, args.image ? IMAGE_FILE : PAGE_FILE);
  writeChart(args.image ? svg : renderWaterfallHtml(svg), outPath);
  return outPath;
}
