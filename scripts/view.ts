/**
 * Shows timing reports as a waterfall chart.
 *
 * Usage:  npx tsx scripts/view.ts [directory] [-u <unit>] [-t] [-l] [-i]
 * Output: <directory>/waterfalls.html, or <directory>/waterfalls.svg with -i
 */

import { TIME_UNIT_CODES } from "../src/index.ts";
import { parseViewArgs } from "./lib/args.ts";
import type { ViewArgs } from "./lib/args.ts";
import { visualizeReport } from "./lib/viewer.ts";

function help(): void {
  console.log(`Usage:
  npm run view -- [directory] [options]

Arguments:
  directory          Directory with waterfalls*.json reports (default: current directory)

Options:
  -u, --unit <code>  Time unit of the axis: ${TIME_UNIT_CODES.join(", ")} (default: automatic)
  -t, --thread-id    Label every row with its thread id and sort rows by thread
  -l, --lines        Draw separator lines between rows
  -i, --image        Save a static SVG image instead of the interactive page
  -h, --help         Show this help
`);
}

let args: ViewArgs;
try {
  args = parseViewArgs(process.argv.slice(2));
} catch (error) {
  console.error(`[view] ${error instanceof Error ? error.message : String(error)}`);
  help();
  process.exit(1);
}

if (args.help) {
  help();
  process.exit(0);
}

const outPath = visualizeReport(args);
if (!args.image) console.log(`[view] Open ${outPath} in a browser to explore the chart.`);
