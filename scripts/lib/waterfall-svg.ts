/**
 * Waterfall (Gantt) chart writer for aggregated timing reports.
 *
 * One row per display group, one bar per block. The bar spans the block's
 * wall time; a darker strip along its bottom shows the share of CPU time.
 * Hovering a bar shows its name, text, duration and CPU time.
 */

import type { Aggregation } from "../../src/index.ts";
import { formatDuration } from "../../src/index.ts";
import {
  r, makeLinearScale, ticksFromZero, renderVerticalGrid, renderXAxis,
  renderAxesBorder, escSvg,
} from "./svg-helpers.ts";

export interface WaterfallOpts {
  /** Draw a separator line between rows. */
  lines?: boolean;
  title?: string;
  /** SVG width (default 1000). */
  width?: number;
}

const ROW_H = 32;
const BAR_H = 16;
const CPU_H = 4;
const CHAR_W = 7;

export function renderWaterfallSvg(agg: Aggregation, opts: WaterfallOpts = {}): string[] {
  const { groups, unit, timeMin, timeTotal } = agg;
  const labelWidth = Math.max(
    80,
    ...groups.flatMap(g => g.label.split("\n").map(line => line.length * CHAR_W)),
  );
  const margin = { top: 36, right: 24, bottom: 44, left: labelWidth + 16 };
  const W = opts.width ?? 1000;
  const H = margin.top + groups.length * ROW_H + margin.bottom;
  const plotRight = W - margin.right;
  const plotBottom = margin.top + groups.length * ROW_H;

  const span = timeTotal / unit.ns;
  const ticks = ticksFromZero(span);
  const domainMax = Math.max(span, ticks[ticks.length - 1] ?? span);
  const sx = makeLinearScale(0, domainMax, margin.left, plotRight);
  const xOf = (ns: number): number => sx((ns - timeMin) / unit.ns);

  const lines: string[] = [];
  const push = (s: string) => lines.push(s);

  push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${W} ${H}" font-family="system-ui,-apple-system,sans-serif" font-size="12">`);
  push(`<rect width="${W}" height="${H}" fill="white"/>`);

  const title = opts.title ?? "Waterfalls";
  push(`<text x="${W / 2}" y="20" text-anchor="middle" fill="#333" font-size="13" font-weight="600">${escSvg(title)}</text>`);

  lines.push(...renderVerticalGrid(ticks.map(sx), margin.top, plotBottom));

  groups.forEach((group, row) => {
    const rowTop = margin.top + row * ROW_H;
    const barY = rowTop + (ROW_H - BAR_H) / 2;

    if (opts.lines && row > 0) {
      push(`<line class="separator" x1="${margin.left}" y1="${rowTop}" x2="${plotRight}" y2="${rowTop}" stroke="#d1d5db" stroke-width="1"/>`);
    }

    // Row label, one tspan per line of a split label
    const labelLines = group.label.split("\n");
    const firstDy = -((labelLines.length - 1) * 14) / 2;
    push(`<text x="${margin.left - 8}" y="${r(rowTop + ROW_H / 2)}" text-anchor="end" dominant-baseline="middle" fill="#333">`);
    labelLines.forEach((line, i) => {
      push(`<tspan x="${margin.left - 8}" dy="${i === 0 ? firstDy : 14}">${escSvg(line)}</tspan>`);
    });
    push(`</text>`);

    for (const record of group.records) {
      const x0 = xOf(record.start_time);
      const width = Math.max(xOf(record.stop_time) - x0, 1);
      const duration = record.stop_time - record.start_time;
      const cpuShare = duration > 0 ? Math.min(record.thread_duration / duration, 1) : 0;
      const tip = [
        record.text === null ? record.name : `${record.name}: ${record.text}`,
        `duration: ${formatDuration(duration, unit)}`,
        `CPU: ${formatDuration(record.thread_duration, unit)}`,
      ].join("\n");

      push(`<g>`);
      push(`<title>${escSvg(tip)}</title>`);
      push(`<rect class="bar" x="${r(x0)}" y="${r(barY)}" width="${r(width)}" height="${BAR_H}" fill="${group.color}" stroke="#333" stroke-width="0.5"/>`);
      if (cpuShare > 0) {
        push(`<rect class="cpu" x="${r(x0)}" y="${r(barY + BAR_H - CPU_H)}" width="${r(width * cpuShare)}" height="${CPU_H}" fill="#1f2937" opacity="0.6"/>`);
      }
      push(`</g>`);
    }
  });

  lines.push(...renderAxesBorder(margin.left, margin.top, plotRight, plotBottom));
  lines.push(...renderXAxis(ticks.map(v => ({ val: v, label: String(v) })), sx, plotBottom));
  push(`<text x="${(margin.left + plotRight) / 2}" y="${H - 6}" text-anchor="middle" fill="#333" font-size="13">Time [${unit.name}]</text>`);

  push(`</svg>`);
  return lines;
}

/** Standalone page around the SVG; the browser shows bar tooltips on hover. */
export function renderWaterfallHtml(svgLines: string[], title = "Waterfalls"): string[] {
  return [
    `<!doctype html>`,
    `<html lang="en">`,
    `<head>`,
    `<meta charset="utf-8">`,
    `<title>${escSvg(title)}</title>`,
    `<style>body{margin:16px;background:#fafafa}svg{max-width:100%;height:auto;background:white}g:hover .bar{stroke-width:2}</style>`,
    `</head>`,
    `<body>`,
    ...svgLines,
    `</body>`,
    `</html>`,
  ];
}
