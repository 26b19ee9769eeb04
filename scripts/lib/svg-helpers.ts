/**
 * Shared SVG helpers for the waterfall chart writer.
 */

import { writeFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

// ── Rounding ───────────────────────────────────────────────────────────────

/** Round to 1 decimal for compact SVG output. */
export const r = (v: number): string => v.toFixed(1);

// ── Scale factories ────────────────────────────────────────────────────────

/** Create a linear scale function mapping [domainMin, domainMax] → [rangeMin, rangeMax]. */
export function makeLinearScale(
  domainMin: number, domainMax: number,
  rangeMin: number, rangeMax: number,
): (v: number) => number {
  const domainSpan = domainMax - domainMin || 1;
  const rangeSpan = rangeMax - rangeMin;
  return (v: number) => rangeMin + ((v - domainMin) / domainSpan) * rangeSpan;
}

// ── Tick generation ────────────────────────────────────────────────────────

/** Step of 1, 2 or 5 × 10^k giving at most `maxTicks` intervals over `span`. */
export function niceStep(span: number, maxTicks = 8): number {
  if (!(span > 0)) return 1;
  const raw = span / maxTicks;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  for (const m of [1, 2, 5, 10]) {
    if (m * magnitude >= raw) return m * magnitude;
  }
  return 10 * magnitude;
}

/** Ticks from 0 to `span` (inclusive when it lands on a step). */
export function ticksFromZero(span: number, maxTicks = 8): number[] {
  const step = niceStep(span, maxTicks);
  const ticks: number[] = [];
  for (let i = 0; i * step <= span + step * 1e-9; i++) ticks.push(Number((i * step).toPrecision(12)));
  return ticks;
}

// ── SVG element helpers ────────────────────────────────────────────────────

/** Render vertical grid lines at the given x positions. */
export function renderVerticalGrid(
  xs: number[], topY: number, bottomY: number,
): string[] {
  return xs.map((x) =>
    `<line x1="${r(x)}" y1="${topY}" x2="${r(x)}" y2="${bottomY}" stroke="#e5e7eb" stroke-width="1"/>`,
  );
}

/** Render x-axis tick marks and labels. */
export function renderXAxis(
  ticks: { val: number; label: string }[],
  sx: (v: number) => number, bottomY: number,
): string[] {
  return ticks.flatMap(({ val, label }) => {
    const xx = r(sx(val));
    return [
      `<line x1="${xx}" y1="${bottomY}" x2="${xx}" y2="${bottomY + 5}" stroke="#333" stroke-width="1.5"/>`,
      `<text x="${xx}" y="${bottomY + 18}" text-anchor="middle" fill="#333">${escSvg(label)}</text>`,
    ];
  });
}

/** Render y-axis and x-axis border lines. */
export function renderAxesBorder(
  leftX: number, topY: number, rightX: number, bottomY: number,
): string[] {
  return [
    `<line x1="${leftX}" y1="${topY}" x2="${leftX}" y2="${bottomY}" stroke="#333" stroke-width="1.5"/>`,
    `<line x1="${leftX}" y1="${bottomY}" x2="${rightX}" y2="${bottomY}" stroke="#333" stroke-width="1.5"/>`,
  ];
}

export function escSvg(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

// ── File I/O ───────────────────────────────────────────────────────────────

/** Write chart lines to a file, creating directories as needed. Logs path and size. */
export function writeChart(lines: string[], outPath: string): void {
  const content = lines.join("\n");
  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, content, "utf8");
  const sizeKb = (Buffer.byteLength(content) / 1024).toFixed(0);
  console.log(`Written: ${outPath} (${sizeKb} KB)`);
}
