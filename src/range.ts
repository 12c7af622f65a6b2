import {
  formatHolding,
  formatRange,
  type Holding,
  type LineRange,
} from "./config.js";
import { ConfigError } from "./errors.js";

export type Content =
  | { kind: "file"; lines: number }
  | { kind: "folder"; entries: readonly string[] };

export function compareRelPaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// A listing's order depends on the filesystem; always re-sort.
export function sortEntries(entries: readonly string[]): string[] {
  return [...entries].sort(compareRelPaths);
}

export function extentOf(content: Content): number {
  return content.kind === "file" ? content.lines : content.entries.length;
}

export function checkRange(
  range: LineRange,
  extent: number,
  context: Record<string, unknown> = {},
): void {
  if (range.to <= range.from) {
    throw new ConfigError(`empty range ${formatRange(range)}`, {
      ...context,
      range,
    });
  }
  if (range.to > extent) {
    throw new ConfigError(
      `range ${formatRange(range)} exceeds the available extent of ${extent}`,
      { ...context, range, extent },
    );
  }
}

export function coversRange(
  range: LineRange | undefined,
  extent: number,
): boolean {
  if (!range) return true;
  return range.from < range.to && range.to <= extent;
}

/** Resolves `range` (or everything) against `extent`, validating it. */
export function resolveRange(
  range: LineRange | undefined,
  extent: number,
  context?: Record<string, unknown>,
): LineRange {
  if (!range) return { from: 0, to: extent };
  checkRange(range, extent, context);
  return range;
}

/**
 * Files of a folder selected by `range`, indexing into the listing sorted by
 * relative path.
 */
export function resolveFolderRange(
  entries: readonly string[],
  range?: LineRange,
  context?: Record<string, unknown>,
): string[] {
  const sorted = sortEntries(entries);
  const { from, to } = resolveRange(range, sorted.length, context);
  return sorted.slice(from, to);
}

export function resolveLineRange(
  lines: number,
  range?: LineRange,
  context?: Record<string, unknown>,
): LineRange {
  return resolveRange(range, lines, context);
}

/**
 * Destination ranges of one request must not overlap. A holding without a
 * range stands for the whole extent and so overlaps every other holding,
 * unless `rangedOnly` is set, in which case it is not checked at all.
 */
export function assertDisjoint(
  holdings: readonly Holding[],
  { rangedOnly = false }: { rangedOnly?: boolean } = {},
): void {
  const spans = holdings
    .map((h, i) => ({ h, i }))
    .filter(({ h }) => !rangedOnly || h.range !== undefined);
  for (let a = 0; a < spans.length; a++) {
    for (let b = a + 1; b < spans.length; b++) {
      const x = spans[a].h;
      const y = spans[b].h;
      const overlap =
        !x.range ||
        !y.range ||
        (x.range.from < y.range.to && y.range.from < x.range.to);
      if (overlap) {
        throw new ConfigError(
          `overlapping destination ranges: ${formatHolding(x)} and ${formatHolding(y)}`,
          {
            first: { index: spans[a].i, node: x.node, path: x.path, range: x.range },
            second: { index: spans[b].i, node: y.node, path: y.path, range: y.range },
          },
        );
      }
    }
  }
}
