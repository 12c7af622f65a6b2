// Typed form of the CSV distribution config.
//
// A config is a list of rows `direction,node,path[,from,to]`.  Sources hold
// the data; destinations receive it.  In gather mode the roles read the other
// way around: the single source row is where the merged result is written and
// the destination rows are the nodes holding the chunks.

import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { ConfigError } from "./errors.js";

export type Mode = "broadcast" | "scatter" | "gather";
export const MODES: Mode[] = ["broadcast", "scatter", "gather"];

export type Direction = "source" | "destination";
const DIRECTIONS: Direction[] = ["source", "destination"];

// [from, to): 0-based, end-exclusive
export interface LineRange {
  readonly from: number;
  readonly to: number;
}

export interface ConfigRow {
  direction: Direction;
  node: string;
  path: string;
  from?: number;
  to?: number;
}

export interface Holding {
  readonly node: string;
  readonly path: string;
  readonly range?: LineRange;
  readonly trailingSlash: boolean;
}

export type RawRecord = Record<string, string | undefined>;

export function isMode(raw: string): raw is Mode {
  return MODES.some((m) => m === raw);
}

function isDirection(raw: string): raw is Direction {
  return DIRECTIONS.some((d) => d === raw);
}

function parseOffset(
  raw: string | undefined,
  column: "from" | "to",
  row: number,
): number | undefined {
  const value = raw?.trim();
  if (!value) return undefined;
  // spreadsheet exports like to write integers as "4.0"
  if (!/^\d+(\.0+)?$/.test(value)) {
    throw new ConfigError(
      `row ${row}: '${column}' must be a non-negative integer, got '${value}'`,
      { row, column, value },
    );
  }
  return Number.parseInt(value, 10);
}

function requiredCell(
  record: RawRecord,
  column: "direction" | "node" | "path",
  row: number,
): string {
  const value = record[column]?.trim();
  if (!value) {
    throw new ConfigError(`row ${row}: missing '${column}'`, { row, column });
  }
  return value;
}

export function parseConfigRows(records: readonly RawRecord[]): ConfigRow[] {
  return records.map((record, i) => {
    const row = i + 1;
    const direction = requiredCell(record, "direction", row).toLowerCase();
    if (!isDirection(direction)) {
      throw new ConfigError(
        `row ${row}: unknown direction '${direction}' (expected ${DIRECTIONS.join(" or ")})`,
        { row, direction },
      );
    }
    const node = requiredCell(record, "node", row);
    const path = requiredCell(record, "path", row);
    const from = parseOffset(record.from, "from", row);
    const to = parseOffset(record.to, "to", row);
    if ((from === undefined) !== (to === undefined)) {
      throw new ConfigError(
        `row ${row}: 'from' and 'to' must be given together`,
        { row, node, path, from, to },
      );
    }
    const out: ConfigRow = { direction, node, path };
    if (from !== undefined && to !== undefined) {
      out.from = from;
      out.to = to;
    }
    return out;
  });
}

function isRawRecord(value: unknown): value is RawRecord {
  if (value === null || typeof value !== "object") return false;
  return Object.values(value).every(
    (cell) => cell === undefined || typeof cell === "string",
  );
}

export function parseConfigText(text: string): ConfigRow[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: (header: string[]) =>
        header.map((h) => h.trim().toLowerCase()),
      skip_empty_lines: true,
      // range cells may be left off rows that have no range
      relax_column_count_less: true,
      trim: true,
    });
  } catch (err) {
    throw new ConfigError(
      `invalid CSV: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { cause: err },
    );
  }
  if (!Array.isArray(parsed) || !parsed.every(isRawRecord)) {
    throw new ConfigError("invalid CSV: expected a header row and records");
  }
  return parseConfigRows(parsed);
}

export async function readConfigFile(file: string): Promise<ConfigRow[]> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config '${file}'`, { file }, {
      cause: err,
    });
  }
  return parseConfigText(text);
}

export function makeHolding(
  node: string,
  path: string,
  range?: LineRange,
): Holding {
  const h = { node, path, trailingSlash: path.endsWith("/") };
  return range ? { ...h, range } : h;
}

export function toHolding(row: ConfigRow): Holding {
  const range =
    row.from !== undefined && row.to !== undefined
      ? { from: row.from, to: row.to }
      : undefined;
  return makeHolding(row.node, row.path, range);
}

export function splitRows(rows: readonly ConfigRow[]): {
  sources: Holding[];
  destinations: Holding[];
} {
  return {
    sources: rows.filter((r) => r.direction === "source").map(toHolding),
    destinations: rows
      .filter((r) => r.direction === "destination")
      .map(toHolding),
  };
}

export function assertRowCounts(
  mode: Mode,
  sources: readonly Holding[],
  destinations: readonly Holding[],
): void {
  if (mode === "gather") {
    if (sources.length !== 1) {
      throw new ConfigError(
        `gather needs exactly one source row, got ${sources.length}`,
        { mode, sources: sources.length },
      );
    }
  } else if (sources.length < 1) {
    throw new ConfigError(`${mode} needs at least one source row`, { mode });
  }
  if (destinations.length < 1) {
    throw new ConfigError(`${mode} needs at least one destination row`, {
      mode,
    });
  }
}

export function formatRange(range?: LineRange): string {
  return range ? `[${range.from},${range.to})` : "";
}

export function formatHolding(h: Holding): string {
  return `${h.node}:${h.path}${formatRange(h.range)}`;
}
