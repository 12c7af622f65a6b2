import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import {
  formatHolding,
  formatRange,
  type Holding,
  type LineRange,
  type Mode,
} from "./config.js";
import { ConfigError } from "./errors.js";

export type Selection =
  // the whole file or folder, trailing-slash semantics apply
  | { kind: "entry" }
  // these files (relative to the source folder)
  | { kind: "files"; files: readonly string[] }
  // a line range of a file, or all of it
  | { kind: "lines"; range?: LineRange };

export interface TransferEdge {
  readonly from: Holding;
  readonly to: Holding;
  readonly selection: Selection;
  // lines only: append to the destination instead of replacing it
  readonly append: boolean;
}

export interface Round {
  readonly index: number;
  readonly edges: readonly TransferEdge[];
}

export interface Plan {
  readonly mode: Mode;
  readonly rounds: readonly Round[];
}

export function stripTrailingSlash(p: string): string {
  const stripped = p.replace(/\/+$/, "");
  return stripped || (p ? "/" : p);
}

// Identity of the data location an edge writes to or reads from.
export function holdingKey(h: Holding): string {
  return `${h.node}:${stripTrailingSlash(h.path)}`;
}

export function isSelfLoop(edge: TransferEdge): boolean {
  return holdingKey(edge.from) === holdingKey(edge.to);
}

export function buildPlan(
  mode: Mode,
  rounds: readonly (readonly TransferEdge[])[],
): Plan {
  const out: Round[] = [];
  for (const edges of rounds) {
    const kept = edges.filter((e) => !isSelfLoop(e));
    if (kept.length) out.push({ index: out.length, edges: kept });
  }
  return { mode, rounds: out };
}

export function edgeCount(plan: Plan): number {
  return plan.rounds.reduce((n, r) => n + r.edges.length, 0);
}

/**
 * Checks the ordering invariants of a compiled plan:
 * every edge reads a holding that was declared up front or written by an
 * earlier round, and (outside gather) no two edges of one round write the
 * same holding.
 */
export function assertPlanConsistent(
  plan: Plan,
  initial: readonly Holding[],
): void {
  const established = new Set(initial.map(holdingKey));
  for (const round of plan.rounds) {
    const written = new Set<string>();
    for (const edge of round.edges) {
      const src = holdingKey(edge.from);
      if (!established.has(src)) {
        throw new ConfigError(
          `round ${round.index} reads ${formatHolding(edge.from)} before it is written`,
          { round: round.index, node: edge.from.node, path: edge.from.path },
        );
      }
      const dst = holdingKey(edge.to);
      if (plan.mode !== "gather" && written.has(dst)) {
        throw new ConfigError(
          `round ${round.index} writes ${formatHolding(edge.to)} more than once`,
          { round: round.index, node: edge.to.node, path: edge.to.path },
        );
      }
      written.add(dst);
    }
    for (const key of written) established.add(key);
  }
}

export function describeSelection(edge: TransferEdge): string {
  const { selection } = edge;
  switch (selection.kind) {
    case "entry":
      return edge.from.trailingSlash ? "contents" : "entry";
    case "files":
      return `${selection.files.length} file(s)`;
    case "lines": {
      const lines = selection.range
        ? `lines ${formatRange(selection.range)}`
        : "all lines";
      return edge.append ? `${lines}, append` : lines;
    }
  }
}

export function formatPlanTable(plan: Plan): string {
  const table = new AsciiTable3(`${plan.mode} plan`)
    .setHeading("Round", "From", "To", "Transfer")
    .setStyle("unicode-round");
  [0, 1, 2, 3].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  for (const round of plan.rounds) {
    for (const edge of round.edges) {
      table.addRow(
        String(round.index + 1),
        formatHolding(edge.from),
        formatHolding(edge.to),
        describeSelection(edge),
      );
    }
  }
  return table.toString();
}
