import { formatHolding, makeHolding, type Holding } from "./config.js";
import { ConfigError, ResolutionError } from "./errors.js";
import { buildPlan, holdingKey, type Plan, type TransferEdge } from "./plan.js";
import type { ContentProbe } from "./probe.js";
import { assertDisjoint } from "./range.js";

export function ensureTrailingSlash(p: string): string {
  return p.endsWith("/") ? p : p + "/";
}

/**
 * Gather: rebuild at `target` what the contributors hold between them.
 *
 * For files, contributor i holds the i-th chunk, where i is its row position;
 * no offsets are stored anywhere, so this only reproduces the original when
 * the scatter that produced the chunks listed the nodes in the same order.
 * The first chunk replaces the target file and the rest are appended, which
 * is why the executor runs edges into the same target one after another.
 *
 * For folders, the contents of every contributor are merged into the target.
 */
export async function planGather(
  target: Holding,
  contributors: readonly Holding[],
  probe: ContentProbe,
): Promise<Plan> {
  if (!contributors.length) {
    throw new ConfigError("gather needs at least one contributor");
  }
  assertDisjoint(contributors, { rangedOnly: true });
  const contents = await Promise.all(
    contributors.map((c) => probe.inspect(c.node, c.path)),
  );
  const kind = contents[0].kind;
  contents.forEach((c, i) => {
    if (c.kind !== kind) {
      throw new ResolutionError(
        `contributor ${formatHolding(contributors[i])} is a ${c.kind}, but ${formatHolding(contributors[0])} is a ${kind}`,
        { node: contributors[i].node, path: contributors[i].path },
      );
    }
  });

  const to = makeHolding(target.node, target.path);
  let edges: TransferEdge[];
  if (kind === "file") {
    edges = contributors.map((c, i): TransferEdge => {
      const from = makeHolding(c.node, c.path);
      if (holdingKey(from) === holdingKey(to)) {
        throw new ConfigError(
          `contributor ${formatHolding(from)} is also the gather target`,
          { contributor: i, node: c.node, path: c.path },
        );
      }
      return { from, to, selection: { kind: "lines" }, append: i > 0 };
    });
  } else {
    edges = contributors.map((c): TransferEdge => ({
      from: makeHolding(c.node, ensureTrailingSlash(c.path)),
      to,
      selection: { kind: "entry" },
      append: false,
    }));
  }
  return buildPlan("gather", [edges]);
}
