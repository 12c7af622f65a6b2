import { formatHolding, makeHolding, type Holding } from "./config.js";
import { ConfigError, ResolutionError } from "./errors.js";
import { buildPlan, type Plan, type Selection, type TransferEdge } from "./plan.js";
import type { ContentProbe } from "./probe.js";
import {
  assertDisjoint,
  checkRange,
  coversRange,
  extentOf,
  resolveFolderRange,
  type Content,
} from "./range.js";

/**
 * Scatter: every destination receives its declared slice of the data.
 *
 * Destination i is served by source i mod n (row order), so redundant
 * sources share the load. When that source is too short for the requested
 * range the next source in rotation that covers it takes over. Files are
 * sliced by lines; folders by index into the sorted file listing, and each
 * selected file is copied whole. Everything happens in one round.
 */
export async function planScatter(
  sources: readonly Holding[],
  destinations: readonly Holding[],
  probe: ContentProbe,
): Promise<Plan> {
  if (!sources.length || !destinations.length) {
    throw new ConfigError("scatter needs at least one source and one destination");
  }
  const full = sources.map((s) => makeHolding(s.node, s.path));
  const contents: Content[] = await Promise.all(
    full.map((s) => probe.inspect(s.node, s.path)),
  );
  const kind = contents[0].kind;
  contents.forEach((c, i) => {
    if (c.kind !== kind) {
      throw new ResolutionError(
        `source ${formatHolding(full[i])} is a ${c.kind}, but ${formatHolding(full[0])} is a ${kind}`,
        { node: full[i].node, path: full[i].path },
      );
    }
  });

  const extents = contents.map(extentOf);
  const maxExtent = Math.max(...extents);
  const n = full.length;

  const edges: TransferEdge[] = destinations.map((to, i): TransferEdge => {
    const context = { destination: i, node: to.node, path: to.path };
    if (to.range) checkRange(to.range, maxExtent, context);
    // some source covers it now, since the longest one does
    let j = i % n;
    for (let step = 0; step < n; step++) {
      const candidate = (i + step) % n;
      if (coversRange(to.range, extents[candidate])) {
        j = candidate;
        break;
      }
    }
    const content = contents[j];
    const selection: Selection =
      content.kind === "file"
        ? { kind: "lines", range: to.range }
        : {
            kind: "files",
            files: resolveFolderRange(content.entries, to.range, context),
          };
    return { from: full[j], to, selection, append: false };
  });

  assertDisjoint(destinations);
  return buildPlan("scatter", [edges]);
}
