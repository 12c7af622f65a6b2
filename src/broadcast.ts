/*
Broadcast: replicate the whole content of the source(s) to every destination.

Every node that has received the data serves as a source in the following
rounds, so the pool of sources doubles each round and N destinations are
covered in ceil(log2(N+1)) rounds from a single source:

  round 1:  a1 -> a2
  round 2:  a1 -> a3, a2 -> a4
  round 3:  a1 -> a5, a2 -> a6, a3 -> a7, a4 -> a8

Folders always travel as contents (`src/ -> dst/`). A source declared
without a trailing slash puts the folder itself into each destination, so
its name is carried along and every later hop writes to `dst/<name>/`.
That way a destination served in round 3 gets the same layout as one
served in round 1, whatever slashes the rows use.
*/

import path from "node:path";
import { formatHolding, makeHolding, type Holding } from "./config.js";
import { ResolutionError } from "./errors.js";
import {
  buildPlan,
  holdingKey,
  stripTrailingSlash,
  type Plan,
  type TransferEdge,
} from "./plan.js";
import type { ContentProbe } from "./probe.js";
import type { Content } from "./range.js";

type Member = {
  // where the data lives on this node
  root: Holding;
  // folder name each receiver nests the data under
  wrap?: string;
};

function initialMember(source: Holding, kind: Content["kind"]): Member {
  const bare = stripTrailingSlash(source.path);
  if (kind === "file") return { root: makeHolding(source.node, bare) };
  const root = makeHolding(source.node, bare === "/" ? "/" : `${bare}/`);
  return source.trailingSlash
    ? { root }
    : { root, wrap: path.posix.basename(bare) };
}

function receive(
  to: Holding,
  from: Member,
  kind: Content["kind"],
): Member {
  const bare = stripTrailingSlash(to.path);
  if (kind === "file") return { root: makeHolding(to.node, bare) };
  const dir = from.wrap ? path.posix.join(bare, from.wrap) : bare;
  return {
    root: makeHolding(to.node, dir === "/" ? "/" : `${dir}/`),
    wrap: from.wrap,
  };
}

export async function planBroadcast(
  sources: readonly Holding[],
  destinations: readonly Holding[],
  probe: ContentProbe,
): Promise<Plan> {
  const contents = await Promise.all(
    sources.map((s) => probe.inspect(s.node, s.path)),
  );
  const kind = contents[0]?.kind ?? "folder";
  contents.forEach((c, i) => {
    if (c.kind !== kind) {
      throw new ResolutionError(
        `source ${formatHolding(sources[i])} is a ${c.kind}, but ${formatHolding(sources[0])} is a ${kind}`,
        { node: sources[i].node, path: sources[i].path },
      );
    }
  });

  // a destination row naming a source location already has the data
  const held = new Set(sources.map(holdingKey));
  const rounds: TransferEdge[][] = [];
  let available: readonly Member[] = sources.map((s) => initialMember(s, kind));
  let pending: readonly Holding[] = destinations.filter(
    (d) => !held.has(holdingKey(d)),
  );
  while (pending.length > 0 && available.length > 0) {
    const k = available.length;
    const served = pending
      .slice(0, k)
      .map((to, i) => ({ feeder: available[i % k], member: receive(to, available[i % k], kind) }));
    rounds.push(
      served.map(({ feeder, member }): TransferEdge => ({
        from: feeder.root,
        to: member.root,
        selection: { kind: "entry" },
        append: false,
      })),
    );
    available = [...available, ...served.map((s) => s.member)];
    pending = pending.slice(served.length);
  }
  return buildPlan("broadcast", rounds);
}
