import {
  assertRowCounts,
  splitRows,
  type ConfigRow,
  type Mode,
} from "./config.js";
import { planBroadcast } from "./broadcast.js";
import { ConfigError } from "./errors.js";
import { planScatter } from "./scatter.js";
import { planGather } from "./gather.js";
import { NullLogger, type Logger } from "./logger.js";
import { assertPlanConsistent, edgeCount, type Plan } from "./plan.js";
import { createProbe, memoizeProbe, type ContentProbe } from "./probe.js";

export interface CompileOptions {
  probe?: ContentProbe;
  localNodes?: readonly string[];
  logger?: Logger;
}

export async function compilePlan(
  mode: Mode,
  rows: readonly ConfigRow[],
  { probe, localNodes, logger = new NullLogger() }: CompileOptions = {},
): Promise<Plan> {
  const { sources, destinations } = splitRows(rows);
  assertRowCounts(mode, sources, destinations);
  const inspect = memoizeProbe(
    probe ?? createProbe({ localNodes, logger: logger.child("compile") }),
  );

  let plan: Plan;
  switch (mode) {
    case "broadcast":
      plan = await planBroadcast(sources, destinations, inspect);
      assertPlanConsistent(plan, sources);
      break;
    case "scatter":
      plan = await planScatter(sources, destinations, inspect);
      assertPlanConsistent(plan, sources);
      break;
    case "gather":
      // contributors are read, the single source row is written
      plan = await planGather(sources[0], destinations, inspect);
      assertPlanConsistent(plan, destinations);
      break;
    default: {
      const unknown: never = mode;
      throw new ConfigError(`unknown mode '${String(unknown)}'`);
    }
  }
  logger.debug("compiled plan", {
    mode,
    rounds: plan.rounds.length,
    edges: edgeCount(plan),
  });
  return plan;
}
