// executor.ts: runs a compiled plan round by round

import { formatHolding } from "./config.js";
import { TransferError, toError, type EdgeFailure } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  describeSelection,
  edgeCount,
  holdingKey,
  type Plan,
  type TransferEdge,
} from "./plan.js";

export interface Transport {
  copy(edge: TransferEdge): Promise<void>;
}

export type ExecutionProgress = {
  round: number;
  rounds: number;
  completed: number;
  total: number;
  edge: TransferEdge;
};

export interface ExecuteOptions {
  logger?: Logger;
  // max write lanes running at once within a round; 0 = no limit
  concurrency?: number;
  dryRun?: boolean;
  onProgress?: (progress: ExecutionProgress) => void;
}

export type ExecutionSummary = {
  rounds: number;
  transfers: number;
};

async function parallelMapLimit<T>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
  stop: () => boolean,
): Promise<void> {
  if (items.length === 0) return;
  const k = Math.max(1, Math.min(concurrency, items.length));
  let i = 0;
  const workers = Array.from({ length: k }, async () => {
    while (!stop()) {
      const idx = i++;
      if (idx >= items.length) break;
      await fn(items[idx], idx);
    }
  });
  await Promise.all(workers);
}

/**
 * Edges of a round grouped by the holding they write, in plan order.
 * Different lanes are independent; edges in a lane must run in order
 * (gather appends chunk after chunk into one file).
 *
 * A copy streams its read straight into its write, so a lane also
 * serializes the reads: a file gather takes the sum of its contributors'
 * transfer times, not the longest one.
 */
export function writeLanes(edges: readonly TransferEdge[]): TransferEdge[][] {
  const lanes = new Map<string, TransferEdge[]>();
  for (const edge of edges) {
    const key = holdingKey(edge.to);
    const lane = lanes.get(key);
    if (lane) lane.push(edge);
    else lanes.set(key, [edge]);
  }
  return Array.from(lanes.values());
}

function edgeMeta(edge: TransferEdge): Record<string, unknown> {
  return {
    from: formatHolding(edge.from),
    to: formatHolding(edge.to),
    transfer: describeSelection(edge),
  };
}

/**
 * Runs each round to completion before the next one starts, since a round
 * may read what the previous one wrote. After an edge fails no further edge
 * is started; those in flight are awaited and the round's failures are
 * thrown together as a TransferError.
 */
export async function executePlan(
  plan: Plan,
  transport: Transport,
  {
    logger = new NullLogger(),
    concurrency = 0,
    dryRun = false,
    onProgress,
  }: ExecuteOptions = {},
): Promise<ExecutionSummary> {
  const rounds = plan.rounds.length;
  const total = edgeCount(plan);
  let completed = 0;

  for (const round of plan.rounds) {
    const lanes = writeLanes(round.edges);
    const label = `round ${round.index + 1}/${rounds}`;
    logger.info(`${label}: ${round.edges.length} transfer(s)`, {
      mode: plan.mode,
      lanes: lanes.length,
    });

    const failures: EdgeFailure[] = [];
    await parallelMapLimit(
      lanes,
      concurrency > 0 ? concurrency : lanes.length,
      async (lane) => {
        for (const edge of lane) {
          if (failures.length) return;
          logger.debug(dryRun ? "would copy" : "copy", edgeMeta(edge));
          try {
            if (!dryRun) await transport.copy(edge);
          } catch (err) {
            const error = toError(err);
            failures.push({ edge, error });
            logger.error(`${label}: transfer failed`, {
              ...edgeMeta(edge),
              error: error.message,
            });
            return;
          }
          completed++;
          try {
            onProgress?.({ round: round.index, rounds, completed, total, edge });
          } catch (err) {
            logger.warn("progress handler failed", {
              error: toError(err).message,
            });
          }
        }
      },
      () => failures.length > 0,
    );

    if (failures.length) {
      throw new TransferError(
        `${label} failed: ${failures
          .map((f) => `${formatHolding(f.edge.from)} -> ${formatHolding(f.edge.to)}: ${f.error.message}`)
          .join("; ")}`,
        round.index,
        failures,
        { mode: plan.mode, remainingRounds: rounds - round.index - 1 },
      );
    }
  }

  return { rounds, transfers: completed };
}
