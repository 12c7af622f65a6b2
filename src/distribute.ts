import { readConfigFile, type Mode } from "./config.js";
import { compilePlan } from "./compile.js";
import {
  executePlan,
  type ExecutionSummary,
  type Transport,
} from "./executor.js";
import { NullLogger, type Logger } from "./logger.js";
import type { Plan } from "./plan.js";
import type { ContentProbe } from "./probe.js";
import { RsyncTransport } from "./transfer.js";

export interface DistributeOptions {
  mode: Mode;
  config: string;
  localNodes?: readonly string[];
  concurrency?: number;
  dryRun?: boolean;
  logger?: Logger;
  // defaults: ssh/local probe and rsync transport
  probe?: ContentProbe;
  transport?: Transport;
}

export async function loadPlan({
  mode,
  config,
  localNodes = [],
  logger = new NullLogger(),
  probe,
}: Pick<
  DistributeOptions,
  "mode" | "config" | "localNodes" | "logger" | "probe"
>): Promise<Plan> {
  const rows = await readConfigFile(config);
  logger.debug("read config", { config, rows: rows.length });
  return await compilePlan(mode, rows, { probe, localNodes, logger });
}

export async function distribute(
  opts: DistributeOptions,
): Promise<{ plan: Plan; summary: ExecutionSummary }> {
  const logger = opts.logger ?? new NullLogger();
  const localNodes = opts.localNodes ?? [];
  const plan = await loadPlan({ ...opts, localNodes, logger });
  const transport =
    opts.transport ??
    new RsyncTransport({ localNodes, logger: logger.child("transfer") });
  const summary = await executePlan(plan, transport, {
    logger: logger.child(opts.mode),
    concurrency: opts.concurrency,
    dryRun: opts.dryRun,
    onProgress: ({ completed, total }) =>
      logger.info(`${completed}/${total} transfers done`),
  });
  return { plan, summary };
}
