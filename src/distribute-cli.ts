import { Command, Option } from "commander";
import {
  FANCOPY_CONCURRENCY,
  localNodesFromEnv,
  splitNodeList,
} from "./constants.js";
import { isMode, MODES, type Mode } from "./config.js";
import { distribute, loadPlan } from "./distribute.js";
import { FancopyError } from "./errors.js";
import { ConsoleLogger, LOG_LEVELS, parseLogLevel, type Logger } from "./logger.js";
import { edgeCount, formatPlanTable } from "./plan.js";

type GlobalOptions = {
  logger: Logger;
  localNodes: string[];
  concurrency: number;
  dryRun: boolean;
};

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`expected a non-negative integer, got '${value}'`);
  }
  return n;
}

// --local a,b --local c
function collectNodes(value: string, previous: string[]): string[] {
  return [...previous, ...splitNodeList(value)];
}

function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  const level = parseLogLevel(
    typeof opts.logLevel === "string" ? opts.logLevel : undefined,
  );
  const local: unknown = opts.local;
  return {
    logger: new ConsoleLogger(level),
    localNodes: Array.isArray(local) ? local.map(String) : [],
    concurrency:
      typeof opts.concurrency === "number" ? opts.concurrency : FANCOPY_CONCURRENCY,
    dryRun: opts.dryRun === true,
  };
}

async function reportErrors(logger: Logger, fn: () => Promise<void>) {
  try {
    await fn();
  } catch (err) {
    if (err instanceof FancopyError) {
      logger.error(err.message, err.context);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

export function addGlobalOptions(program: Command): Command {
  return program
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .option(
      "--local <nodes>",
      "comma-separated node names that refer to this machine (no ssh hop); repeatable",
      collectNodes,
      localNodesFromEnv(),
    )
    .option(
      "--concurrency <n>",
      "max transfers running at once within a round (0 = all)",
      parseCount,
      FANCOPY_CONCURRENCY,
    )
    .option("--dry-run", "compile and log the plan without copying", false);
}

const DESCRIPTIONS: Record<Mode, string> = {
  broadcast:
    "copy the source(s) to every destination; every finished destination becomes a source",
  scatter:
    "copy each destination its [from,to) slice (lines of a file, files of a folder)",
  gather:
    "rebuild the single source from the destinations' parts, in row order",
};

export function registerDistributeCommands(program: Command): Command {
  for (const mode of MODES) {
    program
      .command(mode)
      .description(DESCRIPTIONS[mode])
      .argument("<config>", "CSV with columns direction,node,path[,from,to]")
      .action(async (config: string, _opts: unknown, command: Command) => {
        const { logger, ...rest } = globalOptions(command);
        await reportErrors(logger, async () => {
          const { summary } = await distribute({ mode, config, logger, ...rest });
          logger.info(`${mode} finished`, { ...summary, dryRun: rest.dryRun });
        });
      });
  }

  program
    .command("plan")
    .description("show the transfer plan for a config without running it")
    .addArgument(
      program.createArgument("<mode>", "planning mode").choices(MODES),
    )
    .argument("<config>", "CSV with columns direction,node,path[,from,to]")
    .addOption(new Option("--json", "print the plan as JSON"))
    .action(
      async (
        mode: string,
        config: string,
        opts: { json?: boolean },
        command: Command,
      ) => {
        const { logger, localNodes } = globalOptions(command);
        await reportErrors(logger, async () => {
          if (!isMode(mode)) throw new FancopyError(`unknown mode '${mode}'`);
          const plan = await loadPlan({ mode, config, localNodes, logger });
          if (opts.json) {
            console.log(JSON.stringify(plan, null, 2));
            return;
          }
          if (!edgeCount(plan)) {
            console.log("nothing to transfer");
            return;
          }
          console.log(formatPlanTable(plan));
        });
      },
    );

  return program;
}
