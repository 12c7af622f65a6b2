#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { CLI_NAME } from "./constants.js";
import {
  addGlobalOptions,
  registerDistributeCommands,
} from "./distribute-cli.js";

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // not fatal; --version just says so
  }
  return "unknown";
}

const program = new Command()
  .name(CLI_NAME)
  .description(
    "Broadcast, scatter and gather files and folders across nodes with rsync over ssh",
  )
  .version(packageVersion());

addGlobalOptions(program);
registerDistributeCommands(program);

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
