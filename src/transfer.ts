/*
The copy primitive: one TransferEdge becomes one process.

- whole entries and file subsets go through `rsync -a`; a trailing slash on
  the source path copies the folder's contents, no trailing slash copies the
  folder itself, exactly as rsync does;
- line ranges are cut with `sed` at the source and written with `cat` at the
  destination, piped through ssh.

Nodes listed as local are addressed without ssh.
*/

import path from "node:path";
import { stripTrailingSlash, type TransferEdge } from "./plan.js";
import { formatHolding } from "./config.js";
import { TransferError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { Transport } from "./executor.js";
import {
  runProcess,
  shellEscape,
  shellPath,
  sshBaseArgs,
  sshCommandLine,
} from "./remote.js";

export type CopyCommand = {
  command: string;
  args: string[];
  input?: string;
};

export interface TransferOptions {
  localNodes?: readonly string[];
  logger?: Logger;
}

function parentDir(p: string): string {
  return path.posix.dirname(stripTrailingSlash(p));
}

function rsyncArgs(edge: TransferEdge, viaSsh: boolean): string[] {
  const args = ["-a"];
  if (viaSsh) {
    args.push("-e", shellEscape(["ssh", ...sshBaseArgs()].join(" ")));
  }
  if (edge.selection.kind === "files") args.push("--files-from=-");
  return args;
}

function linesCommand(
  edge: TransferEdge,
  isLocal: (node: string) => boolean,
): CopyCommand {
  const { from, to, selection } = edge;
  if (selection.kind !== "lines") {
    throw new Error(`not a line transfer: ${selection.kind}`);
  }
  // [from, to) 0-based is sed's from+1..to
  const read = selection.range
    ? `sed -n ${shellEscape(`${selection.range.from + 1},${selection.range.to}p`)} ${shellPath(from.path)}`
    : `cat ${shellPath(from.path)}`;
  const write = `mkdir -p ${shellPath(parentDir(to.path))} && cat ${edge.append ? ">>" : ">"} ${shellPath(to.path)}`;
  const producer = isLocal(from.node) ? read : sshCommandLine(from.node, read);
  const consumer = isLocal(to.node)
    ? `{ ${write}; }`
    : sshCommandLine(to.node, write);
  return {
    command: "bash",
    args: ["-c", `set -o pipefail; ${producer} | ${consumer}`],
  };
}

function rsyncCommand(
  edge: TransferEdge,
  isLocal: (node: string) => boolean,
): CopyCommand {
  const { from, to, selection } = edge;
  const input =
    selection.kind === "files" ? selection.files.join("\n") + "\n" : undefined;
  const mkdir = `mkdir -p ${shellPath(parentDir(to.path))}`;

  if (!isLocal(to.node)) {
    if (isLocal(from.node)) {
      // push from here
      const args = rsyncArgs(edge, true);
      const script = [
        sshCommandLine(to.node, mkdir, { noStdin: true }),
        "&&",
        "rsync",
        ...args,
        shellPath(from.path),
        shellEscape(`${to.node}:${to.path}`),
      ].join(" ");
      return { command: "sh", args: ["-c", script], input };
    }
    // the destination pulls from the source
    const script = [
      mkdir,
      "&&",
      "rsync",
      ...rsyncArgs(edge, true),
      shellEscape(`${from.node}:${from.path}`),
      shellPath(to.path),
    ].join(" ");
    return {
      command: "ssh",
      args: [...sshBaseArgs({ noStdin: input === undefined }), to.node, script],
      input,
    };
  }

  const remoteSource = !isLocal(from.node);
  const script = [
    mkdir,
    "&&",
    "rsync",
    ...rsyncArgs(edge, remoteSource),
    remoteSource
      ? shellEscape(`${from.node}:${from.path}`)
      : shellPath(from.path),
    shellPath(to.path),
  ].join(" ");
  return { command: "sh", args: ["-c", script], input };
}

export function buildCopyCommand(
  edge: TransferEdge,
  { localNodes = [] }: { localNodes?: readonly string[] } = {},
): CopyCommand {
  const local = new Set(localNodes);
  const isLocal = (node: string) => local.has(node);
  return edge.selection.kind === "lines"
    ? linesCommand(edge, isLocal)
    : rsyncCommand(edge, isLocal);
}

export class RsyncTransport implements Transport {
  private readonly localNodes: readonly string[];
  private readonly logger: Logger;

  constructor({ localNodes = [], logger = new NullLogger() }: TransferOptions = {}) {
    this.localNodes = localNodes;
    this.logger = logger;
  }

  async copy(edge: TransferEdge): Promise<void> {
    const { command, args, input } = buildCopyCommand(edge, {
      localNodes: this.localNodes,
    });
    const label = `${formatHolding(edge.from)} -> ${formatHolding(edge.to)}`;
    const res = await runProcess(command, args, {
      input,
      logger: this.logger,
      label,
    });
    if (res.code !== 0) {
      throw new TransferError(
        `copy ${label} failed (exit ${res.code})${res.stderr.trim() ? `: ${res.stderr.trim()}` : ""}`,
        null,
        [],
        {
          from: formatHolding(edge.from),
          to: formatHolding(edge.to),
          code: res.code,
        },
      );
    }
  }
}
