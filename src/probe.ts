// Determines what a holding refers to: a file (and how many lines it has)
// or a folder (and which files are under it).

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import { ResolutionError, toError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { runSsh, shellPath, type ProcessResult } from "./remote.js";
import { sortEntries, type Content } from "./range.js";

export interface ContentProbe {
  inspect(node: string, path: string): Promise<Content>;
}

export function probeScript(p: string): string {
  const q = shellPath(p);
  return [
    `if [ -f ${q} ]; then printf 'file\\n'; wc -l < ${q};`,
    `elif [ -d ${q} ]; then printf 'folder\\n'; cd ${q} && find . -type f -print0;`,
    `else printf 'missing\\n'; fi`,
  ].join(" ");
}

export function parseProbeOutput(
  stdout: string,
  context: { node: string; path: string },
): Content {
  const nl = stdout.indexOf("\n");
  const head = nl < 0 ? stdout.trim() : stdout.slice(0, nl).trim();
  const rest = nl < 0 ? "" : stdout.slice(nl + 1);
  switch (head) {
    case "file": {
      const lines = Number.parseInt(rest.trim(), 10);
      if (!Number.isFinite(lines) || lines < 0) {
        throw new ResolutionError(
          `cannot count lines of ${context.node}:${context.path}`,
          { ...context, output: rest },
        );
      }
      return { kind: "file", lines };
    }
    case "folder": {
      const entries = rest
        .split("\0")
        .filter(Boolean)
        .map((e) => (e.startsWith("./") ? e.slice(2) : e));
      return { kind: "folder", entries: sortEntries(entries) };
    }
    case "missing":
      throw new ResolutionError(
        `${context.node}:${context.path} is neither a file nor a folder`,
        context,
      );
    default:
      throw new ResolutionError(
        `unexpected probe output from ${context.node}`,
        { ...context, output: stdout.slice(0, 200) },
      );
  }
}

export class SshProbe implements ContentProbe {
  constructor(private readonly logger: Logger = new NullLogger()) {}

  async inspect(node: string, p: string): Promise<Content> {
    let res: ProcessResult;
    try {
      res = await runSsh(node, probeScript(p), {
        logger: this.logger,
        label: "probe",
      });
    } catch (err) {
      throw new ResolutionError(`cannot reach ${node}`, { node, path: p }, {
        cause: err,
      });
    }
    if (res.code !== 0) {
      throw new ResolutionError(
        `probe of ${node}:${p} failed (exit ${res.code})`,
        { node, path: p, stderr: res.stderr.trim() },
      );
    }
    return parseProbeOutput(res.stdout, { node, path: p });
  }
}

function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return path.join(homedir(), p.slice(2));
  return p;
}

// Same count as `wc -l`: the number of newline bytes.
export async function countLines(file: string): Promise<number> {
  let lines = 0;
  for await (const chunk of createReadStream(file)) {
    const buf: Buffer = chunk;
    for (let i = buf.indexOf(10); i !== -1; i = buf.indexOf(10, i + 1)) {
      lines++;
    }
  }
  return lines;
}

export function listFiles(root: string): Promise<string[]> {
  return new Promise((resolve, reject) => {
    walk.walk(
      root,
      {
        followSymbolicLinks: false,
        entryFilter: (e) => e.dirent.isFile(),
      },
      (err, entries) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(
          entries.map((e) =>
            path.relative(root, e.path).split(path.sep).join("/"),
          ),
        );
      },
    );
  });
}

// For nodes that are this machine: no ssh round trip.
export class LocalProbe implements ContentProbe {
  async inspect(node: string, p: string): Promise<Content> {
    const abs = expandHome(p);
    try {
      const st = await stat(abs);
      if (st.isFile()) {
        return { kind: "file", lines: await countLines(abs) };
      }
      if (st.isDirectory()) {
        return { kind: "folder", entries: sortEntries(await listFiles(abs)) };
      }
    } catch (err) {
      throw new ResolutionError(
        `cannot inspect ${node}:${p}: ${toError(err).message}`,
        { node, path: p },
        { cause: err },
      );
    }
    throw new ResolutionError(`${node}:${p} is neither a file nor a folder`, {
      node,
      path: p,
    });
  }
}

export function createProbe({
  localNodes = [],
  logger = new NullLogger(),
}: { localNodes?: readonly string[]; logger?: Logger } = {}): ContentProbe {
  const local = new LocalProbe();
  const remote = new SshProbe(logger.child("probe"));
  const isLocal = new Set(localNodes);
  return {
    inspect: (node, p) =>
      isLocal.has(node) ? local.inspect(node, p) : remote.inspect(node, p),
  };
}

// Every (node, path) is looked at once per compile.
export function memoizeProbe(probe: ContentProbe): ContentProbe {
  const cache = new Map<string, Promise<Content>>();
  return {
    inspect(node, p) {
      const key = `${node}\0${p}`;
      let hit = cache.get(key);
      if (!hit) {
        hit = probe.inspect(node, p);
        cache.set(key, hit);
      }
      return hit;
    },
  };
}
