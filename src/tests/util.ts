import path from "node:path";
import { makeHolding, type ConfigRow, type Holding } from "../config.js";
import type { Transport } from "../executor.js";
import type { TransferEdge } from "../plan.js";
import type { ContentProbe } from "../probe.js";
import { sortEntries, type Content } from "../range.js";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export function h(node: string, p: string, from?: number, to?: number): Holding {
  return from !== undefined && to !== undefined
    ? makeHolding(node, p, { from, to })
    : makeHolding(node, p);
}

export function src(node: string, p: string): ConfigRow {
  return { direction: "source", node, path: p };
}

export function dst(node: string, p: string, from?: number, to?: number): ConfigRow {
  const row: ConfigRow = { direction: "destination", node, path: p };
  if (from !== undefined && to !== undefined) {
    row.from = from;
    row.to = to;
  }
  return row;
}

export function edgeNames(edges: readonly TransferEdge[]): string[] {
  return edges.map((e) => `${e.from.node}->${e.to.node}`);
}

export function numberedLines(n: number, prefix = "line"): string {
  return Array.from({ length: n }, (_, i) => `${prefix} ${i}\n`).join("");
}

// A fixed answer per node:path.
export class StaticProbe implements ContentProbe {
  readonly calls: string[] = [];
  constructor(private readonly contents: Record<string, Content>) {}

  async inspect(node: string, p: string): Promise<Content> {
    const key = `${node}:${p}`;
    this.calls.push(key);
    const c = this.contents[key];
    if (!c) throw new Error(`no content for ${key}`);
    return c;
  }
}

// The same answer for every node:path.
export class UniformProbe implements ContentProbe {
  constructor(private readonly content: Content) {}

  async inspect(): Promise<Content> {
    return this.content;
  }
}

export class RecordingTransport implements Transport {
  readonly edges: TransferEdge[] = [];
  constructor(
    private readonly behavior: (edge: TransferEdge) => Promise<void> = async () => {},
  ) {}

  async copy(edge: TransferEdge): Promise<void> {
    this.edges.push(edge);
    await this.behavior(edge);
  }
}

const trim = (p: string) => p.replace(/\/+$/, "");

/**
 * Files of several nodes kept in one map keyed "node:/abs/path", with copy
 * semantics close enough to rsync and sed/cat for round trips.
 */
export class MemoryCluster implements ContentProbe, Transport {
  readonly files = new Map<string, string>();

  write(node: string, p: string, text: string) {
    this.files.set(`${node}:${p}`, text);
  }

  read(node: string, p: string): string | undefined {
    return this.files.get(`${node}:${p}`);
  }

  list(node: string, dir: string): string[] {
    const prefix = `${node}:${trim(dir)}/`;
    return sortEntries(
      Array.from(this.files.keys())
        .filter((k) => k.startsWith(prefix))
        .map((k) => k.slice(prefix.length)),
    );
  }

  async inspect(node: string, p: string): Promise<Content> {
    const text = this.read(node, trim(p));
    if (text !== undefined) {
      return { kind: "file", lines: text.split("\n").length - 1 };
    }
    const entries = this.list(node, p);
    if (!entries.length) throw new Error(`missing ${node}:${p}`);
    return { kind: "folder", entries };
  }

  async copy(edge: TransferEdge): Promise<void> {
    const { from, to, selection } = edge;
    switch (selection.kind) {
      case "lines": {
        const text = this.read(from.node, from.path);
        if (text === undefined) throw new Error(`missing ${from.node}:${from.path}`);
        let chunk = text;
        if (selection.range) {
          const { from: a, to: b } = selection.range;
          chunk = text
            .split("\n")
            .slice(a, b)
            .map((l) => l + "\n")
            .join("");
        }
        const before = edge.append ? (this.read(to.node, to.path) ?? "") : "";
        this.write(to.node, to.path, before + chunk);
        return;
      }
      case "files": {
        for (const rel of selection.files) {
          const text = this.read(from.node, `${trim(from.path)}/${rel}`);
          if (text === undefined) throw new Error(`missing ${rel}`);
          this.write(to.node, `${trim(to.path)}/${rel}`, text);
        }
        return;
      }
      case "entry": {
        const single = this.read(from.node, trim(from.path));
        if (single !== undefined) {
          this.write(to.node, trim(to.path), single);
          return;
        }
        const base = from.trailingSlash
          ? trim(to.path)
          : `${trim(to.path)}/${path.posix.basename(trim(from.path))}`;
        for (const rel of this.list(from.node, from.path)) {
          const text = this.read(from.node, `${trim(from.path)}/${rel}`);
          if (text !== undefined) this.write(to.node, `${base}/${rel}`, text);
        }
        return;
      }
    }
  }
}
