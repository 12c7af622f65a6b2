// remote.ts: spawning ssh and local shell commands

import { spawn } from "node:child_process";
import type { Logger } from "./logger.js";
import { FANCOPY_SSH_TIMEOUT } from "./constants.js";

// single-quote safe escape for sh -c
export function shellEscape(s: string): string {
  return `'${String(s).replace(/'/g, `'\\''`)}'`;
}

// like shellEscape, but lets the shell expand a leading ~ to $HOME
export function shellPath(p: string): string {
  if (p === "~") return '"$HOME"';
  if (p.startsWith("~/")) return `"$HOME"/${shellEscape(p.slice(2))}`;
  return shellEscape(p);
}

export function argsJoin(args: string[]): string {
  return args.map((x) => (x.includes(" ") ? `'${x}'` : x)).join(" ");
}

export function sshBaseArgs({
  timeout = FANCOPY_SSH_TIMEOUT,
  noStdin = false,
}: { timeout?: number; noStdin?: boolean } = {}): string[] {
  const args = ["-o", `ConnectTimeout=${timeout}`, "-T", "-o", "BatchMode=yes"];
  if (noStdin) args.unshift("-n");
  return args;
}

// `ssh host 'cmd'` as one shell word list, for embedding in a pipeline
export function sshCommandLine(
  host: string,
  command: string,
  { noStdin = false }: { noStdin?: boolean } = {},
): string {
  return [
    "ssh",
    ...sshBaseArgs({ noStdin }),
    shellEscape(host),
    shellEscape(command),
  ].join(" ");
}

export type ProcessResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export async function runProcess(
  command: string,
  args: string[],
  {
    input,
    logger,
    label,
  }: { input?: string; logger?: Logger; label?: string } = {},
): Promise<ProcessResult> {
  logger?.debug("exec", { command: `${command} ${argsJoin(args)}`, label });
  let stdout = "";
  let stderr = "";
  const code = await new Promise<number | null>((resolve, reject) => {
    const p = spawn(command, args, {
      stdio: [input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });
    p.stdout?.setEncoding("utf8");
    p.stdout?.on("data", (c: string) => (stdout += c));
    p.stderr?.setEncoding("utf8");
    p.stderr?.on("data", (c: string) => (stderr += c));
    p.once("error", reject);
    p.once("close", (c) => resolve(c));
    if (input !== undefined && p.stdin) {
      p.stdin.on("error", reject);
      p.stdin.end(input);
    }
  });
  return { code, stdout, stderr };
}

export async function runSsh(
  host: string,
  command: string,
  opts: { input?: string; logger?: Logger; label?: string } = {},
): Promise<ProcessResult> {
  return await runProcess(
    "ssh",
    [...sshBaseArgs({ noStdin: opts.input === undefined }), host, command],
    opts,
  );
}
