export const CLI_NAME = "fancopy";

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

// 0 means every lane of a round runs at once
export const FANCOPY_CONCURRENCY = envInt("FANCOPY_CONCURRENCY", 0);

// seconds, passed to ssh as ConnectTimeout
export const FANCOPY_SSH_TIMEOUT = envInt("FANCOPY_SSH_TIMEOUT", 10);

// "a, b,c" -> ["a", "b", "c"]
export function splitNodeList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function localNodesFromEnv(): string[] {
  return splitNodeList(process.env.FANCOPY_LOCAL_NODES ?? "");
}
