import type { TransferEdge } from "./plan.js";

export class FancopyError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FancopyError";
  }
}

// Rejected before anything is planned or executed.
export class ConfigError extends FancopyError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "ConfigError";
  }
}

export class ResolutionError extends FancopyError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "ResolutionError";
  }
}

export type EdgeFailure = {
  edge: TransferEdge;
  error: Error;
};

export class TransferError extends FancopyError {
  constructor(
    message: string,
    public readonly round: number | null,
    public readonly failures: readonly EdgeFailure[] = [],
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, { ...context, round }, options);
    this.name = "TransferError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
