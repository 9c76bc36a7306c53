import type { ErrorKind, StepName } from "./types.ts";

export class ProvisionError extends Error {
  readonly kind: ErrorKind;
  readonly step?: StepName;
  readonly logTail?: string;

  constructor(kind: ErrorKind, message: string, opts: { step?: StepName; logTail?: string; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "ProvisionError";
    this.kind = kind;
    this.step = opts.step;
    this.logTail = opts.logTail;
  }
}

/** Raised while resolving configuration, before any step runs. */
export class ConfigError extends Error {
  readonly source: string;

  constructor(source: string, message: string, opts: { cause?: unknown } = {}) {
    super(`${source}: ${message}`, { cause: opts.cause });
    this.name = "ConfigError";
    this.source = source;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
