import type { ProvisionFailureKind, StageName } from "./types";

export type ProvisionErrorOptions = {
  kind: ProvisionFailureKind;
  stage: StageName;
  /** Exit status of the failed command, when there was one */
  exitCode?: number;
  /** Command line that failed */
  command?: string;
  cause?: unknown;
};

/**
 * Fatal build-time failure. Nothing after the failing step runs and the
 * build is never retried from this layer.
 */
export class ProvisionError extends Error {
  readonly kind: ProvisionFailureKind;
  readonly stage: StageName;
  readonly exitCode?: number;
  readonly command?: string;

  constructor(message: string, options: ProvisionErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "ProvisionError";
    this.kind = options.kind;
    this.stage = options.stage;
    this.exitCode = options.exitCode;
    this.command = options.command;
  }
}

export function isProvisionError(error: unknown): error is ProvisionError {
  return error instanceof ProvisionError;
}
