/**
 * Error utilities
 */

import { isProvisionError } from "@dockhand/core";

/**
 * Safely extract an error message from any error type.
 * Provisioning failures are prefixed with their kind and stage.
 */
export function getErrorMessage(error: unknown): string {
  if (isProvisionError(error)) {
    return `[${error.kind}] ${error.stage}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

type NodeError = Error & { code?: string };

export function isNodeError(error: unknown): error is NodeError {
  return (
    error instanceof Error && "code" in error && typeof error.code === "string"
  );
}
