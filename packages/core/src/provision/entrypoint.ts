import type { Acquisition, ProvisionConfig } from "./types";

/**
 * Argument vector that starts the auth tool.
 *
 * - Explicit `entrypoint` in the config wins
 * - pinned-package: the installed console command
 * - source-checkout: interpreter + script inside the checkout
 */
export function resolveEntrypoint(
  config: Pick<ProvisionConfig, "acquisition" | "entrypoint">
): string[] {
  if (config.entrypoint && config.entrypoint.length > 0) {
    return [...config.entrypoint];
  }
  return defaultEntrypoint(config.acquisition);
}

export function defaultEntrypoint(acquisition: Acquisition): string[] {
  switch (acquisition.mode) {
    case "pinned-package":
      return [acquisition.command ?? acquisition.packageName];
    case "source-checkout":
      return [acquisition.interpreter, acquisition.scriptPath];
    default: {
      const exhaustive: never = acquisition;
      throw new Error(`Unknown acquisition mode: ${String(exhaustive)}`);
    }
  }
}
