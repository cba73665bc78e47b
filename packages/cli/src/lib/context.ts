/**
 * Application Context
 *
 * Loads the provisioning config once at startup so every command sees the
 * same validated values (file + DOCKHAND_* overrides).
 */

import type { ProvisionConfig } from "@dockhand/core";
import { loadConfig } from "./config";
import { log } from "./log";

export type AppContext = {
  /** Absolute path of the config file (may not exist) */
  configPath: string;
  /** Validated provisioning config */
  config: ProvisionConfig;
  /** False when built-in defaults are in use */
  fromFile: boolean;
  /** Non-fatal findings from loading and validation */
  warnings: string[];
};

export type CreateAppContextOptions = {
  /** Explicit config path (--config) */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

export async function createAppContext(
  options: CreateAppContextOptions = {}
): Promise<AppContext> {
  log.debug("Loading app context");
  const loaded = await loadConfig({
    path: options.configPath,
    env: options.env,
  });

  log.debug(
    `App context loaded: mode=${loaded.config.acquisition.mode}, fromFile=${loaded.fromFile}`
  );

  return {
    configPath: loaded.configPath,
    config: loaded.config,
    fromFile: loaded.fromFile,
    warnings: loaded.warnings,
  };
}

// =============================================================================
// Global context singleton (for commands that need it)
// =============================================================================

let globalContext: AppContext | null = null;

/**
 * Gets the global app context, failing when config could not be loaded.
 */
export function requireAppContext(): AppContext {
  if (!globalContext) {
    throw new Error("Provisioning config is not loaded.");
  }
  return globalContext;
}

/**
 * Initializes the global app context. Call this once at startup.
 */
export async function initAppContext(
  options: CreateAppContextOptions = {}
): Promise<AppContext> {
  globalContext = await createAppContext(options);
  return globalContext;
}

export function resetAppContext() {
  globalContext = null;
}
