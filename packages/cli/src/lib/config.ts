import {
  DEFAULT_RUNTIME,
  DEFAULT_SYSTEM_PACKAGES,
  DEFAULT_TOOL_COMMAND,
  DEFAULT_TOOL_PACKAGE,
  DEFAULT_TOOL_VERSION,
  DEFAULT_WORKDIR,
  PROVISION_CONFIG_FILENAME,
  type ProvisionConfig,
  type RawProvisionConfig,
  validateProvisionConfig,
} from "@dockhand/core";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { isNodeError } from "./errors";
import { log } from "./log";

/** Points at a config file outside the current directory */
export const CONFIG_PATH_ENV = "DOCKHAND_CONFIG";

/** Build-time overrides applied on top of the config file */
export const CONFIG_ENV_OVERRIDES = {
  toolVersion: "DOCKHAND_TOOL_VERSION",
  originUrl: "DOCKHAND_ORIGIN_URL",
  workdir: "DOCKHAND_WORKDIR",
} as const;

/** Used when no config file exists: the pinned release */
export const DEFAULT_CONFIG: RawProvisionConfig = {
  runtime: { ...DEFAULT_RUNTIME },
  nonInteractive: true,
  systemPackages: [...DEFAULT_SYSTEM_PACKAGES],
  workdir: DEFAULT_WORKDIR,
  acquisition: {
    mode: "pinned-package",
    packageName: DEFAULT_TOOL_PACKAGE,
    version: DEFAULT_TOOL_VERSION,
    command: DEFAULT_TOOL_COMMAND,
  },
};

export type LoadConfigOptions = {
  /** Explicit config path (--config); must exist */
  path?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  configPath: string;
  config: ProvisionConfig;
  /** False when defaults were used because no file exists */
  fromFile: boolean;
  warnings: string[];
};

/**
 * Resolve the config path: explicit path > DOCKHAND_CONFIG > ./dockhand.json
 */
export function getConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
) {
  const fromEnv = env[CONFIG_PATH_ENV];
  if (explicitPath && explicitPath.trim().length > 0) {
    return resolve(explicitPath);
  }
  if (fromEnv && fromEnv.trim().length > 0) {
    return resolve(fromEnv);
  }
  return resolve(process.cwd(), PROVISION_CONFIG_FILENAME);
}

export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const configPath = getConfigPath(options.path, env);
  const explicit = Boolean(options.path || env[CONFIG_PATH_ENV]);
  log.debug(`Loading config from ${configPath}`);

  let raw: unknown;
  let fromFile = true;

  try {
    raw = JSON.parse(await readFile(configPath, "utf8"));
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      if (explicit) {
        throw new Error(`Config file not found: ${configPath}`);
      }
      log.debug("Config file not found, using defaults");
      raw = structuredClone(DEFAULT_CONFIG);
      fromFile = false;
    } else if (error instanceof SyntaxError) {
      throw new Error(`Failed to parse ${configPath}: ${error.message}`);
    } else {
      throw error instanceof Error ? error : new Error(String(error));
    }
  }

  const overrides = applyEnvOverrides(raw, env);
  const result = validateProvisionConfig(overrides.raw);

  if (!result.config) {
    throw new Error(
      `Invalid ${configPath}:\n  - ${result.errors.join("\n  - ")}`
    );
  }

  log.debug(`Acquisition mode: ${result.config.acquisition.mode}`);

  return {
    configPath,
    config: result.config,
    fromFile,
    warnings: [...overrides.warnings, ...result.warnings],
  };
}

export async function saveConfig(configPath: string, config: RawProvisionConfig) {
  log.debug(`Saving config to ${configPath}`);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, "utf8");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Apply DOCKHAND_* overrides to a raw config. Overrides that do not match
 * the configured acquisition mode are ignored with a warning, so a single
 * build argument can never switch or mix modes.
 */
export function applyEnvOverrides(
  raw: unknown,
  env: NodeJS.ProcessEnv
): { raw: unknown; warnings: string[] } {
  if (!isRecord(raw)) {
    return { raw, warnings: [] };
  }

  const warnings: string[] = [];
  const next: Record<string, unknown> = { ...raw };
  const acquisition = isRecord(raw.acquisition) ? { ...raw.acquisition } : null;

  const workdir = env[CONFIG_ENV_OVERRIDES.workdir];
  if (workdir) {
    next.workdir = workdir;
  }

  const toolVersion = env[CONFIG_ENV_OVERRIDES.toolVersion];
  if (toolVersion && acquisition) {
    if (acquisition.mode === "pinned-package") {
      acquisition.version = toolVersion;
    } else {
      warnings.push(
        `${CONFIG_ENV_OVERRIDES.toolVersion} ignored: acquisition mode is ${String(acquisition.mode)}`
      );
    }
  }

  const originUrl = env[CONFIG_ENV_OVERRIDES.originUrl];
  if (originUrl && acquisition) {
    if (acquisition.mode === "source-checkout") {
      acquisition.originUrl = originUrl;
    } else {
      warnings.push(
        `${CONFIG_ENV_OVERRIDES.originUrl} ignored: acquisition mode is ${String(acquisition.mode)}`
      );
    }
  }

  if (acquisition) {
    next.acquisition = acquisition;
  }

  return { raw: next, warnings };
}
