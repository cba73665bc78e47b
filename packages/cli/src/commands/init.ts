import {
  ACQUISITION_MODES,
  type AcquisitionMode,
  DEFAULT_TOOL_PACKAGE,
  DEFAULT_TOOL_VERSION,
  PROVISION_CONFIG_FILENAME,
  type RawProvisionConfig,
  validateProvisionConfig,
} from "@dockhand/core";
import { join } from "path";
import { saveConfig } from "@/lib/config";
import { fileExists } from "@/lib/fs";
import { log } from "@/lib/log";

export type InitOptions = {
  /** Directory to write dockhand.json (defaults to cwd) */
  directory?: string;
  mode?: string;
  /** pinned-package: distribution name */
  packageName?: string;
  /** pinned-package: exact release */
  version?: string;
  /** pinned-package: console command */
  command?: string;
  /** source-checkout: repository URL */
  originUrl?: string;
  manifestPath?: string;
  scriptPath?: string;
  workdir?: string;
  runtimeVersion?: string;
  force?: boolean;
};

export type InitResult = {
  configPath: string;
  config: RawProvisionConfig;
  warnings: string[];
};

export function normalizeMode(input: string): AcquisitionMode {
  const normalized = input.trim().toLowerCase();
  const match = ACQUISITION_MODES.find(
    (mode) => mode === normalized || mode.split("-")[0] === normalized
  );
  if (!match) {
    throw new Error(
      `Unknown acquisition mode "${input}". Supported: ${ACQUISITION_MODES.join(", ")}`
    );
  }
  return match;
}

/**
 * Build the raw config for the chosen acquisition mode. Only fields the
 * user supplied (plus the mode's required ones) are written, so defaults
 * stay visible as defaults.
 */
export function buildInitConfig(options: InitOptions): RawProvisionConfig {
  const mode = normalizeMode(options.mode ?? "pinned-package");

  const base: Omit<RawProvisionConfig, "acquisition"> = {
    ...(options.runtimeVersion && {
      runtime: { version: options.runtimeVersion },
    }),
    ...(options.workdir && { workdir: options.workdir }),
  };

  if (mode === "pinned-package") {
    return {
      ...base,
      acquisition: {
        mode,
        packageName: options.packageName ?? DEFAULT_TOOL_PACKAGE,
        version: options.version ?? DEFAULT_TOOL_VERSION,
        ...(options.command && { command: options.command }),
      },
    };
  }

  if (!options.originUrl) {
    throw new Error("source-checkout requires an origin URL (--origin).");
  }

  return {
    ...base,
    acquisition: {
      mode,
      originUrl: options.originUrl,
      ...(options.manifestPath && { manifestPath: options.manifestPath }),
      ...(options.scriptPath && { scriptPath: options.scriptPath }),
    },
  };
}

/**
 * Write a dockhand.json for the chosen acquisition strategy.
 */
export async function initConfig(options: InitOptions): Promise<InitResult> {
  const directory = options.directory ?? process.cwd();
  const configPath = join(directory, PROVISION_CONFIG_FILENAME);

  log.debug(`Initializing config in: ${directory}`);

  const config = buildInitConfig(options);
  const validation = validateProvisionConfig(config);
  if (!validation.valid) {
    throw new Error(
      `Invalid configuration:\n  - ${validation.errors.join("\n  - ")}`
    );
  }

  if (!options.force && (await fileExists(configPath))) {
    throw new Error(
      `${PROVISION_CONFIG_FILENAME} already exists. Use --force to overwrite.`
    );
  }

  await saveConfig(configPath, config);
  log.debug(`Wrote config file: ${configPath}`);

  return { configPath, config, warnings: validation.warnings };
}
