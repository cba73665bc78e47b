import { type ProvisionConfig, parseRequirements } from "@dockhand/core";
import { readFile } from "fs/promises";
import { getConfigPath, loadConfig } from "@/lib/config";
import { isNodeError } from "@/lib/errors";
import { log } from "@/lib/log";

export type ValidateOptions = {
  /** Config file path (defaults to ./dockhand.json) */
  path?: string;
  /** Dependency manifest to check as well */
  manifest?: string;
  env?: NodeJS.ProcessEnv;
};

export type ValidateResult = {
  valid: boolean;
  configPath: string;
  config: ProvisionConfig | null;
  errors: string[];
  warnings: string[];
};

export async function validateConfig(
  options: ValidateOptions = {}
): Promise<ValidateResult> {
  const env = options.env ?? process.env;
  let result: ValidateResult;

  try {
    const loaded = await loadConfig({ path: options.path, env });
    log.debug("Config loaded and validated successfully");

    result = {
      valid: true,
      configPath: loaded.configPath,
      config: loaded.config,
      errors: [],
      warnings: loaded.warnings,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.debug(`Config load failed: ${message}`);

    result = {
      valid: false,
      configPath: getConfigPath(options.path, env),
      config: null,
      errors: [message],
      warnings: [],
    };
  }

  if (options.manifest) {
    const manifestErrors = await validateManifest(options.manifest);
    if (manifestErrors.length > 0) {
      result.valid = false;
      result.errors.push(...manifestErrors);
    }
  }

  return result;
}

async function validateManifest(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return [`Manifest not found: ${path}`];
    }
    throw error;
  }

  return parseRequirements(content).errors.map((message) => `${path}: ${message}`);
}
