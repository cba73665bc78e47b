import type { ZodError } from "zod";
import { provisionConfigSchema } from "./schema";
import type { ProvisionConfig } from "./types";

export type ProvisionValidationResult = {
  valid: boolean;
  config: ProvisionConfig | null;
  errors: string[];
  warnings: string[];
};

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

/**
 * Parse and check a raw provisioning config.
 * Schema errors come first; semantic checks run only on a parsed config.
 */
export function validateProvisionConfig(
  raw: unknown
): ProvisionValidationResult {
  const parsed = provisionConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      valid: false,
      config: null,
      errors: formatIssues(parsed.error),
      warnings: [],
    };
  }

  const config = parsed.data;
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.acquisition.mode === "source-checkout") {
    const { originUrl } = config.acquisition;

    warnings.push(
      "source-checkout tracks the origin's default branch; builds are not reproducible across time."
    );

    if (originUrl.startsWith("http://")) {
      warnings.push(
        `Origin ${originUrl} uses unencrypted http; prefer https or ssh.`
      );
    }

    if (!config.systemPackages.includes("git")) {
      errors.push(
        'systemPackages: "git" is required to clone the source checkout'
      );
    }
  }

  if (config.workdir === "/") {
    errors.push("workdir: Cannot use the filesystem root as working directory");
  }

  return {
    valid: errors.length === 0,
    config: errors.length === 0 ? config : null,
    errors,
    warnings,
  };
}

/**
 * Parse a raw config, throwing a single error listing every problem.
 */
export function parseProvisionConfig(
  raw: unknown,
  source = "provisioning config"
): ProvisionConfig {
  const result = validateProvisionConfig(raw);
  if (!result.config) {
    throw new Error(`Invalid ${source}:\n  - ${result.errors.join("\n  - ")}`);
  }
  return result.config;
}
