/**
 * Verify Command
 *
 * Inspects a provisioned host (usually a freshly built image) and checks
 * that it matches the configuration:
 * - pinned-package: exactly the pinned release is installed, no checkout
 * - source-checkout: the checkout is at the origin's current HEAD, its
 *   declared dependencies are installed, and no packaged copy exists
 */

import {
  DEFAULT_TOOL_PACKAGE,
  NON_INTERACTIVE_ENV,
  normalizePackageName,
  normalizeVersion,
  type PinnedPackageAcquisition,
  type ProvisionConfig,
  parseLsRemoteHead,
  parsePipShow,
  parsePipShowAll,
  parseRequirements,
  type SourceCheckoutAcquisition,
} from "@dockhand/core";
import { readFile } from "fs/promises";
import { join } from "path";
import { directoryExists, fileExists } from "@/lib/fs";
import { log } from "@/lib/log";
import type { CommandRunner } from "@/lib/process";

export type VerifyCheck = {
  name: string;
  passed: boolean;
  detail: string;
};

export type VerifyOptions = {
  config: ProvisionConfig;
  runner: CommandRunner;
  /**
   * Package name the tool would have if installed from the index.
   * Used to prove a source checkout image carries no packaged copy.
   */
  packageName?: string;
};

export type VerifyResult = {
  passed: boolean;
  checks: VerifyCheck[];
};

export async function verify(options: VerifyOptions): Promise<VerifyResult> {
  const { config, runner } = options;
  const { acquisition } = config;

  const checks =
    acquisition.mode === "pinned-package"
      ? await verifyPinned(acquisition, config, runner)
      : await verifySource(
          acquisition,
          config,
          runner,
          options.packageName ?? DEFAULT_TOOL_PACKAGE
        );

  for (const check of checks) {
    log.debug(`${check.name}: ${check.passed ? "ok" : "failed"} (${check.detail})`);
  }

  return { passed: checks.every((check) => check.passed), checks };
}

// =============================================================================
// pinned-package
// =============================================================================

async function verifyPinned(
  acquisition: PinnedPackageAcquisition,
  config: ProvisionConfig,
  runner: CommandRunner
): Promise<VerifyCheck[]> {
  const { packageName, version } = acquisition;
  const result = await runner.run(["pip", "show", packageName], {
    capture: true,
  });
  const installed = result.exitCode === 0 ? parsePipShow(result.stdout) : null;

  const versionCheck: VerifyCheck = !installed
    ? {
        name: "installed-version",
        passed: false,
        detail: `${packageName} is not installed`,
      }
    : normalizeVersion(installed.version) === normalizeVersion(version)
      ? {
          name: "installed-version",
          passed: true,
          detail: `${installed.name} ${installed.version}`,
        }
      : {
          name: "installed-version",
          passed: false,
          detail: `expected ${version}, found ${installed.version}`,
        };

  const hasCheckout = await directoryExists(join(config.workdir, ".git"));

  return [
    versionCheck,
    {
      name: "exclusive-mode",
      passed: !hasCheckout,
      detail: hasCheckout
        ? `unexpected source checkout in ${config.workdir}`
        : "no source checkout present",
    },
  ];
}

// =============================================================================
// source-checkout
// =============================================================================

async function verifySource(
  acquisition: SourceCheckoutAcquisition,
  config: ProvisionConfig,
  runner: CommandRunner,
  packageName: string
): Promise<VerifyCheck[]> {
  const { workdir } = config;
  const manifestPath = join(workdir, acquisition.manifestPath);
  const checks: VerifyCheck[] = [];

  const hasCheckout = await directoryExists(join(workdir, ".git"));
  const hasManifest = await fileExists(manifestPath);
  checks.push({
    name: "checkout",
    passed: hasCheckout && hasManifest,
    detail: !hasCheckout
      ? `no checkout in ${workdir}`
      : hasManifest
        ? `${acquisition.manifestPath} present`
        : `${acquisition.manifestPath} missing`,
  });

  checks.push(await checkRevision(acquisition, config, runner));

  if (hasManifest) {
    checks.push(
      await checkDependencies(await readFile(manifestPath, "utf8"), runner)
    );
  }

  const packaged = await runner.run(["pip", "show", packageName], {
    capture: true,
  });
  const packagedCopy =
    packaged.exitCode === 0 ? parsePipShow(packaged.stdout) : null;
  checks.push({
    name: "exclusive-mode",
    passed: packagedCopy === null,
    detail: packagedCopy
      ? `unexpected packaged install ${packagedCopy.name} ${packagedCopy.version}`
      : `no packaged ${packageName} installed`,
  });

  return checks;
}

async function checkRevision(
  acquisition: SourceCheckoutAcquisition,
  config: ProvisionConfig,
  runner: CommandRunner
): Promise<VerifyCheck> {
  const env: Record<string, string> = config.nonInteractive
    ? { ...NON_INTERACTIVE_ENV.git }
    : {};

  const local = await runner.run(
    ["git", "-C", config.workdir, "rev-parse", "HEAD"],
    { capture: true, env }
  );
  if (local.exitCode !== 0) {
    return {
      name: "revision",
      passed: false,
      detail: "could not read checkout revision",
    };
  }

  const remote = await runner.run(
    ["git", "ls-remote", acquisition.originUrl, "HEAD"],
    { capture: true, env }
  );
  const remoteHead =
    remote.exitCode === 0 ? parseLsRemoteHead(remote.stdout) : null;
  if (!remoteHead) {
    return {
      name: "revision",
      passed: false,
      detail: `could not resolve HEAD of ${acquisition.originUrl}`,
    };
  }

  const localHead = local.stdout.trim();
  return localHead === remoteHead
    ? { name: "revision", passed: true, detail: localHead }
    : {
        name: "revision",
        passed: false,
        detail: `checkout at ${localHead}, origin HEAD is ${remoteHead}`,
      };
}

/**
 * Every unconditional named requirement must be installed. Requirements
 * with environment markers or direct URLs are not checked.
 */
async function checkDependencies(
  manifest: string,
  runner: CommandRunner
): Promise<VerifyCheck> {
  const parsed = parseRequirements(manifest);
  if (parsed.errors.length > 0) {
    return {
      name: "dependencies",
      passed: false,
      detail: `manifest is invalid: ${parsed.errors[0]}`,
    };
  }

  const names = parsed.requirements
    .filter((requirement) => !requirement.marker && !requirement.url)
    .map((requirement) => requirement.name);

  if (names.length === 0) {
    return {
      name: "dependencies",
      passed: true,
      detail: "no named requirements to check",
    };
  }

  const result = await runner.run(["pip", "show", ...names], { capture: true });
  const installed = new Set(
    parsePipShowAll(result.stdout).map((pkg) => normalizePackageName(pkg.name))
  );
  const missing = names.filter(
    (name) => !installed.has(normalizePackageName(name))
  );

  return missing.length === 0
    ? {
        name: "dependencies",
        passed: true,
        detail: `${names.length} requirement(s) installed`,
      }
    : {
        name: "dependencies",
        passed: false,
        detail: `missing: ${missing.join(", ")}`,
      };
}
