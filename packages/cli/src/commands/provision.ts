/**
 * Provision Command
 *
 * Executes a provisioning plan on the current host, stage by stage. Meant to
 * run inside a container build (or any throwaway environment): the first
 * failing step aborts the build, nothing is retried, and the entrypoint
 * stage is left to `dockhand run`.
 */

import {
  createProvisionPlan,
  formatCommand,
  type ProvisionConfig,
  ProvisionError,
  type ProvisionPlan,
  type ProvisionStep,
  parseRequirements,
  type RuntimeSpec,
  type StageName,
} from "@dockhand/core";
import { mkdir, readdir, readFile, rm } from "fs/promises";
import { join } from "path";
import { isNodeError } from "@/lib/errors";
import { isEmptyDirectory } from "@/lib/fs";
import { log } from "@/lib/log";
import type { CommandRunner } from "@/lib/process";

/**
 * Filesystem operations the executor performs itself (everything else goes
 * through the CommandRunner).
 */
export type ProvisionFileSystem = {
  ensureDirectory(path: string): Promise<void>;
  isEmptyDirectory(path: string): Promise<boolean>;
  /** Remove every entry inside the directory, keeping the directory */
  clearDirectory(path: string): Promise<void>;
  /** File contents, or null when the file does not exist */
  readText(path: string): Promise<string | null>;
};

export const nodeFileSystem: ProvisionFileSystem = {
  async ensureDirectory(path) {
    await mkdir(path, { recursive: true });
  },
  isEmptyDirectory,
  async clearDirectory(path) {
    let entries: string[];
    try {
      entries = await readdir(path);
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") return;
      throw error;
    }
    await Promise.all(
      entries.map((entry) =>
        rm(join(path, entry), { recursive: true, force: true })
      )
    );
  },
  async readText(path) {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      if (
        isNodeError(error) &&
        (error.code === "ENOENT" || error.code === "EISDIR")
      ) {
        return null;
      }
      throw error;
    }
  },
};

export type StepStatus = "done" | "planned";

export type ExecutedStep = {
  stage: StageName;
  step: ProvisionStep;
  status: StepStatus;
};

export type StepEvent = {
  stage: StageName;
  /** 1-based stage position */
  stageIndex: number;
  stageCount: number;
  step: ProvisionStep;
  description: string;
};

export type ProvisionOptions = {
  config: ProvisionConfig;
  runner: CommandRunner;
  fs?: ProvisionFileSystem;
  /** List the steps without running anything */
  dryRun?: boolean;
  onStep?: (event: StepEvent) => void;
};

export type ProvisionResult = {
  plan: ProvisionPlan;
  steps: ExecutedStep[];
  /** Argument vector for the handoff, not executed here */
  entrypoint: string[];
};

/** Human-readable one-liner for a step */
export function describeStep(step: ProvisionStep): string {
  switch (step.kind) {
    case "require-runtime":
      return `require ${step.runtime.name} ${step.runtime.version}`;
    case "run":
      return formatCommand(step.argv);
    case "clean":
      return `clean ${step.path}`;
    case "workdir":
      return `workdir ${step.path}`;
    case "check-manifest":
      return `check manifest ${step.path}`;
    case "handoff":
      return `handoff ${formatCommand(step.argv)}`;
    default: {
      const exhaustive: never = step;
      throw new Error(`Unknown step: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export async function provision(
  options: ProvisionOptions
): Promise<ProvisionResult> {
  const { config, runner, dryRun = false, onStep } = options;
  const fs = options.fs ?? nodeFileSystem;
  const plan = createProvisionPlan(config);
  const executed: ExecutedStep[] = [];

  log.debug(
    `Provisioning ${plan.mode} on ${plan.baseImage} into ${plan.workdir}${dryRun ? " (dry run)" : ""}`
  );

  for (const [index, stage] of plan.stages.entries()) {
    for (const step of stage.steps) {
      if (step.kind === "handoff") continue;

      onStep?.({
        stage: stage.name,
        stageIndex: index + 1,
        stageCount: plan.stages.length,
        step,
        description: describeStep(step),
      });

      if (!dryRun) {
        await executeStep(step, stage.name, { plan, runner, fs });
      }

      executed.push({
        stage: stage.name,
        step,
        status: dryRun ? "planned" : "done",
      });
    }
  }

  return { plan, steps: executed, entrypoint: plan.entrypoint };
}

type StepContext = {
  plan: ProvisionPlan;
  runner: CommandRunner;
  fs: ProvisionFileSystem;
};

async function executeStep(
  step: Exclude<ProvisionStep, { kind: "handoff" }>,
  stage: StageName,
  context: StepContext
) {
  const { plan, runner, fs } = context;

  switch (step.kind) {
    case "require-runtime": {
      const { runtime } = step;
      const mismatches = await findRuntime(runtime, runner);
      if (mismatches === null) return;
      const detail =
        mismatches.length > 0 ? `found ${mismatches.join(", ")}` : "not installed";
      throw new ProvisionError(
        `Runtime ${runtime.name} ${runtime.version} is not available (${detail})`,
        { kind: step.failure, stage }
      );
    }

    case "run": {
      const command = formatCommand(step.argv);
      const result = await runner.run(step.argv, {
        cwd: stage === "acquisition" ? plan.workdir : undefined,
        env: step.env,
      });
      if (result.exitCode !== 0) {
        throw new ProvisionError(
          `Command failed with exit code ${result.exitCode}: ${command}`,
          { kind: step.failure, stage, exitCode: result.exitCode, command }
        );
      }
      return;
    }

    case "clean":
      try {
        await fs.clearDirectory(step.path);
      } catch (error) {
        throw new ProvisionError(`Could not clean ${step.path}`, {
          kind: step.failure,
          stage,
          cause: error,
        });
      }
      return;

    case "workdir": {
      try {
        await fs.ensureDirectory(step.path);
      } catch (error) {
        throw new ProvisionError(
          `Could not create working directory ${step.path}`,
          { kind: step.failure, stage, cause: error }
        );
      }
      if (step.requireEmpty && !(await fs.isEmptyDirectory(step.path))) {
        throw new ProvisionError(
          `Working directory ${step.path} is not empty; cannot clone into it`,
          { kind: step.failure, stage }
        );
      }
      return;
    }

    case "check-manifest": {
      const manifestPath = join(plan.workdir, step.path);
      const content = await fs.readText(manifestPath);
      if (content === null) {
        throw new ProvisionError(
          `Dependency manifest ${step.path} not found in checkout`,
          { kind: step.failure, stage }
        );
      }
      const parsed = parseRequirements(content);
      if (parsed.errors.length > 0) {
        throw new ProvisionError(
          `Dependency manifest ${step.path} is invalid:\n  - ${parsed.errors.join("\n  - ")}`,
          { kind: step.failure, stage }
        );
      }
      log.debug(
        `Manifest declares ${parsed.requirements.length} requirement(s)`
      );
      return;
    }

    default: {
      const exhaustive: never = step;
      throw new Error(`Unknown step: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** Executables that may provide a runtime, in lookup order */
export function runtimeCandidates(runtime: RuntimeSpec): string[] {
  return runtime.name === "python" ? ["python3", "python"] : [runtime.name];
}

/** True when `found` is the wanted version or a patch release of it */
export function versionMatches(found: string, wanted: string) {
  return found === wanted || found.startsWith(`${wanted}.`);
}

const VERSION_IN_OUTPUT = /(\d+(?:\.\d+)+)/;

/**
 * Look for an executable providing the runtime. Returns null when found,
 * otherwise the versions that were found but did not match.
 */
async function findRuntime(
  runtime: RuntimeSpec,
  runner: CommandRunner
): Promise<string[] | null> {
  const mismatches: string[] = [];

  for (const executable of runtimeCandidates(runtime)) {
    const result = await runner.run([executable, "--version"], {
      capture: true,
    });
    if (result.exitCode !== 0) continue;

    // Older interpreters print their version on stderr
    const output = `${result.stdout}\n${result.stderr}`;
    const found = VERSION_IN_OUTPUT.exec(output)?.[1];
    if (!found) continue;

    if (versionMatches(found, runtime.version)) {
      log.debug(`Found ${executable} ${found}`);
      return null;
    }
    mismatches.push(`${executable} ${found}`);
  }

  return mismatches;
}
