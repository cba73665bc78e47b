import { APT_LISTS_DIR, NON_INTERACTIVE_ENV } from "../constants";
import { resolveEntrypoint } from "./entrypoint";
import type {
  PinnedPackageAcquisition,
  ProvisionConfig,
  ProvisionPlan,
  ProvisionStage,
  ProvisionStep,
  RuntimeSpec,
  SourceCheckoutAcquisition,
  StageName,
} from "./types";

/** Stages run strictly in this order; each is a precondition of the next. */
export const STAGE_ORDER: readonly StageName[] = [
  "environment",
  "system-dependencies",
  "acquisition",
  "entrypoint",
];

export function getBaseImage(runtime: RuntimeSpec) {
  return `${runtime.name}:${runtime.version}${runtime.slim ? "-slim" : ""}`;
}

/**
 * Build the ordered provisioning plan for a validated config.
 * The plan is pure data: rendering and execution happen elsewhere.
 */
export function createProvisionPlan(config: ProvisionConfig): ProvisionPlan {
  const { nonInteractive } = config;
  const entrypoint = resolveEntrypoint(config);
  const isSourceCheckout = config.acquisition.mode === "source-checkout";

  const stages: ProvisionStage[] = [
    {
      name: "environment",
      steps: [
        {
          kind: "require-runtime",
          runtime: config.runtime,
          failure: "runtime-unavailable",
        },
      ],
    },
    {
      name: "system-dependencies",
      steps: systemDependencySteps(config.systemPackages, nonInteractive),
    },
    {
      name: "acquisition",
      steps: [
        {
          kind: "workdir",
          path: config.workdir,
          requireEmpty: isSourceCheckout,
          failure: isSourceCheckout ? "clone-failure" : "package-install-failure",
        },
        ...(config.acquisition.mode === "pinned-package"
          ? pinnedPackageSteps(config.acquisition, nonInteractive)
          : sourceCheckoutSteps(config.acquisition, nonInteractive)),
      ],
    },
    {
      name: "entrypoint",
      steps: [{ kind: "handoff", argv: entrypoint }],
    },
  ];

  const plan: ProvisionPlan = {
    mode: config.acquisition.mode,
    baseImage: getBaseImage(config.runtime),
    runtime: config.runtime,
    workdir: config.workdir,
    nonInteractive,
    stages,
    entrypoint,
  };

  assertStageOrder(plan);
  return plan;
}

function systemDependencySteps(
  packages: string[],
  nonInteractive: boolean
): ProvisionStep[] {
  if (packages.length === 0) {
    return [];
  }

  const env: Record<string, string> = nonInteractive
    ? { ...NON_INTERACTIVE_ENV.apt }
    : {};
  const assumeYes = nonInteractive ? ["-y"] : [];

  return [
    {
      kind: "run",
      argv: ["apt-get", "update"],
      env,
      failure: "package-install-failure",
    },
    {
      kind: "run",
      argv: ["apt-get", "install", ...assumeYes, ...packages],
      env,
      failure: "package-install-failure",
    },
    { kind: "clean", path: APT_LISTS_DIR, failure: "package-install-failure" },
  ];
}

function pipInstall(args: string[], nonInteractive: boolean): ProvisionStep {
  return {
    kind: "run",
    argv: ["pip", "install", ...(nonInteractive ? ["--no-input"] : []), ...args],
    env: nonInteractive ? { ...NON_INTERACTIVE_ENV.pip } : {},
    failure: "package-install-failure",
  };
}

function pinnedPackageSteps(
  acquisition: PinnedPackageAcquisition,
  nonInteractive: boolean
): ProvisionStep[] {
  return [
    pipInstall(
      [`${acquisition.packageName}==${acquisition.version}`],
      nonInteractive
    ),
  ];
}

function sourceCheckoutSteps(
  acquisition: SourceCheckoutAcquisition,
  nonInteractive: boolean
): ProvisionStep[] {
  return [
    {
      kind: "run",
      argv: ["git", "clone", "--depth", "1", acquisition.originUrl, "."],
      env: nonInteractive ? { ...NON_INTERACTIVE_ENV.git } : {},
      failure: "clone-failure",
    },
    {
      kind: "check-manifest",
      path: acquisition.manifestPath,
      failure: "manifest-invalid",
    },
    pipInstall(["-r", acquisition.manifestPath], nonInteractive),
  ];
}

function isClone(step: ProvisionStep) {
  return (
    step.kind === "run" && step.argv[0] === "git" && step.argv[1] === "clone"
  );
}

/**
 * Verify the ordering and exclusivity invariants of a plan.
 * Throws on the first violation.
 */
export function assertStageOrder(plan: ProvisionPlan): void {
  const names = plan.stages.map((stage) => stage.name);
  if (names.join(",") !== STAGE_ORDER.join(",")) {
    throw new Error(
      `Stages out of order: expected ${STAGE_ORDER.join(" → ")}, got ${names.join(" → ")}`
    );
  }

  for (const stage of plan.stages) {
    const workdirIndex = stage.steps.findIndex((s) => s.kind === "workdir");
    if (stage.name !== "acquisition") {
      if (workdirIndex !== -1) {
        throw new Error(`Working directory step found in ${stage.name} stage`);
      }
      continue;
    }
    if (workdirIndex !== 0) {
      throw new Error(
        "Working directory must be created before dependencies are acquired"
      );
    }
  }

  const steps = plan.stages.flatMap((stage) => stage.steps);
  const hasClone = steps.some(isClone);
  const hasManifestCheck = steps.some((s) => s.kind === "check-manifest");

  if (plan.mode === "pinned-package" && (hasClone || hasManifestCheck)) {
    throw new Error("Pinned-package plan cannot contain source checkout steps");
  }
  if (plan.mode === "source-checkout" && !hasClone) {
    throw new Error("Source-checkout plan is missing its clone step");
  }

  const handoffs = steps.filter((s) => s.kind === "handoff");
  const entrypointStage = plan.stages[plan.stages.length - 1];
  if (
    handoffs.length !== 1 ||
    entrypointStage?.steps.length !== 1 ||
    entrypointStage.steps[0]?.kind !== "handoff"
  ) {
    throw new Error("Plan must end with exactly one handoff step");
  }
}
