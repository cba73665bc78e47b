import type { z } from "zod";
import type { ACQUISITION_MODES } from "../constants";
import type {
  acquisitionSchema,
  pinnedPackageSchema,
  provisionConfigSchema,
  runtimeSchema,
  sourceCheckoutSchema,
} from "./schema";

export type AcquisitionMode = (typeof ACQUISITION_MODES)[number];

/** Configuration as written in dockhand.json (defaults not yet applied) */
export type RawProvisionConfig = z.input<typeof provisionConfigSchema>;

/** Configuration after validation, with every default filled in */
export type ProvisionConfig = z.output<typeof provisionConfigSchema>;

export type RuntimeSpec = z.output<typeof runtimeSchema>;
export type Acquisition = z.output<typeof acquisitionSchema>;
export type PinnedPackageAcquisition = z.output<typeof pinnedPackageSchema>;
export type SourceCheckoutAcquisition = z.output<typeof sourceCheckoutSchema>;

export type StageName =
  | "environment"
  | "system-dependencies"
  | "acquisition"
  | "entrypoint";

export type ProvisionFailureKind =
  | "runtime-unavailable"
  | "package-install-failure"
  | "clone-failure"
  | "manifest-invalid";

/**
 * A single unit of work in a stage.
 *
 * - `require-runtime`: the configured runtime must be present
 * - `run`: execute a command; non-zero exit fails the build
 * - `clean`: remove the contents of a directory
 * - `workdir`: create (and enter) the working directory
 * - `check-manifest`: the dependency manifest must exist and parse
 * - `handoff`: replace the bootstrap with the tool process
 */
export type ProvisionStep =
  | {
      kind: "require-runtime";
      runtime: RuntimeSpec;
      failure: ProvisionFailureKind;
    }
  | {
      kind: "run";
      argv: string[];
      env: Record<string, string>;
      failure: ProvisionFailureKind;
    }
  | { kind: "clean"; path: string; failure: ProvisionFailureKind }
  | {
      kind: "workdir";
      path: string;
      /** Clone targets must start empty */
      requireEmpty: boolean;
      failure: ProvisionFailureKind;
    }
  | { kind: "check-manifest"; path: string; failure: ProvisionFailureKind }
  | { kind: "handoff"; argv: string[] };

export type ProvisionStage = {
  name: StageName;
  steps: ProvisionStep[];
};

export type ProvisionPlan = {
  mode: AcquisitionMode;
  baseImage: string;
  runtime: RuntimeSpec;
  workdir: string;
  nonInteractive: boolean;
  stages: ProvisionStage[];
  entrypoint: string[];
};
