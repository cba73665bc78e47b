import { z } from "zod";
import {
  DEFAULT_INTERPRETER,
  DEFAULT_MANIFEST_PATH,
  DEFAULT_RUNTIME,
  DEFAULT_SCRIPT_PATH,
  DEFAULT_SYSTEM_PACKAGES,
  DEFAULT_WORKDIR,
} from "../constants";
import {
  absolutePathSchema,
  aptPackageSchema,
  argvSchema,
  commandNameSchema,
  exactVersionSchema,
  originUrlSchema,
  packageNameSchema,
  relativePathSchema,
  runtimeNameSchema,
  runtimeVersionSchema,
} from "../schemas";

export const runtimeSchema = z.object({
  name: runtimeNameSchema.default(DEFAULT_RUNTIME.name),
  version: runtimeVersionSchema.default(DEFAULT_RUNTIME.version),
  /** Use the minimized image variant */
  slim: z.boolean().default(DEFAULT_RUNTIME.slim),
});

/**
 * Install one exact release from the package index.
 * Reproducible; never touches the tool's source repository.
 */
export const pinnedPackageSchema = z
  .object({
    mode: z.literal("pinned-package"),
    packageName: packageNameSchema,
    version: exactVersionSchema,
    /** Installed console command (defaults to the package name) */
    command: commandNameSchema.optional(),
  })
  .strict();

/**
 * Clone the tool's repository and install its declared dependencies.
 * Tracks the default branch, so builds are not reproducible.
 */
export const sourceCheckoutSchema = z
  .object({
    mode: z.literal("source-checkout"),
    originUrl: originUrlSchema,
    manifestPath: relativePathSchema.default(DEFAULT_MANIFEST_PATH),
    scriptPath: relativePathSchema.default(DEFAULT_SCRIPT_PATH),
    interpreter: commandNameSchema.default(DEFAULT_INTERPRETER),
  })
  .strict();

export const acquisitionSchema = z.discriminatedUnion("mode", [
  pinnedPackageSchema,
  sourceCheckoutSchema,
]);

export const provisionConfigSchema = z
  .object({
    $schema: z.string().optional(),
    runtime: runtimeSchema.default({}),
    /** Threaded into every install step; never exported process-wide */
    nonInteractive: z.boolean().default(true),
    systemPackages: z
      .array(aptPackageSchema)
      .default([...DEFAULT_SYSTEM_PACKAGES]),
    workdir: absolutePathSchema.default(DEFAULT_WORKDIR),
    acquisition: acquisitionSchema,
    /** Overrides the entrypoint derived from the acquisition mode */
    entrypoint: argvSchema.optional(),
  })
  .strict();
