import {
  ACQUISITION_MODES,
  type AcquisitionMode,
  absolutePathSchema,
  DEFAULT_TOOL_PACKAGE,
  DEFAULT_TOOL_VERSION,
  DEFAULT_WORKDIR,
  exactVersionSchema,
  originUrlSchema,
  PROVISION_CONFIG_FILENAME,
  packageNameSchema,
} from "@dockhand/core";
import * as p from "@clack/prompts";
import { join } from "path";
import { fileExists } from "@/lib/fs";
import { check } from "@/lib/zod-validator";
import { type InitOptions, type InitResult, initConfig } from "./init";

const MODE_HINTS: Record<AcquisitionMode, string> = {
  "pinned-package": "exact release from the package index (reproducible)",
  "source-checkout": "clone the default branch (always latest, not reproducible)",
};

export type InteractiveInitOptions = Omit<InitOptions, "force"> & {
  /** Directory to initialize in (defaults to cwd) */
  directory: string;
  force?: boolean;
};

function cancelled(): never {
  p.cancel("Cancelled");
  process.exit(0);
}

/**
 * Run interactive init flow with clack prompts.
 */
export async function initInteractive(
  options: InteractiveInitOptions
): Promise<InitResult> {
  const { directory } = options;
  let { force } = options;

  p.intro("Configure auth tool provisioning");

  const configPath = join(directory, PROVISION_CONFIG_FILENAME);
  if (!force && (await fileExists(configPath))) {
    const overwrite = await p.confirm({
      message: `${PROVISION_CONFIG_FILENAME} already exists in ${directory}. Overwrite?`,
      initialValue: false,
    });

    if (p.isCancel(overwrite) || !overwrite) {
      cancelled();
    }

    force = true;
  }

  const mode = await p.select<AcquisitionMode>({
    message: "How should the auth tool be obtained?",
    initialValue: "pinned-package",
    options: ACQUISITION_MODES.map((value) => ({
      value,
      label: value,
      hint: MODE_HINTS[value],
    })),
  });
  if (p.isCancel(mode)) cancelled();

  const acquisition =
    mode === "pinned-package"
      ? await p.group(
          {
            packageName: () =>
              p.text({
                message: "Package name",
                placeholder: options.packageName ?? DEFAULT_TOOL_PACKAGE,
                defaultValue: options.packageName ?? DEFAULT_TOOL_PACKAGE,
                validate: check(packageNameSchema, { allowBlank: true }),
              }),
            version: () =>
              p.text({
                message: "Exact version",
                placeholder: options.version ?? DEFAULT_TOOL_VERSION,
                defaultValue: options.version ?? DEFAULT_TOOL_VERSION,
                validate: check(exactVersionSchema, { allowBlank: true }),
              }),
          },
          { onCancel: cancelled }
        )
      : await p.group(
          {
            originUrl: () =>
              p.text({
                message: "Repository URL",
                placeholder: "https://git.example.com/team/auth-tool.git",
                initialValue: options.originUrl,
                validate: check(originUrlSchema),
              }),
          },
          { onCancel: cancelled }
        );

  const workdir = await p.text({
    message: "Working directory",
    placeholder: options.workdir ?? DEFAULT_WORKDIR,
    defaultValue: options.workdir ?? DEFAULT_WORKDIR,
    validate: check(absolutePathSchema, { allowBlank: true }),
  });
  if (p.isCancel(workdir)) cancelled();

  const result = await initConfig({
    ...options,
    ...acquisition,
    mode,
    workdir,
    force,
  });

  p.outro(`Wrote ${result.configPath}`);
  return result;
}
