#!/usr/bin/env node

import { isProvisionError } from "@dockhand/core";
import { Command } from "commander";
import { createRequire } from "module";
import { initConfig } from "@/commands/init";
import { initInteractive } from "@/commands/init-interactive";
import { describeStep, provision } from "@/commands/provision";
import { render } from "@/commands/render";
import { runTool } from "@/commands/run";
import { validateConfig } from "@/commands/validate";
import { verify } from "@/commands/verify";
import {
  type AppContext,
  initAppContext,
  requireAppContext,
} from "@/lib/context";
import { getErrorMessage } from "@/lib/errors";
import { log, ui } from "@/lib/log";
import { createCommandRunner, createToolProcess } from "@/lib/process";

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

/** Set when the config could not be loaded; reported by commands that need it */
let contextError: unknown = null;

type InitCommandOptions = {
  mode?: string;
  package?: string;
  toolVersion?: string;
  command?: string;
  origin?: string;
  manifest?: string;
  script?: string;
  workdir?: string;
  runtimeVersion?: string;
  interactive?: boolean;
  force?: boolean;
};

const program = new Command();

program
  .name("dockhand")
  .description("Provision and launch the spotizerr-auth tool in a container")
  .version(packageJson.version)
  .option("-v, --verbose", "Enable verbose/debug output")
  .option("-c, --config <path>", "Path to dockhand.json")
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook("preAction", async (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean; config?: string }>();
    if (opts.verbose) {
      log.setVerbose(true);
    }

    try {
      await initAppContext({ configPath: opts.config });
    } catch (error) {
      // init and validate work without a loadable config
      log.debug(`Failed to init context: ${getErrorMessage(error)}`);
      contextError = error;
    }
  })
  .showHelpAfterError();

// =============================================================================
// init - Write a dockhand.json
// =============================================================================

program
  .command("init")
  .description("Create a dockhand.json for one acquisition mode")
  .argument("[directory]", "Directory to write dockhand.json into")
  .option("-m, --mode <mode>", "Acquisition mode (pinned-package, source-checkout)")
  .option("--package <name>", "Package name (pinned-package)")
  .option("--tool-version <version>", "Exact release to pin (pinned-package)")
  .option("--command <command>", "Console command the package installs")
  .option("--origin <url>", "Repository URL (source-checkout)")
  .option("--manifest <path>", "Dependency manifest in the checkout")
  .option("--script <path>", "Entry script in the checkout")
  .option("--workdir <path>", "Working directory inside the image")
  .option("--runtime-version <version>", "Python version for the base image")
  .option("-i, --interactive", "Prompt for each value")
  .option("-f, --force", "Overwrite an existing dockhand.json")
  .action(
    handle(async (directory: string | undefined, options: InitCommandOptions) => {
      const initOptions = {
        directory: directory ?? process.cwd(),
        mode: options.mode,
        packageName: options.package,
        version: options.toolVersion,
        command: options.command,
        originUrl: options.origin,
        manifestPath: options.manifest,
        scriptPath: options.script,
        workdir: options.workdir,
        runtimeVersion: options.runtimeVersion,
        force: Boolean(options.force),
      };

      const interactive = Boolean(options.interactive && process.stdin.isTTY);
      const result = interactive
        ? await initInteractive(initOptions)
        : await initConfig(initOptions);

      if (!interactive) {
        log.success(`Created ${ui.path(result.configPath)}`);
      }
      printWarnings(result.warnings);

      log.print(`\n${ui.header("Next steps")}`);
      log.print(
        ui.list([
          `Run ${ui.command("dockhand render -o Dockerfile")} to write the build descriptor`,
          `Build the image, then start it to run ${ui.command("dockhand run")}`,
        ])
      );
    })
  );

// =============================================================================
// validate - Check dockhand.json
// =============================================================================

program
  .command("validate")
  .description("Validate dockhand.json (and optionally a requirements file)")
  .option("--manifest <file>", "Also check a dependency manifest")
  .action(
    handle(async (options: { manifest?: string }) => {
      const result = await validateConfig({
        path: program.opts<{ config?: string }>().config,
        manifest: options.manifest,
      });

      if (result.valid && result.config) {
        const { acquisition } = result.config;
        log.success(ui.path(result.configPath));
        log.print(ui.keyValue("Mode", acquisition.mode));
        log.print(
          ui.keyValue(
            "Tool",
            acquisition.mode === "pinned-package"
              ? `${acquisition.packageName}==${acquisition.version}`
              : acquisition.originUrl
          )
        );
        log.print(ui.keyValue("Workdir", result.config.workdir));
      } else if (!result.valid) {
        log.error(`Invalid: ${ui.path(result.configPath)}`);
      }

      if (result.errors.length > 0) {
        log.print("");
        for (const err of result.errors) {
          log.print(`  ${ui.symbols.error} ${err}`);
        }
      }

      printWarnings(result.warnings);

      if (!result.valid) {
        process.exitCode = 1;
      }
    })
  );

// =============================================================================
// render - Write the container build descriptor
// =============================================================================

program
  .command("render")
  .description("Render the Dockerfile for the configured acquisition mode")
  .option("-o, --output <file>", "Write to a file instead of stdout")
  .option("-f, --force", "Overwrite an existing output file")
  .action(
    handle(async (options: { output?: string; force?: boolean }) => {
      const { config, warnings } = getContext();
      printWarnings(warnings);

      const result = await render({
        config,
        output: options.output,
        force: Boolean(options.force),
      });

      if (result.outputPath) {
        log.success(`Wrote ${ui.path(result.outputPath)}`);
      } else {
        process.stdout.write(result.content);
      }
    })
  );

// =============================================================================
// provision - Execute the plan on this host
// =============================================================================

program
  .command("provision")
  .description("Install the auth tool on this host (run during image build)")
  .option("--dry-run", "List the steps without running them")
  .option("--exec", "Hand off to the auth tool once provisioning succeeds")
  .action(
    handle(async (options: { dryRun?: boolean; exec?: boolean }) => {
      const { config, warnings } = getContext();
      printWarnings(warnings);
      const dryRun = Boolean(options.dryRun);

      const result = await provision({
        config,
        runner: createCommandRunner(),
        dryRun,
        onStep: (event) => {
          log.stage(
            event.stageIndex,
            event.stageCount,
            event.stage,
            event.description
          );
        },
      });

      if (dryRun) {
        log.print(`\n${ui.header("Entrypoint")}`);
        log.print(
          ui.list([describeStep({ kind: "handoff", argv: result.entrypoint })])
        );
        return;
      }

      log.success(
        `Provisioned ${result.plan.mode} (${result.steps.length} steps)`
      );

      if (options.exec) {
        const handoff = await runTool({ config, tool: createToolProcess() });
        process.exitCode = handoff.exitCode;
      }
    })
  );

// =============================================================================
// run - Hand off to the auth tool
// =============================================================================

program
  .command("run")
  .description("Start the auth tool and exit with its exit code")
  .action(
    handle(async () => {
      const { config } = getContext();
      const result = await runTool({ config, tool: createToolProcess() });
      process.exitCode = result.exitCode;
    })
  );

// =============================================================================
// verify - Inspect a provisioned host
// =============================================================================

program
  .command("verify")
  .description("Check that this host matches the configured acquisition mode")
  .option(
    "--package <name>",
    "Package name a packaged install would use (source-checkout)"
  )
  .action(
    handle(async (options: { package?: string }) => {
      const { config, warnings } = getContext();
      printWarnings(warnings);

      const result = await log.withSpinner("Inspecting...", () =>
        verify({
          config,
          runner: createCommandRunner(),
          packageName: options.package,
        })
      );

      for (const check of result.checks) {
        log.check(check.passed, check.name, check.detail);
      }

      if (result.passed) {
        log.success(`Host matches ${config.acquisition.mode}`);
      } else {
        log.error(`Host does not match ${config.acquisition.mode}`);
        process.exitCode = 1;
      }
    })
  );

// =============================================================================
// Parse and run
// =============================================================================

program
  .parseAsync(process.argv)
  .then(() => {
    process.exit(process.exitCode ?? 0);
  })
  .catch((err) => {
    log.error(getErrorMessage(err));
    process.exit(1);
  });

// =============================================================================
// Helpers
// =============================================================================

function getContext(): AppContext {
  if (contextError) throw contextError;
  return requireAppContext();
}

/** Warnings go to stderr so rendered output stays pipeable */
function printWarnings(warnings: string[]) {
  for (const warning of warnings) {
    log.warn(warning);
  }
}

function handle<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      log.error(getErrorMessage(err));
      // Failed commands in the build exit with the failing command's status
      process.exitCode =
        isProvisionError(err) && err.exitCode ? err.exitCode : 1;
    }
  };
}
