/**
 * Run Command
 *
 * Hands control to the auth tool. The tool's stdio is the terminal's and its
 * exit code becomes ours; nothing is wrapped, retried or interpreted.
 */

import { type ProvisionConfig, resolveEntrypoint } from "@dockhand/core";
import { directoryExists } from "@/lib/fs";
import { log } from "@/lib/log";
import type { ToolProcess } from "@/lib/process";

export type RunToolOptions = {
  config: ProvisionConfig;
  tool: ToolProcess;
};

export type RunToolResult = {
  argv: string[];
  exitCode: number;
};

export async function runTool(options: RunToolOptions): Promise<RunToolResult> {
  const { config, tool } = options;
  const argv = resolveEntrypoint(config);

  if (!(await directoryExists(config.workdir))) {
    throw new Error(
      `Working directory ${config.workdir} does not exist. Run "dockhand provision" first.`
    );
  }

  log.debug(`Entrypoint: ${argv.join(" ")} (cwd ${config.workdir})`);
  const exitCode = await tool.invoke(argv, { cwd: config.workdir });
  log.debug(`Auth tool exited with code ${exitCode}`);

  return { argv, exitCode };
}
