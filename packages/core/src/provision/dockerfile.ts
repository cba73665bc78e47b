import { formatCommand, formatEnvPrefix, quoteShellArg } from "../utils/shell";
import type { ProvisionPlan, ProvisionStage, ProvisionStep } from "./types";

const LINE_CONTINUATION = " && \\\n    ";

export type RenderDockerfileOptions = {
  /** Leading comment lines (without the `#`) */
  comments?: string[];
};

/**
 * Render a plan as a container build descriptor.
 *
 * Environment for non-interactive installs is assigned inline on each
 * command rather than with ENV, so nothing leaks into the final image.
 */
export function renderDockerfile(
  plan: ProvisionPlan,
  options: RenderDockerfileOptions = {}
): string {
  const blocks: string[] = [];

  const comments = options.comments ?? [`Acquisition: ${plan.mode}`];
  const header = comments.map((line) => `# ${line}`.trimEnd());
  blocks.push([...header, `FROM ${plan.baseImage}`].join("\n"));

  for (const stage of plan.stages) {
    blocks.push(...renderStage(stage));
  }

  return `${blocks.join("\n\n")}\n`;
}

function renderStage(stage: ProvisionStage): string[] {
  switch (stage.name) {
    case "environment":
      // The runtime requirement is satisfied by FROM
      return [];
    case "system-dependencies": {
      if (stage.steps.length === 0) return [];
      const commands = stage.steps.flatMap(renderShellCommand);
      return [`RUN ${commands.join(LINE_CONTINUATION)}`];
    }
    case "acquisition":
      return stage.steps.flatMap((step) => {
        if (step.kind === "workdir") {
          return [`WORKDIR ${step.path}`];
        }
        return renderShellCommand(step).map((command) => `RUN ${command}`);
      });
    case "entrypoint":
      return stage.steps.flatMap((step) =>
        step.kind === "handoff" ? [`CMD ${formatExecForm(step.argv)}`] : []
      );
    default: {
      const exhaustive: never = stage.name;
      throw new Error(`Unknown stage: ${String(exhaustive)}`);
    }
  }
}

function renderShellCommand(step: ProvisionStep): string[] {
  switch (step.kind) {
    case "run": {
      const prefix = formatEnvPrefix(step.env);
      const command = formatCommand(step.argv);
      return [prefix ? `${prefix} ${command}` : command];
    }
    case "clean":
      // Glob stays unquoted so the shell expands it
      return [`rm -rf ${quoteShellArg(step.path)}/*`];
    case "check-manifest":
      return [`test -s ${quoteShellArg(step.path)}`];
    default:
      return [];
  }
}

/** CMD/ENTRYPOINT exec form: a JSON array of strings */
export function formatExecForm(argv: readonly string[]): string {
  return `[${argv.map((arg) => JSON.stringify(arg)).join(", ")}]`;
}
