import { formatCommand } from "@dockhand/core";
import type {
  CommandRunner,
  InvokeOptions,
  RunOptions,
  RunResult,
  ToolProcess,
} from "@/lib/process";

export type RecordedCall = {
  argv: string[];
  options: RunOptions;
};

/** Returns a result for a command, or undefined for the default (exit 0) */
export type RunHandler = (
  argv: string[],
  options: RunOptions
) => Partial<RunResult> | undefined | Promise<Partial<RunResult> | undefined>;

export type FakeRunner = CommandRunner & {
  calls: RecordedCall[];
  /** Calls formatted as shell command lines */
  commands(): string[];
};

export function createFakeRunner(handler: RunHandler = () => undefined): FakeRunner {
  const calls: RecordedCall[] = [];

  return {
    calls,
    commands: () => calls.map((call) => formatCommand(call.argv)),
    async run(argv, options = {}) {
      calls.push({ argv, options });
      const result = await handler(argv, options);
      return { exitCode: 0, stdout: "", stderr: "", ...result };
    },
  };
}

export type FakeTool = ToolProcess & {
  invocations: Array<{ argv: string[]; options: InvokeOptions }>;
};

export function createFakeTool(exitCode = 0): FakeTool {
  const invocations: FakeTool["invocations"] = [];

  return {
    invocations,
    async invoke(argv, options = {}) {
      invocations.push({ argv, options });
      return exitCode;
    },
  };
}

/** Canned `pip show` output for one package */
export function pipShowOutput(name: string, version: string): string {
  return [
    `Name: ${name}`,
    `Version: ${version}`,
    "Summary: test package",
    "Location: /usr/local/lib/python3.11/site-packages",
    "Requires: ",
    "",
  ].join("\n");
}
