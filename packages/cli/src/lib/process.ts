/**
 * Process boundary
 *
 * Two capabilities, both injectable so commands never spawn directly:
 * - CommandRunner: runs provisioning/verification commands
 * - ToolProcess: hands control to the auth tool and reports its exit code
 */

import { spawn } from "child_process";
import { constants } from "os";
import { log } from "./log";

/** Exit code shells use for "command not found" */
export const COMMAND_NOT_FOUND = 127;

const HANDLED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals)
);

export type RunOptions = {
  cwd?: string;
  /** Added to the inherited environment for this command only */
  env?: Record<string, string>;
  /** Collect stdout/stderr instead of passing them through */
  capture?: boolean;
};

export type RunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = {
  run(argv: string[], options?: RunOptions): Promise<RunResult>;
};

export type ToolProcessOptions = {
  /**
   * Whether the tool shares this process's controlling terminal. The
   * terminal already delivers SIGINT and SIGHUP to the whole foreground
   * group, so only SIGTERM is forwarded. Defaults to `process.stdin.isTTY`.
   */
  sharesTerminal?: boolean;
};

export type InvokeOptions = {
  cwd?: string;
  env?: Record<string, string>;
};

/**
 * The auth tool, seen from outside: start it, get its exit code.
 */
export type ToolProcess = {
  invoke(argv: string[], options?: InvokeOptions): Promise<number>;
};

/** Signals passed on to the tool; the rest are ignored while it runs */
export function forwardedSignals(sharesTerminal: boolean): NodeJS.Signals[] {
  return sharesTerminal ? ["SIGTERM"] : HANDLED_SIGNALS;
}

/** Conventional exit code for a process killed by a signal */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

export function createCommandRunner(): CommandRunner {
  return {
    run(argv, options = {}) {
      const [file, ...args] = argv;
      if (!file) {
        return Promise.reject(new Error("Cannot run an empty command"));
      }

      log.debug(`$ ${argv.join(" ")}`);

      return new Promise<RunResult>((resolvePromise) => {
        let stdout = "";
        let stderr = "";

        const child = spawn(file, args, {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          stdio: options.capture ? ["ignore", "pipe", "pipe"] : "inherit",
        });

        child.stdout?.setEncoding("utf8");
        child.stderr?.setEncoding("utf8");
        child.stdout?.on("data", (chunk: string) => {
          stdout += chunk;
        });
        child.stderr?.on("data", (chunk: string) => {
          stderr += chunk;
        });

        child.on("error", (error) => {
          log.debug(`Failed to start ${file}: ${error.message}`);
          resolvePromise({
            exitCode: COMMAND_NOT_FOUND,
            stdout,
            stderr: stderr + error.message,
          });
        });

        child.on("close", (code, signal) => {
          resolvePromise({
            exitCode: code ?? signalExitCode(signal),
            stdout,
            stderr,
          });
        });
      });
    },
  };
}

/**
 * Spawn the tool with inherited stdio. Termination signals received by
 * this process are passed on (see `forwardedSignals`); the tool's exit
 * status is returned as-is.
 */
export function createToolProcess(
  toolOptions: ToolProcessOptions = {}
): ToolProcess {
  const sharesTerminal =
    toolOptions.sharesTerminal ?? Boolean(process.stdin.isTTY);
  const forwarded = forwardedSignals(sharesTerminal);

  return {
    invoke(argv, options = {}) {
      const [file, ...args] = argv;
      if (!file) {
        return Promise.reject(new Error("Entrypoint is empty"));
      }

      log.debug(`Handing off to: ${argv.join(" ")}`);

      return new Promise<number>((resolvePromise) => {
        const child = spawn(file, args, {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          stdio: "inherit",
        });

        const forward = (signal: NodeJS.Signals) => {
          child.kill(signal);
        };
        // Keeps this process alive until the tool has exited
        const ignore = (signal: NodeJS.Signals) => {
          log.debug(`Received ${signal}, waiting for the tool to exit`);
        };
        const listeners = HANDLED_SIGNALS.map(
          (signal) =>
            [signal, forwarded.includes(signal) ? forward : ignore] as const
        );
        for (const [signal, listener] of listeners) {
          process.on(signal, listener);
        }
        const detach = () => {
          for (const [signal, listener] of listeners) {
            process.off(signal, listener);
          }
        };

        child.on("error", (error) => {
          detach();
          log.error(`Failed to start ${file}: ${error.message}`);
          resolvePromise(COMMAND_NOT_FOUND);
        });

        child.on("close", (code, signal) => {
          detach();
          resolvePromise(code ?? signalExitCode(signal));
        });
      });
    },
  };
}
