/**
 * CLI Logging
 *
 * - stdout: results only (rendered descriptors, verification checks)
 * - stderr: stage progress, warnings, errors, debug
 *
 * The auth tool's own output never passes through here; it inherits the
 * terminal directly after handoff.
 */

import { ui } from "@/lib/ui";

let verbose = process.env.DEBUG === "1";

/** Show debug output (--verbose) */
function setVerbose(enabled: boolean) {
  verbose = enabled;
}

function print(message: string) {
  console.log(message);
}

function debug(message: string) {
  if (verbose) {
    console.error(ui.theme.muted(`[debug] ${message}`));
  }
}

function warn(message: string) {
  console.error(ui.warning(message));
}

function error(message: string) {
  console.error(ui.error(message));
}

function success(message: string) {
  console.error(ui.success(message));
}

/**
 * Progress line for one provisioning step,
 * e.g. "[2/4] system-dependencies: apt-get update"
 */
function stage(index: number, count: number, name: string, description: string) {
  console.error(ui.step(index, count, `${name}: ${description}`));
}

/** One verification result on stdout */
function check(passed: boolean, name: string, detail: string) {
  print(ui.check(passed, name, detail));
}

let oraModule: typeof import("ora") | null = null;

async function getOra() {
  if (!oraModule) {
    oraModule = await import("ora");
  }
  return oraModule.default;
}

/**
 * Show a spinner on stderr while `task` runs. The spinner is cleared
 * before the task's result (or error) is returned.
 */
async function withSpinner<T>(message: string, task: () => Promise<T>): Promise<T> {
  let spinner: { stop(): unknown } | null = null;
  try {
    const ora = await getOra();
    spinner = ora({ text: message, spinner: "dots", color: "cyan" }).start();
  } catch (err) {
    debug(`Spinner unavailable: ${String(err)}`);
    console.error(message);
  }

  try {
    return await task();
  } finally {
    spinner?.stop();
  }
}

export const log = {
  setVerbose,

  print,
  debug,
  warn,
  error,
  success,

  stage,
  check,
  withSpinner,
};

export { ui } from "@/lib/ui";
