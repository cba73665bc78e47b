/**
 * Shared constants for dockhand.
 */

/** Filename for provisioning configuration */
export const PROVISION_CONFIG_FILENAME = "dockhand.json";

/** Acquisition strategies. Exactly one is active per build. */
export const ACQUISITION_MODES = ["pinned-package", "source-checkout"] as const;

/** Minimized Python runtime used when no runtime is configured */
export const DEFAULT_RUNTIME = {
  name: "python",
  version: "3.11",
  slim: true,
} as const;

/** Where the tool's source or installed artifacts live */
export const DEFAULT_WORKDIR = "/spotizerr-auth";

/** OS packages installed before acquisition (git is needed for clones) */
export const DEFAULT_SYSTEM_PACKAGES: readonly string[] = ["git"];

/** Auth tool defaults for the pinned-package strategy */
export const DEFAULT_TOOL_PACKAGE = "spotizerr-auth";
export const DEFAULT_TOOL_VERSION = "1.1.1";
export const DEFAULT_TOOL_COMMAND = "spotizerr-auth";

/** Auth tool defaults for the source-checkout strategy */
export const DEFAULT_MANIFEST_PATH = "requirements.txt";
export const DEFAULT_SCRIPT_PATH = "spotizerr-auth.py";
export const DEFAULT_INTERPRETER = "python";

/** Package index cache removed after system package installation */
export const APT_LISTS_DIR = "/var/lib/apt/lists";

/**
 * Environment assigned per step when running non-interactively.
 * These are never exported process-wide.
 */
export const NON_INTERACTIVE_ENV = {
  apt: { DEBIAN_FRONTEND: "noninteractive" },
  pip: { PIP_NO_INPUT: "1" },
  git: { GIT_TERMINAL_PROMPT: "0" },
} as const;
