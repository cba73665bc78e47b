/**
 * Common schemas shared by the provisioning configuration.
 */

import { z } from "zod";
import {
  hasParentSegment,
  normalizeAbsolutePath,
  normalizeRelativePath,
} from "../utils/paths";

// =============================================================================
// Runtime
// =============================================================================

// Image name: lowercase alphanumeric, separators allowed between components
const RUNTIME_NAME_REGEX = /^[a-z0-9]+(?:[._-][a-z0-9]+)*$/;
const RUNTIME_VERSION_REGEX = /^\d+(?:\.\d+){0,2}$/;

export const runtimeNameSchema = z
  .string()
  .trim()
  .min(1, "Runtime name is required")
  .regex(RUNTIME_NAME_REGEX, "Must be a lowercase image name (e.g., python)");

export const runtimeVersionSchema = z
  .string()
  .trim()
  .regex(RUNTIME_VERSION_REGEX, "Must be a version tag (e.g., 3.11)");

// =============================================================================
// Packages
// =============================================================================

// Distribution names as accepted by pip
const PACKAGE_NAME_REGEX = /^(?:[A-Za-z0-9]|[A-Za-z0-9][A-Za-z0-9._-]*[A-Za-z0-9])$/;

// Exact release: 1.1.1, 2.0.0rc1, 1.0.post2, 1.0.dev3. No ranges or wildcards.
const EXACT_VERSION_REGEX =
  /^\d+(?:\.\d+)*(?:(?:a|b|rc)\d+)?(?:\.post\d+)?(?:\.dev\d+)?$/;

// Debian package names: at least two characters, lowercase
const APT_PACKAGE_REGEX = /^[a-z0-9][a-z0-9+.-]+$/;

const COMMAND_NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

export const packageNameSchema = z
  .string()
  .trim()
  .min(1, "Package name is required")
  .regex(PACKAGE_NAME_REGEX, "Must be a valid package name (e.g., my-tool)");

/**
 * Schema for a pinned package version.
 * Pinning must be exact so every build installs the same release.
 */
export const exactVersionSchema = z
  .string()
  .trim()
  .min(1, "Version is required")
  .regex(EXACT_VERSION_REGEX, "Must be an exact release version (e.g., 1.1.1)");

export const aptPackageSchema = z
  .string()
  .trim()
  .regex(APT_PACKAGE_REGEX, "Must be a valid system package name (e.g., git)");

export const commandNameSchema = z
  .string()
  .trim()
  .regex(COMMAND_NAME_REGEX, "Must be a bare command name (e.g., my-tool)");

// =============================================================================
// Origin
// =============================================================================

const ORIGIN_PROTOCOLS = new Set(["https:", "http:", "ssh:", "git:"]);

// scp-like syntax: user@host:path/to/repo.git
const SCP_ORIGIN_REGEX = /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+:[^\s]+$/;

export function isGitOrigin(value: string): boolean {
  if (SCP_ORIGIN_REGEX.test(value)) {
    return true;
  }
  try {
    const parsed = new URL(value);
    return (
      ORIGIN_PROTOCOLS.has(parsed.protocol) &&
      parsed.hostname.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

export const originUrlSchema = z
  .string()
  .trim()
  .min(1, "Origin URL is required")
  .refine(isGitOrigin, {
    message:
      "Must be a repository URL (https://, ssh://, git:// or user@host:path)",
  });

// =============================================================================
// Paths
// =============================================================================

/**
 * Path inside the checked-out tree. May not be absolute or escape the tree.
 */
export const relativePathSchema = z
  .string()
  .trim()
  .min(1, "Path is required")
  .transform(normalizeRelativePath)
  .refine((value) => value.length > 0 && !value.startsWith("/"), {
    message: "Must be a path relative to the working directory",
  })
  .refine((value) => !hasParentSegment(value), {
    message: "Path cannot contain '..' segments",
  });

export const absolutePathSchema = z
  .string()
  .trim()
  .refine((value) => value.startsWith("/"), {
    message: "Must be an absolute path (e.g., /srv/tool)",
  })
  .transform(normalizeAbsolutePath)
  .refine((value) => !hasParentSegment(value), {
    message: "Path cannot contain '..' segments",
  });

// =============================================================================
// Commands
// =============================================================================

export const argvSchema = z
  .array(z.string().min(1, "Arguments cannot be empty"))
  .min(1, "At least one argument is required");
