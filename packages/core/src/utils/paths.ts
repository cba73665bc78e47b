/**
 * Normalize a path inside a checkout by converting backslashes to forward
 * slashes and removing leading ./ prefixes.
 */
export function normalizeRelativePath(value: string) {
  return value.replace(/\\/g, "/").replace(/^(?:\.\/+)+/, "");
}

/**
 * Normalize an absolute POSIX path: collapse repeated slashes and drop a
 * trailing slash (except for the root itself).
 */
export function normalizeAbsolutePath(value: string) {
  const collapsed = value.replace(/\/{2,}/g, "/");
  if (collapsed.length > 1 && collapsed.endsWith("/")) {
    return collapsed.slice(0, -1);
  }
  return collapsed;
}

/**
 * True when any segment of the path is `..`.
 */
export function hasParentSegment(value: string) {
  return value.split("/").some((segment) => segment === "..");
}
