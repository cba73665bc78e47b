/**
 * Parsers for the output of tools used to verify a provisioned host.
 */

export type InstalledPackage = {
  name: string;
  version: string;
  location?: string;
};

const REVISION_REGEX = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;

/** Git object id (SHA-1 or SHA-256) */
export function isRevision(value: string) {
  return REVISION_REGEX.test(value);
}

/**
 * Normalized form of an exact release, as pip reports it: lowercase, with
 * leading zeros dropped from every number (`1.01` -> `1.1`, `2.0RC01` -> `2.0rc1`).
 */
export function normalizeVersion(version: string) {
  return version
    .trim()
    .toLowerCase()
    .replace(/\d+/g, (digits) => digits.replace(/^0+(?=\d)/, ""));
}

/**
 * Parse `pip show` output. Multiple packages are separated by `---` lines.
 * Entries missing a name or version are dropped.
 */
export function parsePipShowAll(output: string): InstalledPackage[] {
  return output
    .replace(/\r\n/g, "\n")
    .split(/^---$/m)
    .map(parsePipShowEntry)
    .filter((entry): entry is InstalledPackage => entry !== null);
}

export function parsePipShow(output: string): InstalledPackage | null {
  return parsePipShowAll(output)[0] ?? null;
}

function parsePipShowEntry(block: string): InstalledPackage | null {
  const fields = new Map<string, string>();

  for (const line of block.split("\n")) {
    const separator = line.indexOf(":");
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim().toLowerCase();
    // First occurrence wins; multi-line fields (License) may repeat keys
    if (!fields.has(key)) {
      fields.set(key, line.slice(separator + 1).trim());
    }
  }

  const name = fields.get("name");
  const version = fields.get("version");
  if (!name || !version) return null;

  const location = fields.get("location");
  return location ? { name, version, location } : { name, version };
}

/**
 * Revision that `HEAD` points to in `git ls-remote <origin> HEAD` output.
 */
export function parseLsRemoteHead(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const [revision, ref] = line.trim().split(/\s+/);
    if (ref === "HEAD" && revision && isRevision(revision)) {
      return revision;
    }
  }
  return null;
}
