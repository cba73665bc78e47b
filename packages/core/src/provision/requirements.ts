/**
 * Dependency manifest parsing (pip requirements files).
 *
 * Only the subset needed to decide whether a checked-out manifest is usable:
 * named requirements, options such as `-r other.txt`, and direct references.
 */

export type Requirement = {
  /** Distribution name as written */
  name: string;
  extras: string[];
  /** Version specifier, e.g. ">=2.0,<3" (empty when unpinned) */
  specifier: string;
  /** Direct reference after `@`, e.g. a git URL */
  url?: string;
  /** Environment marker after `;` */
  marker?: string;
  /** Per-requirement options such as `--hash=sha256:...` */
  options?: RequirementOption[];
  line: number;
  raw: string;
};

export type RequirementOption = {
  flag: string;
  value?: string;
  line: number;
};

export type RequirementsParseResult = {
  requirements: Requirement[];
  options: RequirementOption[];
  /** Bare URLs or local paths */
  references: string[];
  errors: string[];
};

const NAME_REGEX = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const EXTRAS_REGEX = /^\[([^\]]*)\]/;
const EXTRA_NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const CLAUSE_REGEX = /^(~=|===|==|!=|<=|>=|<|>)\s*([A-Za-z0-9.*+!_-]+)$/;
const COMMENT_REGEX = /(^|\s)#/;
const TRAILING_OPTIONS_REGEX = /(^|\s)--[A-Za-z]/;
const REFERENCE_PREFIXES = [
  "git+",
  "hg+",
  "svn+",
  "bzr+",
  "http://",
  "https://",
  "file:",
  "./",
  "../",
  "/",
];

// Options that consume the following token as their value
const OPTIONS_WITH_VALUE = new Set([
  "-r",
  "--requirement",
  "-c",
  "--constraint",
  "-e",
  "--editable",
  "-i",
  "--index-url",
  "--extra-index-url",
  "-f",
  "--find-links",
  "--trusted-host",
]);

/**
 * Canonical form of a distribution name: lowercase, with runs of
 * `-`, `_` and `.` collapsed to a single `-`.
 */
export function normalizePackageName(name: string) {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

export function parseRequirements(content: string): RequirementsParseResult {
  const result: RequirementsParseResult = {
    requirements: [],
    options: [],
    references: [],
    errors: [],
  };

  for (const { text, line } of logicalLines(content)) {
    const stripped = stripComment(text).trim();
    if (stripped.length === 0) continue;

    if (stripped.startsWith("-")) {
      const option = parseOption(stripped, line);
      if (typeof option === "string") {
        result.errors.push(option);
      } else {
        result.options.push(option);
      }
      continue;
    }

    if (REFERENCE_PREFIXES.some((prefix) => stripped.startsWith(prefix))) {
      result.references.push(stripped);
      continue;
    }

    const parsed = parseRequirementLine(stripped, line);
    if (typeof parsed === "string") {
      result.errors.push(parsed);
    } else {
      result.requirements.push(parsed);
    }
  }

  const declaresSomething =
    result.requirements.length > 0 ||
    result.references.length > 0 ||
    result.options.some((o) => isIncludeFlag(o.flag) || isEditableFlag(o.flag));

  if (!declaresSomething && result.errors.length === 0) {
    result.errors.push("Manifest declares no dependencies");
  }

  return result;
}

function isIncludeFlag(flag: string) {
  return flag === "-r" || flag === "--requirement";
}

function isEditableFlag(flag: string) {
  return flag === "-e" || flag === "--editable";
}

/** Join backslash continuations, keeping the starting line number. */
function logicalLines(content: string): Array<{ text: string; line: number }> {
  const lines = content.replace(/\r\n/g, "\n").split("\n");
  const output: Array<{ text: string; line: number }> = [];
  let buffer = "";
  let start = 0;

  lines.forEach((current, index) => {
    if (buffer.length === 0) {
      start = index + 1;
    }
    // A backslash that ends a comment does not continue the line
    if (current.endsWith("\\") && !COMMENT_REGEX.test(current)) {
      buffer += `${current.slice(0, -1)} `;
      return;
    }
    output.push({ text: buffer + current, line: start });
    buffer = "";
  });

  if (buffer.length > 0) {
    output.push({ text: buffer, line: start });
  }

  return output;
}

function stripComment(text: string) {
  // Inline comments need whitespace before the hash (URLs may contain #egg=)
  const match = COMMENT_REGEX.exec(text);
  return match ? text.slice(0, match.index) : text;
}

function parseOption(text: string, line: number): RequirementOption | string {
  const equalsIndex = text.indexOf("=");
  const spaceIndex = text.search(/\s/);

  // --flag=value
  if (
    text.startsWith("--") &&
    equalsIndex !== -1 &&
    (spaceIndex === -1 || equalsIndex < spaceIndex)
  ) {
    const flag = text.slice(0, equalsIndex);
    const value = text.slice(equalsIndex + 1).trim();
    if (value.length === 0) {
      return `line ${line}: option ${flag} requires a value`;
    }
    return { flag, value, line };
  }

  const [flag = text, ...rest] = text.split(/\s+/);
  const value = rest.join(" ").trim();

  if (OPTIONS_WITH_VALUE.has(flag)) {
    if (value.length === 0) {
      return `line ${line}: option ${flag} requires a value`;
    }
    return { flag, value, line };
  }

  return value.length > 0 ? { flag, value, line } : { flag, line };
}

/** Parse `--flag=value`, `--flag value` and bare `--flag` tokens. */
function parseTrailingOptions(
  text: string,
  line: number
): RequirementOption[] | string {
  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  const options: RequirementOption[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    if (!token.startsWith("--")) {
      return `line ${line}: unexpected "${token}" after options`;
    }

    const equalsIndex = token.indexOf("=");
    if (equalsIndex !== -1) {
      const flag = token.slice(0, equalsIndex);
      const value = token.slice(equalsIndex + 1);
      if (value.length === 0) {
        return `line ${line}: option ${flag} requires a value`;
      }
      options.push({ flag, value, line });
      continue;
    }

    const next = tokens[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      options.push({ flag: token, value: next, line });
      i++;
    } else {
      options.push({ flag: token, line });
    }
  }

  return options;
}

function parseRequirementLine(text: string, line: number): Requirement | string {
  const nameMatch = NAME_REGEX.exec(text);
  if (!nameMatch?.[1]) {
    return `line ${line}: invalid requirement "${text}"`;
  }

  const name = nameMatch[1];
  let rest = text.slice(name.length).trimStart();

  let options: RequirementOption[] = [];
  const optionsMatch = TRAILING_OPTIONS_REGEX.exec(rest);
  if (optionsMatch) {
    const parsedOptions = parseTrailingOptions(
      rest.slice(optionsMatch.index),
      line
    );
    if (typeof parsedOptions === "string") return parsedOptions;
    options = parsedOptions;
    rest = rest.slice(0, optionsMatch.index).trimEnd();
  }

  let extras: string[] = [];
  const extrasMatch = EXTRAS_REGEX.exec(rest);
  if (extrasMatch) {
    extras = (extrasMatch[1] ?? "")
      .split(",")
      .map((extra) => extra.trim())
      .filter((extra) => extra.length > 0);
    const badExtra = extras.find((extra) => !EXTRA_NAME_REGEX.test(extra));
    if (badExtra) {
      return `line ${line}: invalid extra "${badExtra}" for ${name}`;
    }
    rest = rest.slice(extrasMatch[0].length).trimStart();
  } else if (rest.startsWith("[")) {
    return `line ${line}: unterminated extras for ${name}`;
  }

  let marker: string | undefined;
  const markerIndex = rest.indexOf(";");
  if (markerIndex !== -1) {
    marker = rest.slice(markerIndex + 1).trim();
    rest = rest.slice(0, markerIndex).trim();
    if (marker.length === 0) {
      return `line ${line}: empty environment marker for ${name}`;
    }
  }

  const base = {
    name,
    extras,
    line,
    raw: text,
    ...(marker !== undefined && { marker }),
    ...(options.length > 0 && { options }),
  };

  if (rest.startsWith("@")) {
    const url = rest.slice(1).trim();
    if (url.length === 0) {
      return `line ${line}: missing URL after "@" for ${name}`;
    }
    return { ...base, specifier: "", url };
  }

  const specifier = rest.replace(/\s+/g, "");
  if (specifier.length > 0) {
    const badClause = specifier
      .split(",")
      .find((clause) => !CLAUSE_REGEX.test(clause));
    if (badClause !== undefined) {
      return `line ${line}: invalid version specifier "${badClause}" for ${name}`;
    }
  }

  return { ...base, specifier };
}
