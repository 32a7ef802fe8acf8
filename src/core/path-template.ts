import { escape as escapeGlob } from "glob";
import { Tags } from "../types";
import { normalizePath } from "../utils/fs";
import { RESERVED_KEY } from "../utils/tags";
import { PatternError } from "./errors";

const VARIABLE_NAME = /^[A-Za-z0-9_]+$/;
const NON_SEPARATOR = "[^/]+";

type Token =
  | { kind: "literal"; text: string }
  | { kind: "variable"; name: string }
  | { kind: "star" }
  | { kind: "globstar" };

/**
 * Compiled path template.
 *
 * A template is a relative POSIX path whose segments may contain `*` (one or
 * more characters within a segment), `**` (one or more characters, spanning
 * segments) and `{name}` variables (one or more characters within a segment,
 * captured under `name`). Matching is anchored and case-insensitive.
 *
 * `glob` is a looser pattern for the filesystem walk: every path the matcher
 * accepts also satisfies `glob` (with `nocase` enabled), but not vice versa.
 */
export class PathTemplate {
  readonly pattern: string;
  readonly glob: string;
  readonly variables: readonly string[];
  private readonly regex: RegExp;

  private constructor(
    pattern: string,
    glob: string,
    variables: string[],
    regex: RegExp
  ) {
    this.pattern = pattern;
    this.glob = glob;
    this.variables = variables;
    this.regex = regex;
  }

  /**
   * Compile a template, failing with PatternError when it is malformed
   */
  static compile(pattern: string): PathTemplate {
    const segments = splitPattern(pattern);
    const tokenized = segments.map((segment) => tokenizeSegment(segment, pattern));

    const variables: string[] = [];
    for (const tokens of tokenized) {
      for (const token of tokens) {
        if (token.kind !== "variable") continue;
        if (variables.includes(token.name)) {
          throw new PatternError(pattern, `duplicate variable '{${token.name}}'`);
        }
        variables.push(token.name);
      }
    }

    const source = tokenized.map(segmentRegex).join("/");
    return new PathTemplate(
      pattern,
      enumerationGlob(tokenized),
      variables,
      new RegExp(`^${source}$`, "i")
    );
  }

  /**
   * Match a path relative to the scanned root. Returns the captured
   * variables, or null when the path does not match.
   */
  match(filePath: string): Tags | null {
    const result = this.regex.exec(normalizePath(filePath));
    if (result === null) {
      return null;
    }

    const metadata: Tags = {};
    this.variables.forEach((name, index) => {
      metadata[name] = result[index + 1] ?? "";
    });
    return metadata;
  }
}

/**
 * Shorthand for PathTemplate.compile
 */
export function compilePattern(pattern: string): PathTemplate {
  return PathTemplate.compile(pattern);
}

function splitPattern(pattern: string): string[] {
  let normalized = pattern.trim().replace(/\\/g, "/");
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2);
  }

  if (normalized.length === 0) {
    throw new PatternError(pattern, "pattern is empty");
  }
  if (normalized.startsWith("/")) {
    throw new PatternError(pattern, "pattern must be relative to the root directory");
  }

  const segments = normalized.split("/");
  if (segments.some((segment) => segment.length === 0)) {
    throw new PatternError(pattern, "pattern contains an empty path segment");
  }
  return segments;
}

function tokenizeSegment(segment: string, pattern: string): Token[] {
  const tokens: Token[] = [];
  let literal = "";

  const flush = () => {
    if (literal.length > 0) {
      tokens.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  let i = 0;
  while (i < segment.length) {
    const ch = segment[i];

    if (ch === "{") {
      const close = segment.indexOf("}", i + 1);
      if (close === -1) {
        throw new PatternError(pattern, `unbalanced '{' in segment '${segment}'`);
      }
      const name = segment.slice(i + 1, close);
      if (!VARIABLE_NAME.test(name)) {
        throw new PatternError(pattern, `invalid variable name '{${name}}'`);
      }
      if (name === RESERVED_KEY) {
        throw new PatternError(pattern, `reserved variable name '{${name}}'`);
      }
      flush();
      tokens.push({ kind: "variable", name });
      i = close + 1;
    } else if (ch === "}") {
      throw new PatternError(pattern, `unbalanced '}' in segment '${segment}'`);
    } else if (ch === "*") {
      flush();
      if (segment[i + 1] === "*") {
        tokens.push({ kind: "globstar" });
        i += 2;
      } else {
        tokens.push({ kind: "star" });
        i += 1;
      }
    } else {
      literal += ch;
      i += 1;
    }
  }

  flush();
  return tokens;
}

function segmentRegex(tokens: Token[]): string {
  return tokens
    .map((token) => {
      switch (token.kind) {
        case "literal":
          return escapeRegExp(token.text);
        case "star":
          return NON_SEPARATOR;
        case "globstar":
          return ".+";
        case "variable":
          return `(${NON_SEPARATOR})`;
      }
    })
    .join("");
}

/**
 * Build the walk glob. A `**` embedded in a longer segment can span
 * separators, which a glob cannot express inside one segment, so the glob
 * widens to `**` from that segment on.
 */
function enumerationGlob(segments: Token[][]): string {
  const parts: string[] = [];

  for (const tokens of segments) {
    const isGlobstar = tokens.length === 1 && tokens[0].kind === "globstar";
    if (isGlobstar) {
      parts.push("**");
      continue;
    }
    if (tokens.some((token) => token.kind === "globstar")) {
      parts.push("**");
      break;
    }

    const segment = tokens
      .map((token) => (token.kind === "literal" ? escapeGlob(token.text) : "*"))
      .join("")
      .replace(/\*+/g, "*");
    parts.push(segment);
  }

  return parts.join("/");
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
