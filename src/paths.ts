/**
 * Attribute paths and path patterns.
 *
 * Keys join with ".", sequence indices are written "[i]". Keys that would
 * be ambiguous in that syntax are bracket-quoted with JSON string escaping:
 *   metadata.labels["app.kubernetes.io/name"]
 * Patterns use "*" for any key and "[*]" for any index.
 */

export type PathSegment = { type: "key"; key: string } | { type: "index"; index: number };

export type PatternSegment = PathSegment | { type: "any-key" } | { type: "any-index" };

const PLAIN_KEY = /^[^.[\]"\s]+$/;

/** Format one key for use after a parent path. */
function formatKey(key: string, isFirst: boolean): string {
  if (PLAIN_KEY.test(key) && key !== "*") {
    return isFirst ? key : `.${key}`;
  }
  return `[${JSON.stringify(key)}]`;
}

export function formatPath(segments: readonly PatternSegment[]): string {
  let out = "";
  for (const seg of segments) {
    switch (seg.type) {
      case "index":
        out += `[${seg.index}]`;
        break;
      case "any-index":
        out += "[*]";
        break;
      case "any-key":
        out += out === "" ? "*" : ".*";
        break;
      case "key":
        out += formatKey(seg.key, out === "");
        break;
    }
  }
  return out;
}

export function childKeyPath(parent: string, key: string): string {
  return parent + formatKey(key, parent === "");
}

export function childIndexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/**
 * Parse a path or pattern. Throws on malformed input; callers validating
 * configuration catch this and report it as a table issue.
 */
export function parsePattern(input: string): PatternSegment[] {
  const segments: PatternSegment[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (ch === "[") {
      const close = findBracketEnd(input, i);
      const inner = input.slice(i + 1, close);
      if (inner === "*") {
        segments.push({ type: "any-index" });
      } else if (/^\d+$/.test(inner)) {
        segments.push({ type: "index", index: Number(inner) });
      } else if (inner.startsWith('"')) {
        const key: unknown = JSON.parse(inner);
        if (typeof key !== "string") throw new SyntaxError(`Invalid quoted key in "${input}"`);
        segments.push({ type: "key", key });
      } else {
        throw new SyntaxError(`Invalid bracket segment "[${inner}]" in "${input}"`);
      }
      i = close + 1;
      if (input[i] === ".") i++;
      continue;
    }

    let end = i;
    while (end < input.length && input[end] !== "." && input[end] !== "[") end++;
    const key = input.slice(i, end);
    if (key === "") throw new SyntaxError(`Empty key in "${input}"`);
    segments.push(key === "*" ? { type: "any-key" } : { type: "key", key });
    i = end;
    if (input[i] === ".") {
      i++;
      if (i === input.length) throw new SyntaxError(`Trailing "." in "${input}"`);
    }
  }

  return segments;
}

function findBracketEnd(input: string, open: number): number {
  if (input[open + 1] === '"') {
    // Skip over the JSON string, honouring escapes.
    let j = open + 2;
    while (j < input.length && input[j] !== '"') {
      j += input[j] === "\\" ? 2 : 1;
    }
    if (input[j + 1] !== "]") throw new SyntaxError(`Unterminated quoted key in "${input}"`);
    return j + 1;
  }
  const close = input.indexOf("]", open);
  if (close === -1) throw new SyntaxError(`Unterminated "[" in "${input}"`);
  return close;
}

export function parsePath(path: string): PathSegment[] {
  return parsePattern(path).map((seg) => {
    if (seg.type === "any-key" || seg.type === "any-index") {
      throw new SyntaxError(`Wildcards are not allowed in attribute paths: "${path}"`);
    }
    return seg;
  });
}

/** True when `pattern` matches the first `pattern.length` segments of `segments`. */
export function patternCovers(pattern: readonly PatternSegment[], segments: readonly PathSegment[]): boolean {
  if (pattern.length > segments.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    const p = pattern[i];
    const s = segments[i];
    if (p === undefined || s === undefined) return false;
    switch (p.type) {
      case "any-key":
        if (s.type !== "key") return false;
        break;
      case "any-index":
        if (s.type !== "index") return false;
        break;
      case "key":
        if (s.type !== "key" || s.key !== p.key) return false;
        break;
      case "index":
        if (s.type !== "index" || s.index !== p.index) return false;
        break;
    }
  }
  return true;
}

/** The segments with every index replaced by "[*]". */
export function wildcardIndices(segments: readonly PathSegment[]): PatternSegment[] {
  return segments.map((seg): PatternSegment => (seg.type === "index" ? { type: "any-index" } : seg));
}

/** Code-unit ordering; stable across locales and runtimes. */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** JSON text with object keys sorted, used as a canonical sort/equality key. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => comparePaths(a, b));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}
