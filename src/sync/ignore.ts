/**
 * Shell-style ignore patterns.
 *
 * `*` matches any run of characters including `/`, `?` matches one
 * character, `[abc]` / `[!abc]` match a class. A path is ignored when the
 * pattern matches either the whole relative path or its basename, so
 * `*.git*` catches `.gitignore`, `.git/` and `sub/.gitattributes` alike.
 */

const regexCache = new Map<string, RegExp>();

/**
 * Converts a shell-style pattern into an anchored regular expression.
 *
 * @example
 * ```ts
 * patternToRegExp("*.py").test("src/app.py"); // true
 * patternToRegExp("file?.txt").test("file1.txt"); // true
 * patternToRegExp("[!a]*").test("abc"); // false
 * ```
 */
export function patternToRegExp(pattern: string): RegExp {
  const cached = regexCache.get(pattern);
  if (cached) {
    return cached;
  }

  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    i++;

    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      const close = findClassEnd(pattern, i);
      if (close === -1) {
        // Unterminated class is a literal bracket
        source += "\\[";
        continue;
      }
      let body = pattern.slice(i, close);
      i = close + 1;
      let negate = false;
      if (body.startsWith("!")) {
        negate = true;
        body = body.slice(1);
      }
      const escaped = body.replace(/\\/g, "\\\\").replace(/\^/g, "\\^").replace(/\]/g, "\\]");
      source += `[${negate ? "^" : ""}${escaped}]`;
    } else {
      source += char.replace(/[.+^${}()|\\\]]/g, "\\$&");
    }
  }

  const regex = new RegExp(`^${source}$`, "s");
  regexCache.set(pattern, regex);
  return regex;
}

/**
 * Finds the `]` closing a character class that starts at `start`.
 * A `]` right after `[` or `[!` belongs to the class.
 */
function findClassEnd(pattern: string, start: number): number {
  let j = start;
  if (pattern[j] === "!") j++;
  if (pattern[j] === "]") j++;
  return pattern.indexOf("]", j);
}

/**
 * Checks whether a relative path (using `/` separators) should be ignored.
 *
 * @example
 * ```ts
 * isIgnored(".github/workflows/ci.yml", ["*.github*"]); // true
 * isIgnored("src/.gitignore", ["*.git*"]); // true
 * isIgnored("app.py", ["*.git*"]); // false
 * ```
 */
export function isIgnored(relativePath: string, patterns: readonly string[]): boolean {
  const slash = relativePath.lastIndexOf("/");
  const base = slash === -1 ? relativePath : relativePath.slice(slash + 1);

  for (const pattern of patterns) {
    const regex = patternToRegExp(pattern);
    if (regex.test(relativePath) || regex.test(base)) {
      return true;
    }
  }
  return false;
}

/**
 * Splits a user-supplied pattern list on commas and newlines.
 *
 * @example
 * ```ts
 * splitPatterns("*.ckpt, data/*\n*.tmp"); // ["*.ckpt", "data/*", "*.tmp"]
 * ```
 */
export function splitPatterns(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(/[,\n]/)
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);
}
