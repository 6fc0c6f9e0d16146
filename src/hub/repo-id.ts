/**
 * Repository id parsing and validation.
 *
 * Hub ids are `owner/name` or a bare `name`. Each segment is 1-96 characters
 * of letters, digits, `_`, `-` and `.`, starts and ends with a letter, digit
 * or `_`, has no `--` or `..`, and the name may not end in `.git`.
 */

import { InvalidNameError } from "../errors.js";
import type { RepoKind } from "../types.js";

const SEGMENT_PATTERN = /^\w(?:[\w.-]{0,94}\w)?$/;

export interface ParsedRepoId {
  /** Undefined for a bare name */
  owner?: string;
  name: string;
}

/**
 * Parses and validates a repository id.
 *
 * @throws InvalidNameError if the id is empty or malformed
 *
 * @example
 * ```ts
 * parseRepoId("acme/demo-space"); // { owner: "acme", name: "demo-space" }
 * parseRepoId("demo-space"); // { name: "demo-space" }
 * parseRepoId("a/b/c"); // throws InvalidNameError
 * ```
 */
export function parseRepoId(repoId: string): ParsedRepoId {
  const trimmed = repoId.trim();
  if (!trimmed) {
    throw new InvalidNameError("Repository id is empty");
  }

  const parts = trimmed.split("/");
  if (parts.length > 2) {
    throw new InvalidNameError(
      `Invalid repository id "${trimmed}": expected "owner/name" or "name"`
    );
  }

  for (const segment of parts) {
    validateSegment(trimmed, segment);
  }

  const name = parts[parts.length - 1];
  if (name.endsWith(".git")) {
    throw new InvalidNameError(`Invalid repository id "${trimmed}": name cannot end with ".git"`);
  }

  return parts.length === 2 ? { owner: parts[0], name } : { name };
}

function validateSegment(repoId: string, segment: string): void {
  if (!SEGMENT_PATTERN.test(segment)) {
    throw new InvalidNameError(
      `Invalid repository id "${repoId}": "${segment}" must be 1-96 letters, digits, "_", "-" or "." ` +
        `and start and end with a letter, digit or "_"`
    );
  }
  if (segment.includes("--") || segment.includes("..")) {
    throw new InvalidNameError(`Invalid repository id "${repoId}": "--" and ".." are not allowed`);
  }
}

/**
 * Returns `owner/name`, filling in the owner for a bare name.
 */
export function qualifyRepoId(parsed: ParsedRepoId, defaultOwner: string): string {
  return `${parsed.owner ?? defaultOwner}/${parsed.name}`;
}

/**
 * Browser URL of a repository.
 *
 * @example
 * ```ts
 * repoUrl("https://huggingface.co", "space", "acme/demo"); // "https://huggingface.co/spaces/acme/demo"
 * repoUrl("https://huggingface.co", "model", "acme/bert"); // "https://huggingface.co/acme/bert"
 * ```
 */
export function repoUrl(hubUrl: string, kind: RepoKind, repoId: string): string {
  const base = hubUrl.replace(/\/+$/, "");
  const prefix = kind === "model" ? "" : `${kind}s/`;
  return `${base}/${prefix}${repoId}`;
}
