/**
 * Configuration construction.
 *
 * The only place that turns raw string inputs (action inputs, CLI flags,
 * environment variables) into a `SyncRequest`. Everything downstream receives
 * the frozen request explicitly.
 */

import * as path from "node:path";
import { ConfigError } from "./errors.js";
import { splitPatterns } from "./sync/ignore.js";
import {
  DEFAULT_IGNORE_PATTERNS,
  REPO_KINDS,
  SPACE_SDKS,
  type RepoKind,
  type SpaceSdk,
  type SyncRequest,
} from "./types.js";

/**
 * Raw inputs as they arrive from the caller. Every value is a string (or
 * absent); booleans are normalized here.
 */
export interface RawSyncInputs {
  githubRepoId?: string;
  huggingfaceRepoId?: string;
  hfToken?: string;
  repoType?: string;
  private?: string | boolean;
  /** Absent means the default SDK; an empty string means no SDK */
  spaceSdk?: string;
  subdirectory?: string;
  /** Extra ignore patterns, comma or newline separated */
  ignorePatterns?: string;
  deleteRemoteOrphans?: string | boolean;
  commitMessage?: string;
  hubUrl?: string;
}

export const DEFAULT_REPO_KIND: RepoKind = "space";
export const DEFAULT_SPACE_SDK: SpaceSdk = "gradio";

/**
 * Normalizes a boolean-ish input.
 *
 * Only `"true"` (any case) and `"1"` are true, surrounding whitespace
 * ignored. Everything else, including `"yes"` and the empty string, is false.
 *
 * @example
 * ```ts
 * parseBoolean("True"); // true
 * parseBoolean("1"); // true
 * parseBoolean("yes"); // false
 * parseBoolean(undefined); // false
 * ```
 */
export function parseBoolean(value: string | boolean | undefined): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
}

function parseRepoKind(value: string | undefined): RepoKind {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return DEFAULT_REPO_KIND;
  }
  const kind = REPO_KINDS.find((candidate) => candidate === normalized);
  if (!kind) {
    throw new ConfigError(
      `Invalid repo_type "${value}": must be one of ${REPO_KINDS.join(", ")}`
    );
  }
  return kind;
}

function parseSpaceSdk(value: string | undefined): SpaceSdk | undefined {
  if (value === undefined) {
    return DEFAULT_SPACE_SDK;
  }
  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  const sdk = SPACE_SDKS.find((candidate) => candidate === normalized);
  if (!sdk) {
    throw new ConfigError(
      `Invalid space_sdk "${value}": must be one of ${SPACE_SDKS.join(", ")}`
    );
  }
  return sdk;
}

/**
 * Resolves the source directory against the workspace.
 *
 * `GITHUB_WORKSPACE` is the checkout root inside a workflow; outside one the
 * current directory is used.
 */
export function resolveSourcePath(
  subdirectory: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  const workspace = env.GITHUB_WORKSPACE || process.cwd();
  const trimmed = subdirectory?.trim();
  if (!trimmed) {
    return path.resolve(workspace);
  }
  return path.isAbsolute(trimmed) ? path.resolve(trimmed) : path.resolve(workspace, trimmed);
}

/**
 * Builds the immutable request for one sync run.
 *
 * @param raw - Raw inputs from the action or CLI
 * @param env - Environment used for the workspace root and `HF_ENDPOINT`
 * @throws ConfigError if the repository id or token is missing, or the repo type / SDK is unknown
 *
 * @example
 * ```ts
 * const request = buildSyncRequest({
 *   huggingfaceRepoId: "acme/demo",
 *   hfToken: "hf_placeholder",
 *   private: "True",
 *   subdirectory: "app",
 * });
 * // request.repoKind === "space", request.spaceSdk === "gradio", request.private === true
 * ```
 */
export function buildSyncRequest(
  raw: RawSyncInputs,
  env: NodeJS.ProcessEnv = process.env
): SyncRequest {
  const errors: string[] = [];

  const remoteRepoId = raw.huggingfaceRepoId?.trim() ?? "";
  if (!remoteRepoId) {
    errors.push("huggingface_repo_id is not set");
  }

  const credential = raw.hfToken?.trim() ?? "";
  if (!credential) {
    errors.push("hf_token is not set");
  }

  if (errors.length > 0) {
    throw new ConfigError(`Configuration error: ${errors.join("; ")}`);
  }

  const repoKind = parseRepoKind(raw.repoType);
  const spaceSdk = repoKind === "space" ? parseSpaceSdk(raw.spaceSdk) : undefined;
  const githubRepoId = raw.githubRepoId?.trim() || undefined;
  const hubUrl = raw.hubUrl?.trim() || env.HF_ENDPOINT?.trim() || undefined;

  const request: SyncRequest = {
    sourcePath: resolveSourcePath(raw.subdirectory, env),
    remoteRepoId,
    repoKind,
    private: parseBoolean(raw.private),
    spaceSdk,
    credential,
    githubRepoId,
    ignorePatterns: Object.freeze([...DEFAULT_IGNORE_PATTERNS, ...splitPatterns(raw.ignorePatterns)]),
    pruneRemote: parseBoolean(raw.deleteRemoteOrphans),
    commitMessage: raw.commitMessage?.trim() || `Sync from ${githubRepoId ?? "GitHub"}`,
    hubUrl,
  };

  return Object.freeze(request);
}
