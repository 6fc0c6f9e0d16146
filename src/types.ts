/**
 * Core types for the mirror syncer.
 */

export type RepoKind = "model" | "dataset" | "space";

export type SpaceSdk = "gradio" | "streamlit" | "static" | "docker";

export const REPO_KINDS: readonly RepoKind[] = ["model", "dataset", "space"];

export const SPACE_SDKS: readonly SpaceSdk[] = ["gradio", "streamlit", "static", "docker"];

/** Patterns that are never uploaded, matched against the path and its basename */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = ["*.git*", "*.github*"];

/**
 * Immutable configuration for a single sync run.
 *
 * Built once by `buildSyncRequest` and passed explicitly to the syncer.
 */
export interface SyncRequest {
  /** Absolute path of the directory whose contents are uploaded */
  readonly sourcePath: string;
  /** Target repository, `owner/name` or a bare `name` owned by the token's account */
  readonly remoteRepoId: string;
  readonly repoKind: RepoKind;
  /** Visibility used only when the repository has to be created */
  readonly private: boolean;
  /** Space SDK; required when repoKind is "space" */
  readonly spaceSdk?: SpaceSdk;
  /** Write-scoped Hub access token */
  readonly credential: string;
  /** Source GitHub repository (informational) */
  readonly githubRepoId?: string;
  readonly ignorePatterns: readonly string[];
  /** Delete remote files that no longer exist locally */
  readonly pruneRemote: boolean;
  readonly commitMessage: string;
  /** Hub endpoint override (e.g. a private Hub deployment) */
  readonly hubUrl?: string;
}

/**
 * What to create when the remote repository is missing.
 */
export interface RepoTarget {
  /** Fully qualified `owner/name` */
  repoId: string;
  kind: RepoKind;
  private: boolean;
  spaceSdk?: SpaceSdk;
}

export interface RepoHandle {
  /** Fully qualified `owner/name` */
  repoId: string;
  kind: RepoKind;
  /** Browser URL of the repository */
  url: string;
  /** True when this run created the repository */
  created: boolean;
}

export interface CommitRef {
  oid: string;
  url: string;
}

/**
 * A file found under the source directory.
 */
export interface SourceFile {
  /** Path relative to the source directory, always `/`-separated (e.g. "src/app.py") */
  relativePath: string;
  absolutePath: string;
  size: number;
}

/**
 * A scanned source tree, ready to be uploaded.
 */
export interface LocalFolder {
  root: string;
  files: SourceFile[];
}

export interface UploadOptions {
  commitMessage: string;
  /** Remote paths to delete in the same commit */
  deletions: string[];
}

/**
 * Capability interface over the remote content store.
 *
 * The syncer only orders calls and propagates errors; everything that talks
 * to the network sits behind this interface.
 */
export interface RemoteStore {
  /** Account name the credential belongs to */
  whoAmI(): Promise<string>;
  /** Creates the repository if missing; never alters an existing one */
  ensureRepo(target: RepoTarget): Promise<RepoHandle>;
  /** All file paths currently in the repository */
  listFiles(handle: RepoHandle): Promise<string[]>;
  /** Adds or overwrites every file of the folder in a single commit */
  uploadFolder(handle: RepoHandle, folder: LocalFolder, options: UploadOptions): Promise<CommitRef>;
}

export interface SyncResult {
  repo: RepoHandle;
  /** Null when there was nothing to commit */
  commit: CommitRef | null;
  /** Remote paths added or overwritten */
  uploaded: string[];
  /** Remote paths deleted (only when pruning) */
  deleted: string[];
}
