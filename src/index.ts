/**
 * hf-mirror-sync
 *
 * Mirror a GitHub repository, or one of its subdirectories, into a Hugging
 * Face Hub repository.
 *
 * @packageDocumentation
 */

// =============================================================================
// Sync
// =============================================================================

export {
  MirrorSyncer,
  syncRepository,
  type MirrorSyncerOptions,
  type SyncRepositoryOptions,
  type UploadResult,
} from "./sync/mirror.js";

export { buildSyncRequest, parseBoolean, resolveSourcePath, type RawSyncInputs } from "./config.js";

// =============================================================================
// Hub store
// =============================================================================

export { HubStore, DEFAULT_HUB_URL, type HubStoreConfig } from "./hub/client.js";
export { parseRepoId, qualifyRepoId, repoUrl, type ParsedRepoId } from "./hub/repo-id.js";

// =============================================================================
// Source tree
// =============================================================================

export { scanSourceTree } from "./sync/file-reader.js";
export { isIgnored, patternToRegExp, splitPatterns } from "./sync/ignore.js";
export { readSpaceCard, checkSpaceCard, extractFrontmatter, type SpaceCard } from "./sync/space-card.js";

// =============================================================================
// Errors
// =============================================================================

export {
  MirrorSyncError,
  AuthError,
  InvalidNameError,
  NotFoundError,
  LocalIOError,
  TransientNetworkError,
  ConfigError,
  classifyHubError,
  type HubOperation,
} from "./errors.js";

// =============================================================================
// Core Types
// =============================================================================

export type {
  SyncRequest,
  SyncResult,
  RepoKind,
  SpaceSdk,
  RepoTarget,
  RepoHandle,
  CommitRef,
  SourceFile,
  LocalFolder,
  UploadOptions,
  RemoteStore,
} from "./types.js";

export { DEFAULT_IGNORE_PATTERNS, REPO_KINDS, SPACE_SDKS } from "./types.js";
