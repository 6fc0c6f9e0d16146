/**
 * Mirror Syncer: GitHub checkout to Hub repository.
 *
 * Implements the sync pipeline:
 * 1. Validate the repository id and space SDK (no network)
 * 2. Resolve the owner of a bare repository name
 * 3. Ensure the remote repository exists
 * 4. Scan the source tree
 * 5. Upload every file in one commit (plus deletions when pruning)
 *
 * A failure at any step propagates unchanged. Nothing is rolled back: a
 * repository created in step 3 stays when step 5 fails.
 *
 * Acceptance scenarios:
 * - app.py + requirements.txt into a missing space → public gradio space is
 *   created and both files land at the repository root
 * - subdirectory "docs" → files uploaded without the "docs/" prefix
 * - space without an SDK → InvalidNameError before the store is called
 * - transient upload failure → the run rejects and no commit is reported
 */

import { InvalidNameError } from "../errors.js";
import { HubStore } from "../hub/client.js";
import { parseRepoId, qualifyRepoId } from "../hub/repo-id.js";
import type {
  CommitRef,
  RemoteStore,
  RepoHandle,
  RepoTarget,
  SyncRequest,
  SyncResult,
} from "../types.js";
import { scanSourceTree } from "./file-reader.js";
import { isIgnored } from "./ignore.js";
import { checkSpaceCard, readSpaceCard } from "./space-card.js";

/**
 * Options for the syncer.
 */
export interface MirrorSyncerOptions {
  /** If true, suppress console output */
  quiet?: boolean;
  /** Sink for space card warnings (default: console.warn) */
  warn?: (message: string) => void;
}

/**
 * Result of the upload step.
 */
export interface UploadResult {
  commit: CommitRef | null;
  uploaded: string[];
  deleted: string[];
}

/**
 * Orders the remote store calls for a single sync request.
 *
 * @example
 * ```ts
 * const syncer = new MirrorSyncer(new HubStore({ token }));
 * const result = await syncer.sync(request);
 * console.log(result.commit?.url);
 * ```
 */
export class MirrorSyncer {
  private readonly quiet: boolean;
  private readonly warn: (message: string) => void;

  constructor(
    private readonly store: RemoteStore,
    options: MirrorSyncerOptions = {}
  ) {
    this.quiet = options.quiet ?? false;
    this.warn = options.warn ?? ((message) => console.warn(message));
  }

  /**
   * Runs ensureRepo then uploadFolder.
   */
  async sync(request: SyncRequest): Promise<SyncResult> {
    this.log(`Syncing ${request.sourcePath} to ${request.repoKind} ${request.remoteRepoId}`);

    const repo = await this.ensureRepo(request);
    const upload = await this.uploadFolder(repo, request);

    return { repo, ...upload };
  }

  /**
   * Guarantees the remote repository exists.
   *
   * Existing repositories are returned untouched; visibility and SDK only
   * apply when the repository is created.
   *
   * @throws InvalidNameError for a malformed id or a space without an SDK,
   *   before any call to the store
   */
  async ensureRepo(request: SyncRequest): Promise<RepoHandle> {
    const parsed = parseRepoId(request.remoteRepoId);

    if (request.repoKind === "space" && !request.spaceSdk) {
      throw new InvalidNameError(
        `A space SDK is required to create space ${request.remoteRepoId}`
      );
    }

    let repoId: string;
    if (parsed.owner) {
      repoId = qualifyRepoId(parsed, parsed.owner);
    } else {
      const owner = await this.store.whoAmI();
      repoId = qualifyRepoId(parsed, owner);
      this.log(`Resolved bare name "${parsed.name}" to ${repoId}`);
    }

    const target: RepoTarget = {
      repoId,
      kind: request.repoKind,
      private: request.private,
      spaceSdk: request.repoKind === "space" ? request.spaceSdk : undefined,
    };

    const handle = await this.store.ensureRepo(target);
    this.log(
      handle.created
        ? `Created ${target.private ? "private" : "public"} ${handle.kind} ${handle.url}`
        : `Using existing ${handle.kind} ${handle.url}`
    );
    return handle;
  }

  /**
   * Uploads the source tree to the root of the repository.
   *
   * Existing remote files at the same paths are overwritten; remote-only
   * files are kept unless `pruneRemote` is set.
   *
   * @returns The commit, or a null commit when there was nothing to upload or delete
   */
  async uploadFolder(handle: RepoHandle, request: SyncRequest): Promise<UploadResult> {
    const folder = await scanSourceTree(request.sourcePath, request.ignorePatterns);
    this.log(`Local files found: ${folder.files.length}`);

    if (handle.kind === "space" && request.spaceSdk) {
      const card = await readSpaceCard(folder, this.warn);
      for (const warning of checkSpaceCard(card, request.spaceSdk)) {
        this.warn(`[space-card] ${warning}`);
      }
    }

    const uploaded = folder.files.map((file) => file.relativePath);
    let deleted: string[] = [];

    if (request.pruneRemote) {
      const local = new Set(uploaded);
      const remote = await this.store.listFiles(handle);
      deleted = remote
        .filter((path) => !local.has(path) && !isIgnored(path, request.ignorePatterns))
        .sort();
      for (const path of deleted) {
        this.log(`  DELETE: ${path}`);
      }
    }

    if (uploaded.length === 0 && deleted.length === 0) {
      this.log("No files to upload, skipping commit");
      return { commit: null, uploaded, deleted };
    }

    const commit = await this.store.uploadFolder(handle, folder, {
      commitMessage: request.commitMessage,
      deletions: deleted,
    });
    this.log(`Committed ${uploaded.length} file(s), deleted ${deleted.length}: ${commit.url}`);

    return { commit, uploaded, deleted };
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(`[mirror] ${message}`);
    }
  }
}

/**
 * Options for `syncRepository`.
 */
export interface SyncRepositoryOptions extends MirrorSyncerOptions {
  /** Store to use instead of the Hub (tests, custom transports) */
  store?: RemoteStore;
}

/**
 * Syncs a request against the Hugging Face Hub using the request's credential.
 */
export async function syncRepository(
  request: SyncRequest,
  options: SyncRepositoryOptions = {}
): Promise<SyncResult> {
  const store = options.store ?? new HubStore({ token: request.credential, hubUrl: request.hubUrl });
  return new MirrorSyncer(store, options).sync(request);
}
