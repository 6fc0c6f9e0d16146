/**
 * Shared test fixtures: temporary source trees, sync requests, and an
 * in-memory remote store.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { NotFoundError } from "../src/errors.js";
import {
  DEFAULT_IGNORE_PATTERNS,
  type CommitRef,
  type LocalFolder,
  type RemoteStore,
  type RepoHandle,
  type RepoKind,
  type RepoTarget,
  type SpaceSdk,
  type SyncRequest,
  type UploadOptions,
} from "../src/types.js";

/**
 * Creates a temporary directory for a test.
 */
export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/**
 * Writes files (relative path → content) under root, creating directories.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, ...relativePath.split("/"));
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}

/**
 * Creates a SyncRequest with test defaults.
 */
export function makeRequest(overrides: Partial<SyncRequest> = {}): SyncRequest {
  return {
    sourcePath: "",
    remoteRepoId: "test-user/demo",
    repoKind: "space",
    private: false,
    spaceSdk: "gradio",
    credential: "test-token",
    ignorePatterns: DEFAULT_IGNORE_PATTERNS,
    pruneRemote: false,
    commitMessage: "Sync from GitHub",
    ...overrides,
  };
}

export interface FakeRepo {
  kind: RepoKind;
  private: boolean;
  spaceSdk?: SpaceSdk;
  /** Remote path → file content */
  files: Map<string, string>;
  commits: string[];
}

export type FakeStoreMethod = "whoAmI" | "ensureRepo" | "listFiles" | "uploadFolder";

/**
 * In-memory RemoteStore.
 *
 * Records every call, keeps repositories and their file contents, and can
 * be told to fail a method with a given error.
 */
export class FakeRemoteStore implements RemoteStore {
  readonly repos = new Map<string, FakeRepo>();
  readonly calls: FakeStoreMethod[] = [];
  readonly failures: Partial<Record<FakeStoreMethod, Error>> = {};

  constructor(readonly owner: string = "test-user") {}

  /**
   * Seeds an existing repository.
   */
  addRepo(repoId: string, repo: Partial<FakeRepo> = {}): FakeRepo {
    const entry: FakeRepo = {
      kind: repo.kind ?? "space",
      private: repo.private ?? false,
      spaceSdk: repo.spaceSdk,
      files: repo.files ?? new Map(),
      commits: repo.commits ?? [],
    };
    this.repos.set(repoId, entry);
    return entry;
  }

  async whoAmI(): Promise<string> {
    this.record("whoAmI");
    return this.owner;
  }

  async ensureRepo(target: RepoTarget): Promise<RepoHandle> {
    this.record("ensureRepo");
    const url = `https://hub.test/${target.kind === "model" ? "" : `${target.kind}s/`}${target.repoId}`;

    const existing = this.repos.get(target.repoId);
    if (existing) {
      return { repoId: target.repoId, kind: existing.kind, url, created: false };
    }

    this.addRepo(target.repoId, {
      kind: target.kind,
      private: target.private,
      spaceSdk: target.spaceSdk,
    });
    return { repoId: target.repoId, kind: target.kind, url, created: true };
  }

  async listFiles(handle: RepoHandle): Promise<string[]> {
    this.record("listFiles");
    return [...this.getRepo(handle).files.keys()].sort();
  }

  async uploadFolder(handle: RepoHandle, folder: LocalFolder, options: UploadOptions): Promise<CommitRef> {
    this.record("uploadFolder");
    const repo = this.getRepo(handle);

    for (const remotePath of options.deletions) {
      repo.files.delete(remotePath);
    }
    for (const file of folder.files) {
      repo.files.set(file.relativePath, await fs.readFile(file.absolutePath, "utf-8"));
    }

    const oid = `commit-${repo.commits.length + 1}`;
    repo.commits.push(options.commitMessage);
    return { oid, url: `https://hub.test/${handle.repoId}/commit/${oid}` };
  }

  /** Sorted remote paths of a repository */
  remotePaths(repoId: string): string[] {
    return [...(this.repos.get(repoId)?.files.keys() ?? [])].sort();
  }

  private record(method: FakeStoreMethod): void {
    this.calls.push(method);
    const failure = this.failures[method];
    if (failure) {
      throw failure;
    }
  }

  private getRepo(handle: RepoHandle): FakeRepo {
    const repo = this.repos.get(handle.repoId);
    if (!repo) {
      throw new NotFoundError(`Repository not found: ${handle.repoId}`);
    }
    return repo;
  }
}
