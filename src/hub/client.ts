/**
 * Hugging Face Hub remote store.
 *
 * Wraps the `@huggingface/hub` functions behind the `RemoteStore` interface
 * and translates Hub failures into the sync error taxonomy. No call is
 * retried.
 */

import { pathToFileURL } from "node:url";
import { commit, createRepo, listFiles, whoAmI } from "@huggingface/hub";
import { classifyHubError, getStatusCode } from "../errors.js";
import type {
  CommitRef,
  LocalFolder,
  RemoteStore,
  RepoHandle,
  RepoTarget,
  UploadOptions,
} from "../types.js";
import { repoUrl } from "./repo-id.js";

export const DEFAULT_HUB_URL = "https://huggingface.co";

/**
 * Configuration for the HubStore.
 */
export interface HubStoreConfig {
  /** Write-scoped Hub access token */
  token: string;
  /** Hub endpoint (default: https://huggingface.co) */
  hubUrl?: string;
}

/**
 * `RemoteStore` backed by the Hugging Face Hub.
 *
 * @example
 * ```ts
 * const store = new HubStore({ token: process.env.HF_TOKEN ?? "" });
 * const handle = await store.ensureRepo({ repoId: "acme/demo", kind: "space", private: false, spaceSdk: "gradio" });
 * const commit = await store.uploadFolder(handle, folder, { commitMessage: "Sync", deletions: [] });
 * ```
 */
export class HubStore implements RemoteStore {
  private readonly accessToken: string;
  readonly hubUrl: string;

  constructor(config: HubStoreConfig) {
    this.accessToken = config.token;
    this.hubUrl = (config.hubUrl ?? DEFAULT_HUB_URL).replace(/\/+$/, "");
  }

  async whoAmI(): Promise<string> {
    try {
      const info = await whoAmI({ accessToken: this.accessToken, hubUrl: this.hubUrl });
      return info.name;
    } catch (error) {
      throw classifyHubError(error, "whoami");
    }
  }

  /**
   * Creates the repository, or returns a handle to the existing one.
   *
   * Creation is attempted directly; a 409 from the Hub means the repository
   * already exists and is left exactly as it is. A 403 is answered for tokens
   * that may write to the repository but not create in its namespace, so the
   * repository is then looked up before the 403 is reported.
   */
  async ensureRepo(target: RepoTarget): Promise<RepoHandle> {
    try {
      const { repoUrl: url } = await createRepo({
        repo: { type: target.kind, name: target.repoId },
        accessToken: this.accessToken,
        hubUrl: this.hubUrl,
        private: target.private,
        sdk: target.kind === "space" ? target.spaceSdk : undefined,
      });
      return { repoId: target.repoId, kind: target.kind, url, created: true };
    } catch (error) {
      const status = getStatusCode(error);
      if (status === 409 || (status === 403 && (await this.canRead(target)))) {
        return {
          repoId: target.repoId,
          kind: target.kind,
          url: repoUrl(this.hubUrl, target.kind, target.repoId),
          created: false,
        };
      }
      throw classifyHubError(error, "create", target.repoId);
    }
  }

  /**
   * True when the token can list the repository's root.
   */
  private async canRead(target: RepoTarget): Promise<boolean> {
    try {
      await listFiles({
        repo: { type: target.kind, name: target.repoId },
        accessToken: this.accessToken,
        hubUrl: this.hubUrl,
      }).next();
      return true;
    } catch (error) {
      if (getStatusCode(error) === undefined) {
        throw classifyHubError(error, "list", target.repoId);
      }
      return false;
    }
  }

  async listFiles(handle: RepoHandle): Promise<string[]> {
    const paths: string[] = [];
    try {
      for await (const entry of listFiles({
        repo: { type: handle.kind, name: handle.repoId },
        recursive: true,
        accessToken: this.accessToken,
        hubUrl: this.hubUrl,
      })) {
        if (entry.type === "file") {
          paths.push(entry.path);
        }
      }
    } catch (error) {
      throw classifyHubError(error, "list", handle.repoId);
    }
    return paths;
  }

  /**
   * Uploads every file of the folder, plus any deletions, as one commit.
   *
   * Files are streamed from disk through `file:` URLs.
   */
  async uploadFolder(
    handle: RepoHandle,
    folder: LocalFolder,
    options: UploadOptions
  ): Promise<CommitRef> {
    const operations = [
      ...options.deletions.map((path) => ({ operation: "delete" as const, path })),
      ...folder.files.map((file) => ({
        operation: "addOrUpdate" as const,
        path: file.relativePath,
        content: pathToFileURL(file.absolutePath),
      })),
    ];

    const output = await commit({
      repo: { type: handle.kind, name: handle.repoId },
      title: options.commitMessage,
      operations,
      accessToken: this.accessToken,
      hubUrl: this.hubUrl,
    }).catch((error: unknown) => {
      throw classifyHubError(error, "upload", handle.repoId);
    });

    if (!output) {
      throw new Error(`Commit to ${handle.repoId} was aborted before completion`);
    }

    return { oid: output.commit.oid, url: output.commit.url };
  }
}
