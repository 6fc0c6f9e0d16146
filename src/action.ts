/**
 * GitHub Action entry point.
 *
 * Reads inputs via @actions/core, builds the sync request, runs the sync and
 * sets outputs for downstream steps. Any error fails the step.
 */

import * as core from "@actions/core";
import { buildSyncRequest, type RawSyncInputs } from "./config.js";
import { syncRepository } from "./sync/mirror.js";
import type { RemoteStore, SyncRequest } from "./types.js";

/**
 * Test seams for `run`.
 */
export interface ActionDependencies {
  /** Builds the store for a request (default: the Hub) */
  createStore?: (request: SyncRequest) => RemoteStore;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the action inputs. `space_sdk` is only passed on when the input is
 * present, so an explicitly blank value reaches validation as "no SDK".
 */
export function readActionInputs(env: NodeJS.ProcessEnv = process.env): RawSyncInputs {
  return {
    githubRepoId: core.getInput("github_repo_id"),
    huggingfaceRepoId: core.getInput("huggingface_repo_id", { required: true }),
    hfToken: core.getInput("hf_token", { required: true }),
    repoType: core.getInput("repo_type"),
    private: core.getInput("private"),
    spaceSdk: env.INPUT_SPACE_SDK === undefined ? undefined : core.getInput("space_sdk"),
    subdirectory: core.getInput("subdirectory"),
    ignorePatterns: core.getInput("ignore_patterns"),
    deleteRemoteOrphans: core.getInput("delete_remote_orphans"),
    commitMessage: core.getInput("commit_message"),
    hubUrl: core.getInput("hub_url"),
  };
}

export async function run(deps: ActionDependencies = {}): Promise<void> {
  const env = deps.env ?? process.env;

  try {
    const inputs = readActionInputs(env);
    if (inputs.hfToken) {
      core.setSecret(inputs.hfToken);
    }

    const request = buildSyncRequest(inputs, env);

    core.info("Syncing with Hugging Face Hub...");
    core.info(`  - Repo ID: ${request.remoteRepoId}`);
    core.info(`  - Repo type: ${request.repoKind}`);
    core.info(`  - Directory: ${request.sourcePath}`);
    core.info(`  - Private: ${request.private}`);

    const result = await syncRepository(request, {
      store: deps.createStore?.(request),
      warn: (message) => core.warning(message),
    });

    core.setOutput("repo-url", result.repo.url);
    if (result.commit) {
      core.setOutput("commit-oid", result.commit.oid);
      core.setOutput("commit-url", result.commit.url);
      core.info(`Repo synced: ${result.commit.url}`);
    } else {
      core.info("Nothing to sync");
    }
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
  }
}
