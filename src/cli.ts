#!/usr/bin/env node

/**
 * CLI entry point for hf-mirror-sync.
 *
 * Commands:
 * - `sync` uploads a local directory to a Hugging Face Hub repository
 *
 * Configuration via environment variables:
 * - HF_TOKEN (required): write-scoped Hub token
 * - HF_ENDPOINT (optional): Hub endpoint override
 */

import { CliUsageError, parseArgs, type CliArgs } from "./cli/args.js";
import { buildSyncRequest } from "./config.js";
import { syncRepository } from "./sync/mirror.js";

function printHelp(): void {
  console.log(`
hf-mirror-sync - Mirror a directory into a Hugging Face Hub repository

Usage:
  hf-mirror-sync sync --repo <owner/name> [options]

Commands:
  sync    Create the repository if needed and upload the directory

Options:
  --repo, -r          Target repository (owner/name, or name for your own account)
  --dir, -d           Directory to upload (default: current directory)
  --type, -t          Repository type: model, dataset, space (default: space)
  --sdk               Space SDK: gradio, streamlit, static, docker (default: gradio)
  --private           Create the repository as private (true/false, default: false)
  --ignore, -i        Extra ignore pattern (repeatable)
  --prune             Delete remote files that no longer exist locally
  --message, -m       Commit message
  --github-repo       Source repository, used in the default commit message
  --hub-url           Hub endpoint (default: HF_ENDPOINT or https://huggingface.co)
  --quiet, -q         Only print errors and the final result
  --help, -h          Show this help message

Environment Variables:
  HF_TOKEN            Hub token with write access (required)
  HF_ENDPOINT         Hub endpoint override

Examples:
  hf-mirror-sync sync --repo acme/demo-space
  hf-mirror-sync sync --repo acme/demo-space --dir ./app --sdk streamlit
  hf-mirror-sync sync --repo acme/weights --type model --private true --prune
`);
}

async function runSync(args: CliArgs): Promise<void> {
  const request = buildSyncRequest({
    ...args.inputs,
    hfToken: process.env.HF_TOKEN,
  });

  if (!args.quiet) {
    console.log("Syncing with Hugging Face Hub...");
    console.log(`  Repo ID: ${request.remoteRepoId}`);
    console.log(`  Repo type: ${request.repoKind}`);
    console.log(`  Directory: ${request.sourcePath}`);
    console.log(`  Private: ${request.private}`);
    console.log("");
  }

  const result = await syncRepository(request, { quiet: args.quiet });

  console.log("");
  console.log("Sync complete:");
  console.log(`  Repository: ${result.repo.url}${result.repo.created ? " (created)" : ""}`);
  console.log(`  Uploaded: ${result.uploaded.length}`);
  console.log(`  Deleted: ${result.deleted.length}`);
  if (result.commit) {
    console.log(`  Commit: ${result.commit.oid}`);
    console.log(`  URL: ${result.commit.url}`);
  } else {
    console.log("  Commit: none (nothing to upload)");
  }
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error("Run with --help for usage information.");
      process.exit(1);
    }
    throw error;
  }

  if (args.help || !args.command) {
    printHelp();
    process.exit(args.help ? 0 : 1);
  }

  switch (args.command) {
    case "sync":
      try {
        await runSync(args);
      } catch (error) {
        console.error(`Sync failed: ${error instanceof Error ? `${error.name}: ${error.message}` : error}`);
        process.exit(1);
      }
      break;
    default:
      console.error(`Unknown command: ${args.command}`);
      console.error("Run with --help for usage information.");
      process.exit(1);
  }
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
