/**
 * Command-line argument parsing for the `hf-mirror-sync` CLI.
 */

import type { RawSyncInputs } from "../config.js";

export interface CliArgs {
  command: string | null;
  help: boolean;
  /** Raw inputs collected from flags; the token comes from the environment */
  inputs: RawSyncInputs;
  quiet: boolean;
}

/**
 * Thrown for a flag that is missing its value or is unknown.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Flags that take a value, mapped to the raw input they fill */
const VALUE_FLAGS = new Map<string, keyof RawSyncInputs>([
  ["--repo", "huggingfaceRepoId"],
  ["-r", "huggingfaceRepoId"],
  ["--dir", "subdirectory"],
  ["-d", "subdirectory"],
  ["--type", "repoType"],
  ["-t", "repoType"],
  ["--sdk", "spaceSdk"],
  ["--private", "private"],
  ["--message", "commitMessage"],
  ["-m", "commitMessage"],
  ["--hub-url", "hubUrl"],
  ["--github-repo", "githubRepoId"],
]);

/**
 * Parses CLI arguments (without the node and script paths).
 *
 * `--ignore` may be repeated; `--prune` is a plain switch. Values may also
 * be given as `--flag=value`.
 *
 * @throws CliUsageError for unknown flags or flags missing a value
 *
 * @example
 * ```ts
 * parseArgs(["sync", "--repo", "acme/demo", "--ignore", "*.ckpt", "--prune"]);
 * // { command: "sync", inputs: { huggingfaceRepoId: "acme/demo", ignorePatterns: "*.ckpt", deleteRemoteOrphans: true }, ... }
 * ```
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    help: false,
    inputs: {},
    quiet: false,
  };
  const ignorePatterns: string[] = [];

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let inlineValue: string | undefined;

    if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      inlineValue = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[i + 1];
      if (next === undefined || (next.startsWith("-") && next.length > 1)) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      i++;
      return next;
    };

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg === "--prune") {
      result.inputs.deleteRemoteOrphans = true;
    } else if (arg === "--ignore" || arg === "-i") {
      ignorePatterns.push(takeValue());
    } else if (VALUE_FLAGS.has(arg)) {
      const key = VALUE_FLAGS.get(arg);
      if (key) {
        result.inputs[key] = takeValue();
      }
    } else if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else if (!result.command) {
      result.command = arg;
    }
  }

  if (ignorePatterns.length > 0) {
    result.inputs.ignorePatterns = ignorePatterns.join("\n");
  }

  return result;
}
