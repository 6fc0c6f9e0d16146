/**
 * Space card (README.md front matter) checks.
 *
 * The Hub reads a space's runtime from the `sdk` key of the YAML block at the
 * top of README.md, and an uploaded card overrides the SDK the space was
 * created with. These checks only produce warnings.
 */

import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import type { LocalFolder, SpaceSdk } from "../types.js";

export const SPACE_CARD_FILE = "README.md";

export interface SpaceCard {
  /** Parsed front matter; empty when the README has none */
  metadata: Record<string, unknown>;
  /** Value of the `sdk` key, if it is a string */
  sdk?: string;
}

/**
 * Extracts the YAML front matter of a README.
 *
 * Front matter must start on the first line, delimited by `---`. Missing or
 * invalid YAML yields an empty object; invalid YAML is reported to `warn`.
 *
 * @example
 * ```ts
 * extractFrontmatter("---\ntitle: Demo\nsdk: gradio\n---\n# Demo");
 * // { title: "Demo", sdk: "gradio" }
 * ```
 */
export function extractFrontmatter(
  content: string,
  warn: (message: string) => void = console.warn
): Record<string, unknown> {
  const normalized = content.replace(/\r\n/g, "\n");

  if (!normalized.startsWith("---\n")) {
    return {};
  }

  const closingIndex = normalized.indexOf("\n---", 3);
  if (closingIndex === -1) {
    return {};
  }

  const yamlContent = normalized.slice(4, closingIndex);
  if (!yamlContent.trim()) {
    return {};
  }

  try {
    const parsed: unknown = parseYaml(yamlContent);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    warn(
      `[space-card] Failed to parse ${SPACE_CARD_FILE} front matter: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return {};
}

/**
 * Reads the space card from the scanned folder.
 *
 * A README.md that cannot be read is reported to `warn` and treated as
 * missing.
 *
 * @returns The card, or null when the folder has no readable top-level README.md
 */
export async function readSpaceCard(
  folder: LocalFolder,
  warn: (message: string) => void = console.warn
): Promise<SpaceCard | null> {
  const readme = folder.files.find((file) => file.relativePath === SPACE_CARD_FILE);
  if (!readme) {
    return null;
  }

  let content: string;
  try {
    content = await fs.readFile(readme.absolutePath, "utf-8");
  } catch (error) {
    warn(
      `[space-card] Could not read ${SPACE_CARD_FILE}: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }

  const metadata = extractFrontmatter(content, warn);
  const sdk = typeof metadata.sdk === "string" ? metadata.sdk : undefined;

  return { metadata, sdk };
}

/**
 * Compares the space card with the requested SDK.
 *
 * @returns Warning messages; empty when the card matches
 */
export function checkSpaceCard(card: SpaceCard | null, spaceSdk: SpaceSdk): string[] {
  if (!card) {
    return [`No ${SPACE_CARD_FILE} in the source tree; the Hub keeps the card it generated for the space`];
  }
  if (!card.sdk) {
    return [`${SPACE_CARD_FILE} front matter has no "sdk" key; the Hub may not start the space`];
  }
  if (card.sdk !== spaceSdk) {
    return [
      `${SPACE_CARD_FILE} declares sdk "${card.sdk}" but space_sdk is "${spaceSdk}"; the uploaded card takes precedence`,
    ];
  }
  return [];
}
