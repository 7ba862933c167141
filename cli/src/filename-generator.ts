/**
 * Generate human-readable filenames from entity titles
 */

import type { EntityId } from "@taskledger/types";
import { formatId, parseId } from "./entity-id.js";
import type { NamespaceLayout } from "./layout.js";

/**
 * Convert a title to snake_case filename
 * - Lowercase
 * - Replace spaces and special chars with underscores
 * - Remove consecutive underscores
 * - Trim underscores from start/end
 * - Truncate to reasonable length
 */
export function titleToFilename(title: string, maxLength: number = 50): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_") // Replace non-alphanumeric with underscore
    .replace(/_+/g, "_") // Replace multiple underscores with single
    .replace(/^_|_$/g, "") // Trim underscores from start/end
    .slice(0, maxLength) // Truncate to max length
    .replace(/_$/, "");
}

/**
 * Generate the entity filename: {prefix}{id}_{title_slug}.md
 * Sub-entities keep the dotted id: task42.1_write_tests.md
 */
export function generateEntityFilename(
  layout: NamespaceLayout,
  id: EntityId,
  title: string
): string {
  const slug = titleToFilename(title);
  const base = `${layout.filePrefix}${formatId(id)}`;
  return slug ? `${base}_${slug}.md` : `${base}.md`;
}

/**
 * Id encoded in an entity filename, or null when the file does not follow
 * the naming convention of the namespace.
 */
export function idFromFilename(
  layout: NamespaceLayout,
  filename: string
): EntityId | null {
  if (!filename.startsWith(layout.filePrefix) || !filename.endsWith(".md")) {
    return null;
  }
  const rest = filename.slice(layout.filePrefix.length, -".md".length);
  const match = rest.match(/^(\d+(?:\.\d+)*)(?:_.*)?$/);
  return match ? parseId(match[1]) : null;
}

export function isEntityFilename(
  layout: NamespaceLayout,
  filename: string
): boolean {
  return idFromFilename(layout, filename) !== null;
}
