/**
 * Markdown parser with frontmatter support
 */

import matter from "gray-matter";
import { isPlainObject } from "./validation.js";

export interface ParsedMarkdown {
  /**
   * Parsed frontmatter data, unvalidated
   */
  data: Record<string, unknown>;
  /**
   * Markdown content (without frontmatter)
   */
  content: string;
  /**
   * Original raw content
   */
  raw: string;
}

/**
 * Parse markdown with YAML frontmatter.
 * Throws the YAML parser's error when the frontmatter block is malformed.
 */
export function parseMarkdown(content: string): ParsedMarkdown {
  const parsed = matter(content);
  const data: unknown = parsed.data;

  if (!isPlainObject(data)) {
    throw new Error("Frontmatter is not a key/value mapping");
  }

  return {
    data,
    content: parsed.content,
    raw: content,
  };
}

/**
 * Canonical body form: no leading blank lines, no trailing whitespace.
 * New and edited bodies are stored in this form.
 */
export function canonicalBody(body: string): string {
  return body.replace(/^(?:[ \t]*\r?\n)+/, "").trimEnd();
}

/**
 * Body of a parsed document: its content without the separator line and
 * the final newline that stringifyMarkdown adds around a body.
 */
export function documentBody(content: string): string {
  return content.replace(/^\r?\n/, "").replace(/\r?\n$/, "");
}

/**
 * Stringify frontmatter and body back to markdown. A blank line separates
 * the frontmatter block from a non-empty body, which is written as given.
 */
export function stringifyMarkdown(
  data: Record<string, unknown>,
  body: string
): string {
  return matter.stringify(body ? `\n${body}\n` : "", data);
}
