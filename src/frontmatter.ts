/**
 * Leading metadata block extraction
 *
 * A Markdown file may start with a YAML block fenced by `---` lines:
 *
 *   ---
 *   title: "My Website"
 *   ---
 *   # Body starts here
 */

import { CORE_SCHEMA, load } from "js-yaml";
import { z } from "zod";
import { MetadataParseError, errorMessage } from "./errors.js";
import type { FrontMatter } from "./types.js";

const DELIMITERS = ["---\n", "---\r\n"] as const;

const frontMatterSchema = z.record(z.string(), z.string());

/** Result of splitting a document */
export interface FrontMatterSplit {
  /** Parsed metadata, or null when the text has no metadata block */
  frontMatter: FrontMatter | null;
  /** Raw text between the two delimiter lines ('' when there is no block) */
  block: string;
  /** Text after the closing delimiter line, or the whole input */
  body: string;
}

/**
 * Find the closing delimiter line, searching only after the opening one.
 *
 * @returns Index of the closing delimiter, or -1
 */
function findClosingDelimiter(text: string, delimiter: string): number {
  let from = delimiter.length;
  while (from <= text.length - delimiter.length) {
    const index = text.indexOf(delimiter, from);
    if (index === -1) return -1;
    // must start a line of its own
    if (index === delimiter.length || text[index - 1] === "\n") return index;
    from = index + 1;
  }
  return -1;
}

/**
 * Parse the raw metadata block as a flat string mapping.
 * The core schema keeps dates as strings; numbers, booleans and nulls are rejected.
 *
 * @throws {MetadataParseError} On malformed YAML or non-string values
 */
export function parseFrontMatter(block: string): FrontMatter {
  let data: unknown;
  try {
    data = load(block, { schema: CORE_SCHEMA });
  } catch (error) {
    throw new MetadataParseError(`invalid metadata block: ${errorMessage(error)}`, null, { cause: error });
  }

  // an empty block is an empty mapping
  if (data === undefined || data === null) return {};

  const result = frontMatterSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new MetadataParseError(`metadata must be a flat mapping of strings${where}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Split a leading metadata block off a document.
 *
 * Delimiters and the block are removed exactly, so
 * `delimiter + block + delimiter + body` reproduces the input.
 * Text without an opening delimiter, or with an opening but no closing one,
 * is returned untouched.
 *
 * @param text - Full document text
 * @returns Parsed metadata (or null), the raw block and the remaining body
 * @throws {MetadataParseError} When a block is present but cannot be parsed
 *
 * @example
 * extractFrontMatter('---\ntitle: Home\n---\n# Hi\n')
 * // { frontMatter: { title: 'Home' }, block: 'title: Home\n', body: '# Hi\n' }
 */
export function extractFrontMatter(text: string): FrontMatterSplit {
  const delimiter = DELIMITERS.find((d) => text.startsWith(d));
  if (!delimiter) {
    return { frontMatter: null, block: "", body: text };
  }

  const closing = findClosingDelimiter(text, delimiter);
  if (closing === -1) {
    return { frontMatter: null, block: "", body: text };
  }

  const block = text.slice(delimiter.length, closing);
  const body = text.slice(closing + delimiter.length);
  return { frontMatter: parseFrontMatter(block), block, body };
}
