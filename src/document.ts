/**
 * Turn scanned file paths into documents
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DocumentReadError, MetadataParseError, errorMessage } from "./errors.js";
import { extractFrontMatter } from "./frontmatter.js";
import type { Document } from "./types.js";

const MARKDOWN_EXTENSIONS = [".md", ".markdown"];

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Check whether a path names a Markdown file (case-sensitive extension match).
 *
 * @example
 * isMarkdownPath('docs/intro.md') // true
 * isMarkdownPath('docs/README.MD') // false
 */
export function isMarkdownPath(filePath: string): boolean {
  return MARKDOWN_EXTENSIONS.includes(path.extname(filePath));
}

/**
 * Read a file as strict UTF-8 text.
 *
 * @throws {DocumentReadError} On I/O failure or invalid UTF-8
 */
export async function readText(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw new DocumentReadError(`could not read file: ${errorMessage(error)}`, filePath, { cause: error });
  }
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new DocumentReadError("file is not valid UTF-8 text", filePath, { cause: error });
  }
}

/**
 * Classify a file by extension. Markdown files are read and split into
 * front matter and body; anything else is left unread.
 *
 * @param sourcePath - Path of the scanned file
 * @throws {DocumentReadError} When a Markdown file cannot be read
 * @throws {MetadataParseError} When its metadata block is malformed
 */
export async function classifyDocument(sourcePath: string): Promise<Document> {
  if (!isMarkdownPath(sourcePath)) {
    return { kind: "opaque", sourcePath };
  }

  const text = await readText(sourcePath);
  try {
    const { frontMatter, body } = extractFrontMatter(text);
    return { kind: "markdown", sourcePath, frontMatter, body };
  } catch (error) {
    if (error instanceof MetadataParseError) {
      throw new MetadataParseError(error.message, sourcePath, { cause: error });
    }
    throw error;
  }
}

/**
 * Classify every scanned path, in order. The first failure aborts.
 */
export async function classifyDocuments(sourcePaths: string[]): Promise<Document[]> {
  const documents: Document[] = [];
  for (const sourcePath of sourcePaths) {
    documents.push(await classifyDocument(sourcePath));
  }
  return documents;
}

/**
 * File name without its last extension, or null when the path has no usable name.
 *
 * @example
 * fileStem({ kind: 'opaque', sourcePath: 'book/cover.png' }) // 'cover'
 */
export function fileStem(doc: Document): string | null {
  return path.parse(doc.sourcePath).name || null;
}
