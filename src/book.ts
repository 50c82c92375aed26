/**
 * eBook assembly
 *
 * Documents are packaged by file-name convention, in scan order:
 *
 *   cover.* / _cover.*   cover image
 *   title.* / _title.*   title page
 *   anything else        next chapter
 *
 * Files are embedded as they are on disk. Markdown is not converted here,
 * so book sources are expected to be XHTML already.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { EpubBuilder, type ReferenceType } from "./epub.js";
import { PackagingError, PressError, errorMessage } from "./errors.js";
import { fileStem } from "./document.js";
import { getImageMimeType } from "./media.js";
import type { BookMeta, BookRole, Document } from "./types.js";

const COVER_STEMS = ["cover", "_cover"];
const TITLE_STEMS = ["title", "_title"];

/** The cover image */
export interface CoverPart {
  kind: "cover";
  doc: Document;
  role: Extract<BookRole, { kind: "cover" }>;
  mimeType: string;
}

/** A title page or chapter, packaged as a content document */
export interface ContentPart {
  kind: "content";
  doc: Document;
  role: Exclude<BookRole, { kind: "cover" }>;
  /** File name inside the package */
  href: string;
  /** Table of contents title; null for untitled parts */
  title: string | null;
  reftype: ReferenceType;
}

/** One document with its place in the book */
export type BookPart = CoverPart | ContentPart;

/**
 * Role of a document from its file stem (exact, case-sensitive match).
 * Chapters get their number later, from their position.
 */
export function classifyRole(stem: string): "cover" | "titlePage" | "chapter" {
  if (COVER_STEMS.includes(stem)) return "cover";
  if (TITLE_STEMS.includes(stem)) return "titlePage";
  return "chapter";
}

/** Chapter title: the Markdown `title` entry if there is one, else 'Chapter N' */
export function chapterTitle(doc: Document, number: number): string {
  if (doc.kind === "markdown" && doc.frontMatter?.title) {
    return doc.frontMatter.title;
  }
  return `Chapter ${number}`;
}

/**
 * Assign roles, chapter numbers and part names, keeping scan order.
 * Only chapters consume a chapter number.
 *
 * @example
 * // [intro.md, cover.png, chapter-a.md, _title.md, chapter-b.md]
 * // -> intro = Chapter 1, chapter-a = Chapter 2, chapter-b = Chapter 3
 */
export function planBook(documents: Document[]): BookPart[] {
  let chapterNumber = 1;

  return documents.map((doc): BookPart => {
    const stem = fileStem(doc);
    switch (classifyRole(stem ?? "")) {
      case "cover":
        return { kind: "cover", doc, role: { kind: "cover" }, mimeType: getImageMimeType(doc.sourcePath) };
      case "titlePage":
        return { kind: "content", doc, role: { kind: "titlePage" }, href: `${stem}.xhtml`, title: null, reftype: "title-page" };
      case "chapter": {
        const number = chapterNumber++;
        return {
          kind: "content",
          doc,
          role: { kind: "chapter", number },
          href: stem ? `${stem}.xhtml` : `chapter${number}.xhtml`,
          title: chapterTitle(doc, number),
          reftype: "text",
        };
      }
    }
  });
}

async function readPart(sourcePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(sourcePath);
  } catch (error) {
    throw new PackagingError(`could not read file: ${errorMessage(error)}`, sourcePath, { cause: error });
  }
}

/**
 * Add every planned part to the package builder, in order.
 *
 * @throws {PackagingError} On the first part that cannot be read or added
 */
export async function assembleBook(plan: BookPart[], builder: EpubBuilder): Promise<void> {
  for (const part of plan) {
    const { doc } = part;
    const data = await readPart(doc.sourcePath);
    try {
      if (part.kind === "cover") {
        console.log(`  cover: ${doc.sourcePath} (${part.mimeType})`);
        builder.setCoverImage(`cover${path.extname(doc.sourcePath)}`, data, part.mimeType);
      } else {
        const label = part.role.kind === "chapter" ? `title: ${part.title}` : "title page";
        console.log(`  adding: ${doc.sourcePath} as ${part.href}, ${label}`);
        builder.addContent({ href: part.href, data, title: part.title, reftype: part.reftype });
      }
    } catch (error) {
      if (error instanceof PressError && error.sourcePath === null) {
        throw new PackagingError(error.message, doc.sourcePath, { cause: error });
      }
      throw error;
    }
  }
}

/**
 * Build the eBook and write it to `outputFile`. Nothing is written unless
 * every document was added.
 *
 * @returns Number of documents processed
 */
export async function generateBook(documents: Document[], meta: BookMeta, outputFile: string): Promise<number> {
  const plan = planBook(documents);
  const builder = new EpubBuilder(meta);
  console.log(`Generating ePub for ${documents.length} files...`);

  await assembleBook(plan, builder);
  const epub = await builder.generate();

  try {
    await fs.mkdir(path.dirname(outputFile), { recursive: true });
    await fs.writeFile(outputFile, epub);
  } catch (error) {
    throw new PackagingError(`could not write ${outputFile}: ${errorMessage(error)}`, null, { cause: error });
  }
  console.log(`ePub saved to: ${outputFile} (${builder.size} parts)`);
  return documents.length;
}
