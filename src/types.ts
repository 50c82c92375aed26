/**
 * Shared type definitions for site and book generation
 */

/** Flat metadata read from the `---` block at the top of a Markdown file */
export type FrontMatter = Readonly<Record<string, string>>;

/** A Markdown source, already split into metadata and body */
export interface MarkdownDocument {
  kind: "markdown";
  /** Path the document was read from */
  sourcePath: string;
  /** Parsed metadata block, or null when the file has none */
  frontMatter: FrontMatter | null;
  /** Markdown text following the metadata block */
  body: string;
}

/** Any other file; copied or packaged without being read at scan time */
export interface OpaqueDocument {
  kind: "opaque";
  sourcePath: string;
}

export type Document = MarkdownDocument | OpaqueDocument;

/** Variables handed to the page template: front matter plus the rendered `body` */
export type TemplateVariables = Record<string, string>;

/** Structural role of a document inside the eBook */
export type BookRole = { kind: "cover" } | { kind: "titlePage" } | { kind: "chapter"; number: number };

/** Metadata for the generated eBook */
export interface BookMeta {
  title: string;
  author: string;
  /** BCP 47 language tag, e.g. 'en' */
  language: string;
  /** Unique identifier; a random urn:uuid is used when null */
  identifier: string | null;
}
