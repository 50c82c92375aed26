/**
 * EPUB 3 packaging
 *
 * Collects ordered content parts and an optional cover image, then writes
 * the zip container: `mimetype` first and uncompressed, the container
 * descriptor, the package document, an NCX and a navigation document.
 */

import { randomUUID } from "node:crypto";
import JSZip from "jszip";
import { PackagingError, errorMessage } from "./errors.js";
import type { BookMeta } from "./types.js";

const CONTENT_DIR = "OEBPS";
const XHTML_MIME_TYPE = "application/xhtml+xml";

/** Guide reference types, as used by EPUB 2 `<guide>` */
export type ReferenceType = "title-page" | "text";

/** Landmark `epub:type` and label for each reference type, in landmark order */
const LANDMARKS: Array<{ reftype: ReferenceType; epubType: string; label: string }> = [
  { reftype: "title-page", epubType: "titlepage", label: "Title Page" },
  { reftype: "text", epubType: "bodymatter", label: "Start" },
];

/** Names the package itself uses next to the content parts */
const RESERVED_HREFS = ["content.opf", "toc.ncx", "nav.xhtml"];

/** One packaged content document */
export interface EpubContent {
  /** File name inside the package, e.g. 'intro.xhtml' */
  href: string;
  data: Buffer | string;
  /** Table of contents entry; untitled parts only appear in the reading order */
  title: string | null;
  reftype: ReferenceType;
}

interface CoverImage {
  href: string;
  data: Buffer;
  mimeType: string;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Href as written into XML attributes */
function hrefAttr(href: string): string {
  return escapeXml(encodeURI(href));
}

/** EPUB wants second precision: 2024-01-15T10:00:00Z */
function formatModified(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${CONTENT_DIR}/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

export class EpubBuilder {
  private readonly meta: BookMeta;
  private readonly identifier: string;
  private readonly parts: EpubContent[] = [];
  private readonly hrefs = new Set<string>(RESERVED_HREFS);
  private cover: CoverImage | null = null;

  constructor(meta: BookMeta) {
    this.meta = meta;
    this.identifier = meta.identifier ?? `urn:uuid:${randomUUID()}`;
  }

  /** Number of content parts added so far */
  get size(): number {
    return this.parts.length;
  }

  /**
   * Set the cover image.
   *
   * @throws {PackagingError} When a cover was already set or the name is taken
   */
  setCoverImage(href: string, data: Buffer, mimeType: string): this {
    if (this.cover) {
      throw new PackagingError(`a cover image was already added (${this.cover.href})`);
    }
    this.reserve(href);
    this.cover = { href, data, mimeType };
    return this;
  }

  /**
   * Append a content part to the reading order.
   *
   * @throws {PackagingError} When another part already uses the same name
   */
  addContent(content: EpubContent): this {
    this.reserve(content.href);
    this.parts.push(content);
    return this;
  }

  private reserve(href: string): void {
    if (this.hrefs.has(href)) {
      throw new PackagingError(`duplicate part name "${href}"`);
    }
    this.hrefs.add(href);
  }

  private packageDocument(modified: Date): string {
    const manifest = [
      `    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>`,
      `    <item id="nav" href="nav.xhtml" media-type="${XHTML_MIME_TYPE}" properties="nav"/>`,
    ];
    const metadata = [
      `    <dc:identifier id="book-id">${escapeXml(this.identifier)}</dc:identifier>`,
      `    <dc:title>${escapeXml(this.meta.title)}</dc:title>`,
      `    <dc:creator>${escapeXml(this.meta.author)}</dc:creator>`,
      `    <dc:language>${escapeXml(this.meta.language)}</dc:language>`,
      `    <meta property="dcterms:modified">${formatModified(modified)}</meta>`,
    ];
    if (this.cover) {
      metadata.push(`    <meta name="cover" content="cover-image"/>`);
      manifest.push(
        `    <item id="cover-image" href="${hrefAttr(this.cover.href)}" media-type="${escapeXml(this.cover.mimeType)}" properties="cover-image"/>`,
      );
    }

    const spine: string[] = [];
    const guide: string[] = [];
    this.parts.forEach((part, i) => {
      const id = `part-${i + 1}`;
      manifest.push(`    <item id="${id}" href="${hrefAttr(part.href)}" media-type="${XHTML_MIME_TYPE}"/>`);
      spine.push(`    <itemref idref="${id}"/>`);
      const title = part.title ?? (part.reftype === "title-page" ? "Title Page" : part.href);
      guide.push(`    <reference type="${part.reftype}" title="${escapeXml(title)}" href="${hrefAttr(part.href)}"/>`);
    });

    return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
${metadata.join("\n")}
  </metadata>
  <manifest>
${manifest.join("\n")}
  </manifest>
  <spine toc="ncx">
${spine.join("\n")}
  </spine>
  <guide>
${guide.join("\n")}
  </guide>
</package>
`;
  }

  private titledParts(): Array<EpubContent & { title: string }> {
    return this.parts.filter((part): part is EpubContent & { title: string } => part.title !== null);
  }

  private ncx(): string {
    const points = this.titledParts().map(
      (part, i) => `    <navPoint id="nav-${i + 1}" playOrder="${i + 1}">
      <navLabel><text>${escapeXml(part.title)}</text></navLabel>
      <content src="${hrefAttr(part.href)}"/>
    </navPoint>`,
    );

    return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="${escapeXml(this.identifier)}"/>
  </head>
  <docTitle><text>${escapeXml(this.meta.title)}</text></docTitle>
  <navMap>
${points.join("\n")}
  </navMap>
</ncx>
`;
  }

  private navDocument(): string {
    const entries = this.titledParts().map(
      (part) => `        <li><a href="${hrefAttr(part.href)}">${escapeXml(part.title)}</a></li>`,
    );
    const landmarks: string[] = [];
    for (const { reftype, epubType, label } of LANDMARKS) {
      const first = this.parts.find((part) => part.reftype === reftype);
      if (first) {
        landmarks.push(`        <li><a epub:type="${epubType}" href="${hrefAttr(first.href)}">${label}</a></li>`);
      }
    }

    return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${escapeXml(this.meta.language)}">
  <head>
    <title>${escapeXml(this.meta.title)}</title>
  </head>
  <body>
    <nav epub:type="toc" id="toc">
      <h1>Table of Contents</h1>
      <ol>
${entries.join("\n")}
      </ol>
    </nav>
    <nav epub:type="landmarks" hidden="hidden">
      <ol>
${landmarks.join("\n")}
      </ol>
    </nav>
  </body>
</html>
`;
  }

  /**
   * Serialize the package.
   *
   * @param modified - Modification time recorded in the metadata
   * @throws {PackagingError} When the book has no content parts or zipping fails
   */
  async generate(modified: Date = new Date()): Promise<Buffer> {
    if (this.parts.length === 0) {
      throw new PackagingError("the book has no content parts");
    }

    const zip = new JSZip();
    zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
    zip.file("META-INF/container.xml", CONTAINER_XML);
    zip.file(`${CONTENT_DIR}/content.opf`, this.packageDocument(modified));
    zip.file(`${CONTENT_DIR}/toc.ncx`, this.ncx());
    zip.file(`${CONTENT_DIR}/nav.xhtml`, this.navDocument());
    if (this.cover) {
      zip.file(`${CONTENT_DIR}/${this.cover.href}`, this.cover.data);
    }
    for (const part of this.parts) {
      zip.file(`${CONTENT_DIR}/${part.href}`, part.data);
    }

    try {
      return await zip.generateAsync({
        type: "nodebuffer",
        compression: "DEFLATE",
        mimeType: "application/epub+zip",
      });
    } catch (error) {
      throw new PackagingError(`could not write the package: ${errorMessage(error)}`, null, { cause: error });
    }
  }
}
