import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import { EpubBuilder, escapeXml } from "./epub.js";
import { PackagingError } from "./errors.js";
import type { BookMeta } from "./types.js";

const meta: BookMeta = { title: "Test Book", author: "Test Author", language: "en", identifier: "urn:isbn:0000000000" };

async function readEntry(zip: JSZip, name: string): Promise<string> {
  const entry = zip.file(name);
  if (!entry) throw new Error(`missing ${name}`);
  return entry.async("string");
}

describe("escapeXml", () => {
  it("escapes XML special characters", () => {
    expect(escapeXml(`Tom & Jerry's <"1">`)).toBe("Tom &amp; Jerry&apos;s &lt;&quot;1&quot;&gt;");
  });
});

describe("EpubBuilder", () => {
  it("counts content parts", () => {
    const builder = new EpubBuilder(meta);
    builder
      .addContent({ href: "a.xhtml", data: "<p>a</p>", title: "Chapter 1", reftype: "text" })
      .addContent({ href: "b.xhtml", data: "<p>b</p>", title: "Chapter 2", reftype: "text" });
    expect(builder.size).toBe(2);
  });

  it("rejects duplicate part names", () => {
    const builder = new EpubBuilder(meta);
    builder.addContent({ href: "a.xhtml", data: "", title: "Chapter 1", reftype: "text" });
    expect(() => builder.addContent({ href: "a.xhtml", data: "", title: "Chapter 2", reftype: "text" })).toThrow(
      'duplicate part name "a.xhtml"',
    );
  });

  it("rejects names the package uses itself", () => {
    const builder = new EpubBuilder(meta);
    expect(() => builder.addContent({ href: "nav.xhtml", data: "", title: "Nav", reftype: "text" })).toThrow(
      PackagingError,
    );
  });

  it("accepts a single cover image", () => {
    const builder = new EpubBuilder(meta);
    builder.setCoverImage("cover.png", Buffer.from("png"), "image/png");
    expect(() => builder.setCoverImage("cover.jpg", Buffer.from("jpg"), "image/jpeg")).toThrow(
      "a cover image was already added (cover.png)",
    );
  });

  it("refuses to generate an empty book", async () => {
    const builder = new EpubBuilder(meta);
    builder.setCoverImage("cover.png", Buffer.from("png"), "image/png");
    await expect(builder.generate()).rejects.toThrow("the book has no content parts");
  });

  it("writes the mimetype entry first and uncompressed", async () => {
    const builder = new EpubBuilder(meta);
    builder.addContent({ href: "a.xhtml", data: "<p>a</p>", title: "Chapter 1", reftype: "text" });
    const epub = await builder.generate();

    // local file header: compression method at offset 8, name at 30
    expect(epub.readUInt16LE(8)).toBe(0);
    expect(epub.subarray(30, 38).toString("ascii")).toBe("mimetype");
    expect(epub.subarray(38, 58).toString("ascii")).toBe("application/epub+zip");
  });

  describe("generated package", () => {
    async function build(): Promise<JSZip> {
      const builder = new EpubBuilder(meta);
      builder
        .setCoverImage("cover.jpg", Buffer.from("jpg"), "image/jpeg")
        .addContent({ href: "title.xhtml", data: "<p>title</p>", title: null, reftype: "title-page" })
        .addContent({ href: "my part.xhtml", data: "<p>one</p>", title: "One & Only", reftype: "text" });
      return JSZip.loadAsync(await builder.generate(new Date("2024-01-15T10:00:00.123Z")));
    }

    it("points the container at the package document", async () => {
      const zip = await build();
      expect(await readEntry(zip, "META-INF/container.xml")).toContain('full-path="OEBPS/content.opf"');
    });

    it("stores every part under OEBPS", async () => {
      const zip = await build();
      expect(await readEntry(zip, "OEBPS/title.xhtml")).toBe("<p>title</p>");
      expect(await readEntry(zip, "OEBPS/my part.xhtml")).toBe("<p>one</p>");
      expect(await readEntry(zip, "OEBPS/cover.jpg")).toBe("jpg");
    });

    it("writes metadata, manifest, spine and guide", async () => {
      const opf = await readEntry(await build(), "OEBPS/content.opf");

      expect(opf).toContain('<dc:identifier id="book-id">urn:isbn:0000000000</dc:identifier>');
      expect(opf).toContain("<dc:title>Test Book</dc:title>");
      expect(opf).toContain("<dc:creator>Test Author</dc:creator>");
      expect(opf).toContain('<meta property="dcterms:modified">2024-01-15T10:00:00Z</meta>');
      expect(opf).toContain(
        '<item id="cover-image" href="cover.jpg" media-type="image/jpeg" properties="cover-image"/>',
      );
      expect(opf).toContain('<item id="part-2" href="my%20part.xhtml" media-type="application/xhtml+xml"/>');
      expect(opf).toContain('    <itemref idref="part-1"/>\n    <itemref idref="part-2"/>');
      expect(opf).toContain('<reference type="title-page" title="Title Page" href="title.xhtml"/>');
      expect(opf).toContain('<reference type="text" title="One &amp; Only" href="my%20part.xhtml"/>');
    });

    it("lists only titled parts in the tables of contents", async () => {
      const zip = await build();
      const nav = await readEntry(zip, "OEBPS/nav.xhtml");
      const ncx = await readEntry(zip, "OEBPS/toc.ncx");

      expect(nav).toContain('<li><a href="my%20part.xhtml">One &amp; Only</a></li>');
      expect(nav).not.toContain('<li><a href="title.xhtml">');
      expect(nav).toContain('<li><a epub:type="titlepage" href="title.xhtml">Title Page</a></li>');
      expect(nav).toContain('<li><a epub:type="bodymatter" href="my%20part.xhtml">Start</a></li>');
      expect(ncx).toContain('<navPoint id="nav-1" playOrder="1">');
      expect(ncx).not.toContain('id="nav-2"');
    });
  });

  it("generates an identifier when none is given", async () => {
    const builder = new EpubBuilder({ ...meta, identifier: null });
    builder.addContent({ href: "a.xhtml", data: "<p>a</p>", title: "Chapter 1", reftype: "text" });
    const opf = await readEntry(await JSZip.loadAsync(await builder.generate()), "OEBPS/content.opf");
    expect(opf).toMatch(/<dc:identifier id="book-id">urn:uuid:[0-9a-f-]{36}<\/dc:identifier>/);
  });
});
