import { describe, expect, it } from "vitest";
import { MetadataParseError } from "./errors.js";
import { extractFrontMatter, parseFrontMatter } from "./frontmatter.js";

describe("extractFrontMatter", () => {
  it("splits metadata from the body", () => {
    expect(extractFrontMatter("---\ntitle: Home\n---\n# Hi\n")).toEqual({
      frontMatter: { title: "Home" },
      block: "title: Home\n",
      body: "# Hi\n",
    });
  });

  it("handles CRLF delimiters", () => {
    expect(extractFrontMatter("---\r\ntitle: Home\r\n---\r\nBody")).toEqual({
      frontMatter: { title: "Home" },
      block: "title: Home\r\n",
      body: "Body",
    });
  });

  it("returns text without a metadata block untouched", () => {
    expect(extractFrontMatter("# Hi\n")).toEqual({ frontMatter: null, block: "", body: "# Hi\n" });
  });

  it("requires the opening delimiter to be a whole line", () => {
    expect(extractFrontMatter("--- \ntitle: x\n---\n")).toEqual({
      frontMatter: null,
      block: "",
      body: "--- \ntitle: x\n---\n",
    });
  });

  it("leaves an unclosed block untouched", () => {
    const text = "---\ntitle: x\nno closing line";
    expect(extractFrontMatter(text)).toEqual({ frontMatter: null, block: "", body: text });
  });

  it("ignores a closing delimiter that does not start a line", () => {
    const text = "---\na: b ---\nc";
    expect(extractFrontMatter(text)).toEqual({ frontMatter: null, block: "", body: text });
  });

  it("requires the closing delimiter to use the opening line ending", () => {
    const text = "---\na: b\r\n---\r\nx";
    expect(extractFrontMatter(text)).toEqual({ frontMatter: null, block: "", body: text });
  });

  it("treats an empty block as empty metadata", () => {
    expect(extractFrontMatter("---\n---\nBody")).toEqual({ frontMatter: {}, block: "", body: "Body" });
  });

  it("reproduces the input from delimiter, block and body", () => {
    const text = "---\ntitle: Notes\nauthor: Someone\n---\n\nFirst line\n---\nnot metadata\n";
    const { block, body } = extractFrontMatter(text);
    expect(`---\n${block}---\n${body}`).toBe(text);
    expect(body).toBe("\nFirst line\n---\nnot metadata\n");
  });

  it("stops at the first closing delimiter", () => {
    const { frontMatter, body } = extractFrontMatter("---\na: one\n---\n---\nb: two\n---\n");
    expect(frontMatter).toEqual({ a: "one" });
    expect(body).toBe("---\nb: two\n---\n");
  });

  it("throws MetadataParseError for malformed YAML", () => {
    expect(() => extractFrontMatter("---\ntitle: [unclosed\n---\nBody")).toThrow(MetadataParseError);
    expect(() => extractFrontMatter("---\ntitle: [unclosed\n---\nBody")).toThrow(/^invalid metadata block: /);
  });
});

describe("parseFrontMatter", () => {
  it("parses a flat string mapping", () => {
    expect(parseFrontMatter('title: "My Website"\nlayout: wide\n')).toEqual({ title: "My Website", layout: "wide" });
  });

  it("keeps dates as strings", () => {
    expect(parseFrontMatter("date: 2024-01-15\n")).toEqual({ date: "2024-01-15" });
  });

  it("rejects numbers with the offending key", () => {
    expect(() => parseFrontMatter("count: 3\n")).toThrow(
      'metadata must be a flat mapping of strings at "count": Expected string, received number',
    );
  });

  it("rejects booleans", () => {
    expect(() => parseFrontMatter("draft: true\n")).toThrow(MetadataParseError);
  });

  it("rejects nested mappings", () => {
    expect(() => parseFrontMatter("author:\n  name: Someone\n")).toThrow(/at "author"/);
  });

  it("rejects a list at the top level", () => {
    expect(() => parseFrontMatter("- a\n- b\n")).toThrow(
      "metadata must be a flat mapping of strings: Expected object, received array",
    );
  });

  it("returns an empty mapping for blank input", () => {
    expect(parseFrontMatter("")).toEqual({});
    expect(parseFrontMatter("\n")).toEqual({});
  });

  it("carries no source path on its own", () => {
    try {
      parseFrontMatter("count: 3\n");
      expect.fail("expected parseFrontMatter to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(MetadataParseError);
      expect(error).toHaveProperty("sourcePath", null);
    }
  });
});
