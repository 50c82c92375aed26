import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { applyOverrides, loadConfig } from "./config.js";

const DEFAULTS = {
  source: "markdown",
  output: "_website",
  templates: "templates",
  strict_templates: false,
  book: { title: "My Book", author: "Author Name", language: "en", file: "book.epub" },
};

describe("loadConfig", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "inkpress-config-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("returns defaults when there is no config file", () => {
    vi.spyOn(process, "cwd").mockReturnValue(tmp);
    expect(loadConfig()).toEqual(DEFAULTS);
  });

  it("reads inkpress.yaml from the working directory", async () => {
    await fs.writeFile(path.join(tmp, "inkpress.yaml"), "output: public\n");
    vi.spyOn(process, "cwd").mockReturnValue(tmp);
    expect(loadConfig().output).toBe("public");
  });

  it("fills in missing keys", async () => {
    const file = path.join(tmp, "press.yaml");
    await fs.writeFile(file, "source: docs\nbook:\n  title: Test Title\n  identifier: urn:isbn:test\n");

    expect(loadConfig(file)).toEqual({
      ...DEFAULTS,
      source: "docs",
      book: { ...DEFAULTS.book, title: "Test Title", identifier: "urn:isbn:test" },
    });
  });

  it("treats an empty file as defaults", async () => {
    const file = path.join(tmp, "empty.yaml");
    await fs.writeFile(file, "");
    expect(loadConfig(file)).toEqual(DEFAULTS);
  });

  it("fails on an explicit file that does not exist", () => {
    expect(() => loadConfig(path.join(tmp, "missing.yaml"))).toThrow();
  });

  it("reports the first invalid key", async () => {
    const file = path.join(tmp, "bad.yaml");
    await fs.writeFile(file, "strict_templates: maybe\n");
    expect(() => loadConfig(file)).toThrow(`Invalid ${file}: strict_templates: Expected boolean, received string`);
  });

  it("reports nested keys with their path", async () => {
    const file = path.join(tmp, "bad.yaml");
    await fs.writeFile(file, "book:\n  language: \"\"\n");
    expect(() => loadConfig(file)).toThrow(`Invalid ${file}: book.language:`);
  });
});

describe("applyOverrides", () => {
  it("lets command line values win", () => {
    const config = applyOverrides(DEFAULTS, { source: "src", output: null, title: "Override", author: "Someone" });
    expect(config).toEqual({
      ...DEFAULTS,
      source: "src",
      book: { ...DEFAULTS.book, title: "Override", author: "Someone" },
    });
  });

  it("keeps the config without overrides", () => {
    expect(applyOverrides(DEFAULTS, {})).toEqual(DEFAULTS);
  });
});
