/**
 * Static website generation
 *
 * The output root mirrors the source root: Markdown documents become
 * `.html` pages rendered through the `default` template, every other file
 * is copied byte for byte.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { OutputWriteError, PathError, PressError, errorMessage } from "./errors.js";
import { renderMarkdown } from "./markdown.js";
import { TEMPLATE_EXTENSION, bindTemplate, type TemplateRenderer } from "./template.js";
import type { Document } from "./types.js";
import { copyTree } from "./walk.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Templates shipped with the package, used to seed a missing template directory */
export const BUNDLED_TEMPLATES_DIR = path.resolve(__dirname, "..", "templates");

export interface SiteOptions {
  /** Directory the documents were scanned from */
  sourceRoot: string;
  /** Directory the website is written to; wiped on every run */
  outputRoot: string;
  /** Directory holding the page templates and their assets */
  templateDir: string;
}

/**
 * Map a document to its output path under `outputRoot`.
 * Markdown documents get `.html` in place of their extension.
 *
 * @throws {PathError} When the document is not below `sourceRoot`
 *
 * @example
 * outputPathFor({ kind: 'opaque', sourcePath: 'src/img/a.png' }, 'src', 'out') // 'out/img/a.png'
 */
export function outputPathFor(doc: Document, sourceRoot: string, outputRoot: string): string {
  const relative = path.relative(sourceRoot, doc.sourcePath);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathError(`document is not inside ${sourceRoot}`, doc.sourcePath);
  }

  const target = path.join(outputRoot, relative);
  switch (doc.kind) {
    case "opaque":
      return target;
    case "markdown": {
      const { dir, name } = path.parse(target);
      return path.join(dir, `${name}.html`);
    }
  }
}

/**
 * Create the template directory from the bundled templates if it does not exist.
 *
 * @returns True when templates were written
 */
export async function ensureTemplateDir(templateDir: string, bundledDir: string = BUNDLED_TEMPLATES_DIR): Promise<boolean> {
  try {
    await fs.access(templateDir);
    return false;
  } catch {
    console.log(`Creating ${templateDir} from the default templates...`);
  }
  await fs.mkdir(templateDir, { recursive: true });
  await copyTree(bundledDir, templateDir);
  return true;
}

/**
 * Refuse an output root that contains the source root, since it gets wiped.
 *
 * @throws {PathError} When wiping `outputRoot` would delete the sources
 */
export function checkOutputRoot(sourceRoot: string, outputRoot: string): void {
  const fromOutput = path.relative(path.resolve(outputRoot), path.resolve(sourceRoot));
  if (!fromOutput.startsWith("..") && !path.isAbsolute(fromOutput)) {
    throw new PathError(`output directory ${outputRoot} contains the sources`, sourceRoot);
  }
}

/**
 * Wipe the output root and seed it with the template assets
 * (stylesheets, images, ...), leaving out the template sources.
 */
export async function prepareOutputRoot(outputRoot: string, templateDir: string): Promise<void> {
  await fs.rm(outputRoot, { recursive: true, force: true });
  await fs.mkdir(outputRoot, { recursive: true });
  const copied = await copyTree(templateDir, outputRoot, [TEMPLATE_EXTENSION]);
  console.log(`Copied ${copied} template asset(s) to ${outputRoot}`);
}

async function writeOutput<T>(sourcePath: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof PressError) throw error;
    throw new OutputWriteError(errorMessage(error), sourcePath, { cause: error });
  }
}

/**
 * Generate one document's output file.
 */
export async function generatePage(doc: Document, options: SiteOptions, renderer: TemplateRenderer): Promise<string> {
  const outPath = outputPathFor(doc, options.sourceRoot, options.outputRoot);
  await writeOutput(doc.sourcePath, () => fs.mkdir(path.dirname(outPath), { recursive: true }));

  switch (doc.kind) {
    case "opaque":
      console.log(`  copy: ${doc.sourcePath} -> ${outPath}`);
      await writeOutput(doc.sourcePath, () => fs.copyFile(doc.sourcePath, outPath));
      break;
    case "markdown": {
      console.log(`  convert: ${doc.sourcePath} -> ${outPath}`);
      const html = renderMarkdown(doc.body);
      const page = await bindTemplate(html, doc.frontMatter, renderer, doc.sourcePath);
      await writeOutput(doc.sourcePath, () => fs.writeFile(outPath, page, "utf-8"));
      break;
    }
  }
  return outPath;
}

/**
 * Build the website: wipe and seed the output root, then generate every
 * document in scan order. The first failure aborts the run; files written
 * before it stay in place.
 *
 * @returns Number of documents processed
 */
export async function generateSite(documents: Document[], options: SiteOptions, renderer: TemplateRenderer): Promise<number> {
  checkOutputRoot(options.sourceRoot, options.outputRoot);
  await prepareOutputRoot(options.outputRoot, options.templateDir);
  console.log(`Generating html for ${documents.length} files...`);

  for (const doc of documents) {
    await generatePage(doc, options, renderer);
  }
  return documents.length;
}
