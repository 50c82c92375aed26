#!/usr/bin/env node
/**
 * inkpress command line
 *
 * Usage: inkpress <site|book> [options]
 */

import { realpathSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { generateBook } from "./book.js";
import { applyOverrides, loadConfig, type PressConfig } from "./config.js";
import { classifyDocuments } from "./document.js";
import { describeError } from "./errors.js";
import { checkOutputRoot, ensureTemplateDir, generateSite, prepareOutputRoot } from "./site.js";
import { LiquidRenderer } from "./template.js";
import type { Document } from "./types.js";
import { formatDuration, getNullableStringArg, getPositionalArg, hasHelpFlag, setupSignalHandlers } from "./utils.js";
import { walkFiles } from "./walk.js";

export type Command = "site" | "book";

export interface CliOptions {
  command: Command | null;
  source: string | null;
  output: string | null;
  templates: string | null;
  config: string | null;
  title: string | null;
  author: string | null;
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["--source", "--output", "--templates", "--config", "--title", "--author"];

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log("Usage: inkpress <site|book> [options]");
  console.log("");
  console.log("Generate a static website or an EPUB book from a folder of Markdown files.");
  console.log("");
  console.log("Commands:");
  console.log("  site                 Render every Markdown file to HTML, copy everything else");
  console.log("  book                 Package the files as an EPUB (cover, title page, chapters)");
  console.log("");
  console.log("Options:");
  console.log('  --source <dir>       Source directory (default: "markdown")');
  console.log('  --output <dir>       Output directory, wiped on every run (default: "_website")');
  console.log('  --templates <dir>    Template directory (default: "templates")');
  console.log('  --config <file>      Config file (default: "inkpress.yaml" if present)');
  console.log("  --title <title>      Book title");
  console.log("  --author <name>      Book author");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log('  inkpress book --source chapters --title "My Book"');
}

function toCommand(value: string): Command | null {
  return value === "site" || value === "book" ? value : null;
}

/**
 * Parse command line arguments
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    command: toCommand(getPositionalArg(args, VALUE_FLAGS)),
    source: getNullableStringArg(args, "--source"),
    output: getNullableStringArg(args, "--output"),
    templates: getNullableStringArg(args, "--templates"),
    config: getNullableStringArg(args, "--config"),
    title: getNullableStringArg(args, "--title"),
    author: getNullableStringArg(args, "--author"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Scan the source directory and classify every file.
 * A missing source directory is created.
 *
 * @param skipDirs - Directories left out of the scan (output and templates)
 */
export async function loadDocuments(sourceRoot: string, skipDirs: string[] = []): Promise<Document[]> {
  await fs.mkdir(sourceRoot, { recursive: true });
  const skipped = new Set(skipDirs.map((dir) => path.resolve(dir)));
  const files = await walkFiles(sourceRoot, { prune: (dir) => skipped.has(path.resolve(dir)) });
  const documents = await classifyDocuments(files);
  if (documents.length === 0) {
    console.log(`\nPlease add files to source directory: ${sourceRoot}\n`);
  }
  return documents;
}

/**
 * Run one command against a resolved configuration.
 *
 * @returns Number of documents processed
 */
export async function run(command: Command, config: PressConfig): Promise<number> {
  const documents = await loadDocuments(config.source, [config.output, config.templates]);
  await ensureTemplateDir(config.templates);

  switch (command) {
    case "site": {
      const renderer = new LiquidRenderer({ root: config.templates, strict: config.strict_templates });
      return generateSite(
        documents,
        { sourceRoot: config.source, outputRoot: config.output, templateDir: config.templates },
        renderer,
      );
    }
    case "book": {
      checkOutputRoot(config.source, config.output);
      await prepareOutputRoot(config.output, config.templates);
      const { title, author, language, identifier, file } = config.book;
      return generateBook(documents, { title, author, language, identifier: identifier ?? null }, path.join(config.output, file));
    }
  }
}

export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.command) {
    showUsage();
    process.exit(1);
  }

  const start = Date.now();
  try {
    const config = applyOverrides(loadConfig(options.config), options);
    const count = await run(options.command, config);
    console.log(`\nDone! Processed ${count} documents in ${formatDuration(Date.now() - start)}.`);
  } catch (error) {
    console.error(`\nError: ${describeError(error)}`);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  setupSignalHandlers("Generation");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
