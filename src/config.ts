/**
 * Project configuration
 *
 * Read from an optional `inkpress.yaml` in the working directory:
 *
 *   source: markdown
 *   output: _website
 *   templates: templates
 *   strict_templates: false
 *   book:
 *     title: My Book
 *     author: Author Name
 *     language: en
 *     file: book.epub
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { load } from "js-yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "inkpress.yaml";

const configSchema = z.object({
  source: z.string().min(1).default("markdown"),
  output: z.string().min(1).default("_website"),
  templates: z.string().min(1).default("templates"),
  strict_templates: z.boolean().default(false),
  book: z
    .object({
      title: z.string().default("My Book"),
      author: z.string().default("Author Name"),
      language: z.string().min(1).default("en"),
      identifier: z.string().min(1).optional(),
      file: z.string().min(1).default("book.epub"),
    })
    .default({}),
});

export type PressConfig = z.infer<typeof configSchema>;

/** Values given on the command line; they win over the config file */
export interface ConfigOverrides {
  source?: string | null;
  output?: string | null;
  templates?: string | null;
  title?: string | null;
  author?: string | null;
}

/**
 * Load the configuration file. A missing default file yields the defaults;
 * a missing file that was asked for explicitly is an error.
 *
 * @param configPath - Explicit config file, or null for `inkpress.yaml` in the cwd
 * @throws {Error} When the file is unreadable or does not match the schema
 */
export function loadConfig(configPath: string | null = null): PressConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  if (configPath === null && !fs.existsSync(resolved)) {
    return configSchema.parse({});
  }

  const raw = load(fs.readFileSync(resolved, "utf-8"));
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid ${resolved}: ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Apply command line overrides on top of a loaded config.
 */
export function applyOverrides(config: PressConfig, overrides: ConfigOverrides): PressConfig {
  return {
    ...config,
    source: overrides.source ?? config.source,
    output: overrides.output ?? config.output,
    templates: overrides.templates ?? config.templates,
    book: {
      ...config.book,
      title: overrides.title ?? config.book.title,
      author: overrides.author ?? config.book.author,
    },
  };
}
