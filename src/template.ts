/**
 * Page templates
 *
 * Pages are rendered through the template named `default`, which receives
 * the document's front matter plus the rendered HTML as `body`.
 */

import { Liquid } from "liquidjs";
import { TemplateRenderError, errorMessage } from "./errors.js";
import type { FrontMatter, TemplateVariables } from "./types.js";

/** Name of the template every page is rendered with */
export const DEFAULT_TEMPLATE = "default";

/** File extension of template sources; these are never copied to the output */
export const TEMPLATE_EXTENSION = ".liquid";

/** Reserved variable holding the rendered page content */
export const BODY_VARIABLE = "body";

/** Anything that can render a named template with flat string variables */
export interface TemplateRenderer {
  render(template: string, variables: TemplateVariables): Promise<string>;
}

export interface LiquidRendererOptions {
  /** Directory holding `<name>.liquid` files */
  root: string;
  /** Fail on variables the template uses but the page does not define */
  strict?: boolean;
}

/**
 * Renders `<root>/<name>.liquid` with liquidjs.
 * Output is not escaped, so the pre-rendered body is inserted as-is.
 */
export class LiquidRenderer implements TemplateRenderer {
  private readonly engine: Liquid;

  constructor(options: LiquidRendererOptions) {
    this.engine = new Liquid({
      root: options.root,
      extname: TEMPLATE_EXTENSION,
      strictVariables: options.strict ?? false,
      strictFilters: true,
    });
  }

  async render(template: string, variables: TemplateVariables): Promise<string> {
    return String(await this.engine.renderFile(template, variables));
  }
}

/**
 * Merge front matter and rendered HTML into template variables.
 * A front-matter `body` entry is replaced by the HTML, with a warning.
 *
 * @param html - Rendered page content
 * @param frontMatter - Document metadata, if any
 * @param sourcePath - Document path, used in the warning
 */
export function buildTemplateVariables(html: string, frontMatter: FrontMatter | null, sourcePath?: string): TemplateVariables {
  const variables: TemplateVariables = { ...frontMatter };
  if (Object.hasOwn(variables, BODY_VARIABLE)) {
    const where = sourcePath ? ` in ${sourcePath}` : "";
    console.warn(`Warning: front matter key "${BODY_VARIABLE}"${where} is ignored, the page content takes its place.`);
  }
  variables[BODY_VARIABLE] = html;
  return variables;
}

/**
 * Render a page: build its variables and run them through the default template.
 *
 * @throws {TemplateRenderError} When the renderer fails
 */
export async function bindTemplate(
  html: string,
  frontMatter: FrontMatter | null,
  renderer: TemplateRenderer,
  sourcePath?: string,
): Promise<string> {
  const variables = buildTemplateVariables(html, frontMatter, sourcePath);
  try {
    return await renderer.render(DEFAULT_TEMPLATE, variables);
  } catch (error) {
    throw new TemplateRenderError(
      `template "${DEFAULT_TEMPLATE}" failed: ${errorMessage(error)}`,
      DEFAULT_TEMPLATE,
      sourcePath ?? null,
      { cause: error },
    );
  }
}
