/**
 * Error taxonomy for site and book generation.
 *
 * Every error carries the source path of the document that was being
 * processed (when there is one) so the CLI can name the failing file.
 */

export class PressError extends Error {
  /** Source document the failure belongs to, if any */
  readonly sourcePath: string | null;

  constructor(message: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PressError";
    this.sourcePath = sourcePath;
  }
}

/** The leading metadata block is not a flat string-to-string mapping */
export class MetadataParseError extends PressError {
  constructor(message: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, sourcePath, options);
    this.name = "MetadataParseError";
  }
}

/** A source file could not be read or is not valid UTF-8 */
export class DocumentReadError extends PressError {
  constructor(message: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, sourcePath, options);
    this.name = "DocumentReadError";
  }
}

/** The template engine rejected the template or the variables */
export class TemplateRenderError extends PressError {
  /** Name of the template that failed */
  readonly template: string;

  constructor(message: string, template: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, sourcePath, options);
    this.name = "TemplateRenderError";
    this.template = template;
  }
}

/** A part could not be added to the eBook, or the eBook could not be written */
export class PackagingError extends PressError {
  constructor(message: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, sourcePath, options);
    this.name = "PackagingError";
  }
}

/**
 * A path falls outside its root, or an output root would wipe the sources.
 */
export class PathError extends PressError {
  constructor(message: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, sourcePath, options);
    this.name = "PathError";
  }
}

/** Writing or copying into the output directory failed */
export class OutputWriteError extends PressError {
  constructor(message: string, sourcePath: string | null = null, options?: { cause?: unknown }) {
    super(message, sourcePath, options);
    this.name = "OutputWriteError";
  }
}

/**
 * Format any thrown value for the console.
 *
 * @example
 * describeError(new PathError("document is not inside src", "other/a.md"))
 * // 'PathError in other/a.md: document is not inside src'
 */
export function describeError(error: unknown): string {
  if (error instanceof PressError) {
    return error.sourcePath ? `${error.name} in ${error.sourcePath}: ${error.message}` : `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
