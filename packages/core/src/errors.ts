/**
 * Errors raised while rendering a pipeline.
 *
 * Nothing is recovered locally: each of these aborts the render and reaches
 * the caller with the underlying error kept as `cause`.
 */

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PipelineDocsError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input file unreadable or output file unwritable. */
export class FileAccessError extends PipelineDocsError {
  constructor(filePath: string, cause: unknown) {
    super(`Failed to access "${filePath}": ${describe(cause)}`, filePath, { cause });
  }
}

/** Input is not well-formed JSON. */
export class PipelineParseError extends PipelineDocsError {
  constructor(filePath: string, cause: unknown) {
    super(`Failed to parse JSON in "${filePath}": ${describe(cause)}`, filePath, { cause });
  }
}

/** A required key is absent (or not of the expected shape). */
export class MissingFieldError extends PipelineDocsError {
  constructor(
    filePath: string,
    readonly fields: string[],
    cause?: unknown,
  ) {
    super(
      `Pipeline "${filePath}" is missing required fields:\n${fields.map(f => `  - ${f}`).join('\n')}`,
      filePath,
      { cause },
    );
  }
}

/** Command line or environment did not provide what the CLI needs. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
