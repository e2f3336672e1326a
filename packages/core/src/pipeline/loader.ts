import { z } from 'zod';
import { readFileSync } from 'node:fs';
import type { PipelineDocument } from '../types/pipeline.js';
import { FileAccessError, MissingFieldError, PipelineParseError } from '../errors.js';
import { toQueryValue } from './expression.js';

// ─────────────────────────────────────────────────────────────────────────────
// Query fields
// ─────────────────────────────────────────────────────────────────────────────

/** Source types whose query is rendered, and the field that holds it. */
export const QUERY_FIELD_BY_SOURCE_TYPE: Readonly<Record<string, string>> = {
  SqlServerSource: 'sqlReaderQuery',
  OracleSource: 'oracleReaderQuery',
};

export function queryFieldFor(sourceType: string): string | undefined {
  return Object.hasOwn(QUERY_FIELD_BY_SOURCE_TYPE, sourceType)
    ? QUERY_FIELD_BY_SOURCE_TYPE[sourceType]
    : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Zod Schemas
// ─────────────────────────────────────────────────────────────────────────────

// Exported pipelines carry many more keys than are rendered; unknown keys are
// accepted and stripped.

const RawQueryValueSchema = z.union([z.string(), z.record(z.unknown())]);

const SourceSchema = z
  .object({ type: z.string() })
  .passthrough()
  .transform((source, ctx) => {
    const field = queryFieldFor(source.type);
    if (field === undefined) {
      return { type: source.type };
    }
    const parsed = RawQueryValueSchema.safeParse(source[field]);
    if (!parsed.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [field],
        message: `Required query field for ${source.type}`,
      });
      return z.NEVER;
    }
    return { type: source.type, query: toQueryValue(parsed.data) };
  });

const DependencySchema = z.object({
  activity: z.string(),
  dependencyConditions: z.tuple([z.string()]).rest(z.string()),
});

const ActivitySchema = z.object({
  name: z.string(),
  type: z.string(),
  description: z.string().optional(),
  typeProperties: z.object({
    source: SourceSchema.optional(),
  }).optional(),
  dependsOn: z.array(DependencySchema),
});

const PipelineDocumentSchema = z.object({
  name: z.string(),
  properties: z.object({
    description: z.string().optional(),
    activities: z.array(ActivitySchema),
  }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed pipeline object.
 * @param origin File path (or other label) reported in errors
 * @throws {MissingFieldError} Listing every missing or malformed field
 */
export function validatePipelineDocument(data: unknown, origin: string): PipelineDocument {
  const result = PipelineDocumentSchema.safeParse(data);
  if (!result.success) {
    const fields = result.error.issues.map(issue =>
      issue.path.length > 0 ? issue.path.join('.') : '(root)'
    );
    throw new MissingFieldError(origin, fields, result.error);
  }
  return result.data;
}

/**
 * Parse pipeline JSON text.
 * @throws {PipelineParseError} If the text is not well-formed JSON
 * @throws {MissingFieldError} If required fields are absent
 */
export function parsePipelineDocument(json: string, origin: string): PipelineDocument {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new PipelineParseError(origin, error);
  }
  return validatePipelineDocument(data, origin);
}

/**
 * Read and parse an exported pipeline file.
 * @throws {FileAccessError} If the file cannot be read
 */
export function loadPipelineDocument(filePath: string): PipelineDocument {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new FileAccessError(filePath, error);
  }
  return parsePipelineDocument(content, filePath);
}
