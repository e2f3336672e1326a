/**
 * Data Factory expression values.
 *
 * A query field holds either a plain string or an expression object such as
 * `{ "value": "@concat('SELECT ', ...)", "type": "Expression" }`. Values are
 * classified once, when the document is loaded, and rendered from the
 * resulting {@link QueryValue}.
 */

import type { QueryValue } from '../types/pipeline.js';

export const EXPRESSION_TYPE = 'Expression';

export type RawQueryValue = string | Record<string, unknown>;

/**
 * True for objects tagged `"type": "Expression"` (exact, case-sensitive).
 * Objects without a `type` key are never expressions.
 */
export function isExpression(input: RawQueryValue): input is { type: typeof EXPRESSION_TYPE; value: unknown } {
  if (typeof input === 'string' || !('type' in input)) {
    return false;
  }
  return input.type === EXPRESSION_TYPE;
}

export function toQueryValue(input: RawQueryValue): QueryValue {
  if (typeof input === 'string') {
    return { kind: 'literal', text: input };
  }
  if (isExpression(input) && typeof input.value === 'string') {
    return { kind: 'expression', text: input.value };
  }
  return { kind: 'opaque', raw: input };
}

/** Text to place inside the query block. */
export function resolveQueryValue(value: QueryValue): string {
  switch (value.kind) {
    case 'literal':
    case 'expression':
      return value.text;
    case 'opaque':
      return JSON.stringify(value.raw);
  }
}

/**
 * Unwrap a raw value: strings come back unchanged, expressions yield their
 * `value`, any other object is returned as-is.
 */
export function resolveValue(input: RawQueryValue): RawQueryValue {
  const value = toQueryValue(input);
  return value.kind === 'opaque' ? value.raw : value.text;
}
