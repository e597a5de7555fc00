/**
 * JSON Utilities
 *
 * Parsing of JSON files the navigator keeps on disk, validated against a
 * Zod schema, with a fallback for missing or corrupted data.
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Why a stored JSON value was rejected.
 */
export interface JsonParseFailure {
  /** `syntax` for malformed JSON, `shape` for JSON the schema rejects */
  kind: 'syntax' | 'shape';
  message: string;
}

/**
 * Parse `json` and validate it with `schema`, returning `fallback` on
 * any failure. Absent input is not a failure.
 *
 * @example
 * ```typescript
 * const entries = parseStoredJson(raw, ManifestSchema, {}, (failure) => {
 *   logger.warn(`Ignoring corrupt manifest: ${failure.message}`);
 * });
 * ```
 */
export function parseStoredJson<T>(
  json: string | null | undefined,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: T,
  onError?: (failure: JsonParseFailure, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    onError?.({ kind: 'syntax', message }, json);
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    onError?.({ kind: 'shape', message }, json);
    return fallback;
  }
  return result.data;
}
