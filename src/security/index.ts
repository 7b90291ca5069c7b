/**
 * Input safety for files and identifiers handed to the CLI
 *
 * Non-negotiables:
 * - Never open paths containing traversal sequences or null bytes
 * - Always bound the size of JSON before parsing it
 * - Always validate parsed JSON against a schema before use
 */

import type { ZodType, ZodTypeDef } from 'zod';

/** Default upper bound for JSON input files. */
export const MAX_JSON_BYTES = 10 * 1024 * 1024;

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Validates a file path to prevent directory traversal.  Absolute paths
 * are accepted (export files usually live outside the working tree);
 * parent-directory segments are not.
 */
export function validateSafePath(inputPath: string): { valid: true; sanitized: string } | { valid: false; error: string } {
  if (inputPath.trim() === '') {
    return { valid: false, error: 'Path is empty' };
  }

  if (inputPath.includes('\0')) {
    return { valid: false, error: 'Path contains null bytes' };
  }

  const segments = inputPath.replace(/\\/g, '/').split('/');
  if (segments.includes('..')) {
    return { valid: false, error: 'Path traversal detected' };
  }

  return { valid: true, sanitized: inputPath };
}

export type JsonParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Parse JSON with a size limit, then validate it against `schema`.
 */
export function safeJsonParse<T>(
  input: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: { maxSize?: number } = {},
): JsonParseResult<T> {
  const { maxSize = MAX_JSON_BYTES } = options;

  if (Buffer.byteLength(input, 'utf-8') > maxSize) {
    return { success: false, error: `Input exceeds maximum size of ${maxSize} bytes` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(input);
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Invalid JSON';
    return { success: false, error: `JSON parse error: ${message}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    return { success: false, error: `Schema validation failed: ${where}${first?.message ?? 'invalid input'}` };
  }
  return { success: true, data: parsed.data };
}

/**
 * Subscription and tenant IDs are GUIDs.
 */
export function validateAzureId(id: string, label = 'subscription ID'): { valid: boolean; error?: string } {
  if (!GUID_PATTERN.test(id)) {
    return { valid: false, error: `Invalid ${label} format (expected a GUID)` };
  }
  return { valid: true };
}
