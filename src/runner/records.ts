/**
 * Row-by-row parsing of collaborator batches.
 *
 * A malformed row is logged and dropped; the rest of the batch is kept.
 * A payload that is not an array at all is a ValidationError.
 */

import type { z } from 'zod';
import { ValidationError, formatZodIssues } from './errors.js';
import type { StructuredLogger } from './logger.js';

export interface ParseRecordsOptions {
  /** Names the batch in log lines and errors, e.g. "cost records". */
  label: string;
  logger: StructuredLogger;
}

export function parseRecords<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rows: unknown,
  options: ParseRecordsOptions,
): T[] {
  if (!Array.isArray(rows)) {
    throw new ValidationError(`${options.label}: expected an array`, ['(root): expected an array']);
  }

  const records: T[] = [];
  rows.forEach((row: unknown, index) => {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }
    options.logger.warn('records.skipped', `Skipping malformed row ${index} in ${options.label}`, {
      index,
      issues: formatZodIssues(parsed.error),
    });
  });

  if (records.length < rows.length) {
    options.logger.info('records.parsed', `Kept ${records.length} of ${rows.length} ${options.label}`);
  }
  return records;
}
