import type { CorrectionEntry } from '@refinaria/model';

import { z } from 'zod';

import { CorrectionTableError } from '../errors/correction-table-error';

import correctionData from './data/corrections.json';

export const correctionEntrySchema = z.object({
  pattern: z.string().trim().min(1, 'pattern must not be empty'),
  replacement: z.string().trim().min(1, 'replacement must not be empty'),
  kind: z.enum(['exact', 'phonetic-pattern']).default('exact'),
});

export const correctionTableSchema = z.object({
  version: z.literal(1),
  entries: z.array(correctionEntrySchema),
});

/**
 * Validates the shape of a correction table (JSON contents).
 *
 * @throws CorrectionTableError listing every schema issue
 */
export function parseCorrectionTable(data: unknown): CorrectionEntry[] {
  const result = correctionTableSchema.safeParse(data);

  if (!result.success) {
    throw new CorrectionTableError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }

  return result.data.entries;
}

/**
 * The Brazilian-Portuguese philosophy table shipped with the package
 */
export function loadBuiltinCorrectionTable(): CorrectionEntry[] {
  return parseCorrectionTable(correctionData);
}
