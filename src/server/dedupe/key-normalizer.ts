/**
 * Key Normalizer
 *
 * Turns raw cell values into comparison keys.
 * Order matters: strip, then drop internal whitespace, then lower-case.
 */

import type { CellValue } from '../tables';

export interface NormalizationOptions {
  ignoreCase: boolean;
  ignoreWhitespace: boolean;
}

export const STRICT_NORMALIZATION: NormalizationOptions = {
  ignoreCase: false,
  ignoreWhitespace: false
};

export function normalizeKeyValue(value: CellValue, options: NormalizationOptions): string {
  let key = value === null ? '' : String(value);

  key = key.trim();
  if (options.ignoreWhitespace) {
    key = key.replace(/\s+/g, '');
  }
  if (options.ignoreCase) {
    key = key.toLowerCase();
  }

  return key;
}

export function normalizeKeyValues(
  values: readonly CellValue[],
  options: NormalizationOptions
): string[] {
  return values.map(value => normalizeKeyValue(value, options));
}
