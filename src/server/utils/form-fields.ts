/**
 * Form Field Parsing
 *
 * Reads multipart text fields into typed request options.
 */

import { ProcessingError } from './processing-error';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Trimmed text of a form field; undefined when absent or blank.
 */
export function readTextField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;

  const raw: unknown = Reflect.get(body, field);
  const value: unknown = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') return undefined;

  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function readBooleanField(body: unknown, field: string, defaultValue: boolean): boolean {
  const value = readTextField(body, field);
  if (value === undefined) return defaultValue;

  const lowered = value.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;

  throw ProcessingError.invalidConfiguration(`Invalid boolean for ${field}: '${value}'.`, {
    field,
    allowed_values: [...TRUE_VALUES, ...FALSE_VALUES]
  });
}

/**
 * Lower-cased choice from a fixed set; the default applies when the field is blank.
 */
export function readChoiceField<T extends string>(
  body: unknown,
  field: string,
  choices: readonly T[],
  defaultValue?: T
): T {
  const value = readTextField(body, field);

  if (value === undefined) {
    if (defaultValue !== undefined) return defaultValue;
    throw ProcessingError.invalidConfiguration(`${field} is required.`, {
      field,
      allowed_values: [...choices]
    });
  }

  const lowered = value.toLowerCase();
  const choice = choices.find(c => c === lowered);
  if (choice === undefined) {
    throw ProcessingError.invalidConfiguration(`Invalid ${field} '${value}'.`, {
      field,
      allowed_values: [...choices]
    });
  }
  return choice;
}

/**
 * Comma-separated names, trimmed, blanks dropped.
 */
export function readListField(body: unknown, field: string): string[] {
  const value = readTextField(body, field);
  if (value === undefined) return [];
  return value.split(',').map(item => item.trim()).filter(item => item !== '');
}
