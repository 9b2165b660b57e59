/**
 * Dedupe Index
 */

export { normalizeKeyValue, normalizeKeyValues, STRICT_NORMALIZATION } from './key-normalizer';
export type { NormalizationOptions } from './key-normalizer';
export { composeRowKeys } from './row-key-composer';
export {
  annotateRows,
  auditDuplicateGroups,
  formatGroupId,
  isKeepPolicy,
  KEEP_POLICIES,
  DUPLICATE_COLUMNS
} from './duplicate-grouping';
export type { KeepPolicy, DuplicateFlag, GroupingOptions, RowAnnotation } from './duplicate-grouping';
export { dedupeTable, DEDUPE_MODES } from './dedupe-service';
export type { DedupeMode, DedupeRequest } from './dedupe-service';
