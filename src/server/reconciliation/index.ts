/**
 * Reconciliation Index
 */

export { reconcileTables, summaryToTable, SUFFIX_A, SUFFIX_B } from './reconciler';
export type { ReconciliationResult, ReconciliationSummary } from './reconciler';
