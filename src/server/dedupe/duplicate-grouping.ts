/**
 * Duplicate Grouping Engine
 *
 * Groups rows by a precomputed comparison key and annotates every row with
 * its group id, group size, first-seen position and a keep-policy flag.
 */

import { numberColumn, Table, textColumn } from '../tables';
import { ProcessingError } from '../utils/processing-error';

export const KEEP_POLICIES = ['mark_all', 'keep_first', 'keep_last'] as const;
export type KeepPolicy = typeof KEEP_POLICIES[number];

export type DuplicateFlag = 'Unique' | 'Duplicate' | 'Kept';

export const DUPLICATE_COLUMNS = [
  'DuplicateKey',
  'DuplicateGroupID',
  'DuplicateCount',
  'DuplicateFirstSeenRow',
  'DuplicateFlag'
] as const;

export interface GroupingOptions {
  /** Human-readable key per row; defaults to the group key. */
  displayKeys?: readonly string[];
  keepPolicy: KeepPolicy;
  /** Blank keys never cluster: each blank row is its own group. */
  treatBlankAsUnique: boolean;
}

export interface RowAnnotation {
  displayKey: string;
  groupId: string;
  groupSize: number;
  firstSeenRow: number;
  flag: DuplicateFlag;
}

export function isKeepPolicy(value: string): value is KeepPolicy {
  return KEEP_POLICIES.some(policy => policy === value);
}

export function formatGroupId(sequence: number): string {
  return `G${String(sequence).padStart(6, '0')}`;
}

/**
 * Compute one annotation per group key, in row order.
 */
export function annotateRows(groupKeys: readonly string[], options: GroupingOptions): RowAnnotation[] {
  if (!isKeepPolicy(options.keepPolicy)) {
    throw ProcessingError.invalidConfiguration(`Invalid keep_policy '${options.keepPolicy}'.`, {
      allowed_values: [...KEEP_POLICIES]
    });
  }

  const displayKeys = options.displayKeys ?? groupKeys;
  if (displayKeys.length !== groupKeys.length) {
    throw ProcessingError.invalidConfiguration('Display keys do not line up with the table rows.', {
      row_count: groupKeys.length,
      display_key_count: displayKeys.length
    });
  }

  const groups = buildGroups(groupKeys, options.treatBlankAsUnique);
  const annotations = new Array<RowAnnotation>(groupKeys.length);
  let nextGroupId = 1;

  // Groups come out ordered by their first member, so ids follow first appearance
  for (const members of groups) {
    const isDuplicate = members.length > 1;
    const groupId = isDuplicate ? formatGroupId(nextGroupId++) : '';
    const firstSeenRow = members[0] + 1;
    const keptRow = keptMember(members, options.keepPolicy);

    for (const rowIdx of members) {
      annotations[rowIdx] = {
        displayKey: displayKeys[rowIdx] ?? '',
        groupId,
        groupSize: members.length,
        firstSeenRow,
        flag: !isDuplicate ? 'Unique' : rowIdx === keptRow ? 'Kept' : 'Duplicate'
      };
    }
  }

  return annotations;
}

/**
 * Append the five duplicate annotation columns to a table.
 * Existing columns with the same names are replaced.
 */
export function auditDuplicateGroups(
  table: Table,
  groupKeys: readonly string[],
  options: GroupingOptions
): Table {
  if (groupKeys.length !== table.rowCount) {
    throw ProcessingError.invalidConfiguration('Group keys do not line up with the table rows.', {
      row_count: table.rowCount,
      key_count: groupKeys.length
    });
  }

  const annotations = annotateRows(groupKeys, options);
  const reserved = new Set<string>(DUPLICATE_COLUMNS);

  return {
    rowCount: table.rowCount,
    columns: [
      ...table.columns.filter(c => !reserved.has(c.name)),
      textColumn('DuplicateKey', annotations.map(a => a.displayKey)),
      textColumn('DuplicateGroupID', annotations.map(a => a.groupId)),
      numberColumn('DuplicateCount', annotations.map(a => a.groupSize)),
      numberColumn('DuplicateFirstSeenRow', annotations.map(a => a.firstSeenRow)),
      textColumn('DuplicateFlag', annotations.map(a => a.flag))
    ]
  };
}

/**
 * Two-phase grouping: blank rows (when treated as unique) become singletons,
 * every other row joins the group of its key. Returned in order of first member.
 */
function buildGroups(groupKeys: readonly string[], treatBlankAsUnique: boolean): number[][] {
  const groups: number[][] = [];
  const byKey = new Map<string, number[]>();

  groupKeys.forEach((key, rowIdx) => {
    if (treatBlankAsUnique && key === '') {
      groups.push([rowIdx]);
      return;
    }

    let members = byKey.get(key);
    if (!members) {
      members = [];
      byKey.set(key, members);
      groups.push(members);
    }
    members.push(rowIdx);
  });

  return groups;
}

function keptMember(members: readonly number[], keepPolicy: KeepPolicy): number | null {
  switch (keepPolicy) {
    case 'mark_all':
      return null;
    case 'keep_first':
      return members[0];
    case 'keep_last':
      return members[members.length - 1];
  }
}
