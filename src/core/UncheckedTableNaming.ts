/**
 * @fileoverview Unchecked twin naming
 * @module core/UncheckedTableNaming
 * 
 * Maps a published table to its pending-review twin. The naming rule is a
 * contract with the backend and is configured, not derived at call sites:
 * the coordinator resolves it exactly once when it builds the views.
 */

import type { TableRef } from '../types';

/**
 * Naming rule for unchecked twins
 */
export interface UncheckedNamingConfig {
  /** Prepended to the schema name (backend meta schema) */
  schemaPrefix: string;
  /** Prepended to the table name */
  tablePrefix: string;
  /** Appended to the table name */
  tableSuffix: string;
  /** Explicit twins keyed by `schema.table`; take precedence over the rule */
  overrides: Readonly<Record<string, TableRef>>;
}

/**
 * Default rule: `model_draft.wind` → `_model_draft._wind_insert`
 */
export const DEFAULT_UNCHECKED_NAMING: Readonly<UncheckedNamingConfig> = Object.freeze({
  schemaPrefix: '_',
  tablePrefix: '_',
  tableSuffix: '_insert',
  overrides: Object.freeze({}),
});

/**
 * `schema.table` lookup key
 */
export function qualifiedName(ref: TableRef): string {
  return `${ref.schema}.${ref.table}`;
}

/**
 * Resolve the unchecked twin of a published table
 */
export function resolveUncheckedTable(
  main: TableRef,
  naming: UncheckedNamingConfig = DEFAULT_UNCHECKED_NAMING
): TableRef {
  const override = naming.overrides[qualifiedName(main)];
  if (override) {
    return { schema: override.schema, table: override.table };
  }

  return {
    schema: `${naming.schemaPrefix}${main.schema}`,
    table: `${naming.tablePrefix}${main.table}${naming.tableSuffix}`,
  };
}
