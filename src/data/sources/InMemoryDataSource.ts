/**
 * @fileoverview In-memory data source
 * @module data/sources/InMemoryDataSource
 * 
 * Keeps tables in process. Used for local sandboxes and as the backend
 * stand-in in tests. Behaves like the REST backend: numeric keys are issued
 * to creates, key columns are immutable, unknown rows are refused per row.
 */

import type {
  FetchedPage,
  PageRequest,
  PersistedRowKey,
  RowOutcome,
  RowValues,
  SaveResponse,
  SubmitPayload,
  TableRef,
} from '../../types';
import type { IDataSource } from '../../services/interfaces';
import { DEFAULT_KEY_COLUMN } from '../../core/Constants';
import { FetchError, SubmitError } from '../../core/errors';
import { qualifiedName } from '../../core/UncheckedTableNaming';
import { cloneValue, deepEqual } from '../../utils/deepEqual';

const ROLLED_BACK = 'Not applied: another row in the change-set was rejected';

/**
 * In-memory data source options
 */
export interface InMemoryDataSourceOptions {
  keyColumn?: string;
  /** When set, saves carrying another token are refused with 403 */
  requiredToken?: string;
}

export class InMemoryDataSource implements IDataSource {
  readonly kind = 'memory';
  private readonly keyColumn: string;
  private readonly requiredToken: string | null;
  private readonly tables = new Map<string, RowValues[]>();

  constructor(options: InMemoryDataSourceOptions = {}) {
    this.keyColumn = options.keyColumn ?? DEFAULT_KEY_COLUMN;
    this.requiredToken = options.requiredToken ?? null;
  }

  // =========================================================================
  // TABLE SETUP
  // =========================================================================

  /**
   * Create (or replace) a table with the given rows
   */
  seed(table: TableRef, rows: RowValues[]): void {
    this.tables.set(qualifiedName(table), rows.map(row => cloneValue(row)));
  }

  /**
   * Copy of a table's rows, in storage order
   */
  getRows(table: TableRef): RowValues[] {
    return (this.tables.get(qualifiedName(table)) ?? []).map(row => cloneValue(row));
  }

  // =========================================================================
  // IDataSource
  // =========================================================================

  async fetchPage(table: TableRef, page: PageRequest): Promise<FetchedPage> {
    const rows = this.tables.get(qualifiedName(table));
    if (!rows) {
      throw new FetchError(404, `Table ${qualifiedName(table)} does not exist`);
    }
    return {
      rows: rows.slice(page.offset, page.offset + page.limit).map(row => cloneValue(row)),
      totalCount: rows.length,
    };
  }

  async save(table: TableRef, payload: SubmitPayload, token: string | null): Promise<SaveResponse> {
    if (this.requiredToken !== null && token !== this.requiredToken) {
      throw new SubmitError(403, 'Invalid authenticity token');
    }
    const rows = this.tables.get(qualifiedName(table));
    if (!rows) {
      throw new SubmitError(404, `Table ${qualifiedName(table)} does not exist`);
    }

    // Validate everything first: the change-set applies as a whole or not at all
    const updates = payload.updates.map(({ key, changedFields }) => this.checkUpdate(rows, key, changedFields));
    const deletes = payload.deletes.map(key => this.checkDelete(rows, key));
    const rejected = [...updates, ...deletes].some(outcome => !outcome.success);

    if (rejected) {
      const rollBack = (outcome: RowOutcome): RowOutcome =>
        outcome.success ? { key: outcome.key, success: false, message: ROLLED_BACK } : outcome;
      return {
        creates: payload.creates.map(() => ({ success: false, message: ROLLED_BACK })),
        updates: updates.map(rollBack),
        deletes: deletes.map(rollBack),
      };
    }

    const response: SaveResponse = { creates: [], updates, deletes };
    for (const values of payload.creates) {
      const key = this.nextKey(rows);
      rows.push({ ...cloneValue(values), [this.keyColumn]: key });
      response.creates.push({ key, success: true });
    }
    for (const { key, changedFields } of payload.updates) {
      const row = rows.find(r => r[this.keyColumn] === key);
      if (row) Object.assign(row, cloneValue(changedFields));
    }
    const deleted = new Set<PersistedRowKey>(payload.deletes);
    this.tables.set(
      qualifiedName(table),
      rows.filter(row => {
        const key = this.keyOf(row);
        return key === null || !deleted.has(key);
      })
    );

    return response;
  }

  // =========================================================================
  // INTERNALS
  // =========================================================================

  private checkUpdate(rows: RowValues[], key: PersistedRowKey, changedFields: RowValues): RowOutcome {
    const row = rows.find(r => r[this.keyColumn] === key);
    if (!row) {
      return { key, success: false, message: `Row ${String(key)} not found` };
    }
    if (this.keyColumn in changedFields && !deepEqual(changedFields[this.keyColumn], row[this.keyColumn])) {
      return { key, success: false, message: 'Primary keys must remain unchanged' };
    }
    return { key, success: true };
  }

  private checkDelete(rows: RowValues[], key: PersistedRowKey): RowOutcome {
    if (!rows.some(r => r[this.keyColumn] === key)) {
      return { key, success: false, message: `Row ${String(key)} not found` };
    }
    return { key, success: true };
  }

  private keyOf(row: RowValues): PersistedRowKey | null {
    const value = row[this.keyColumn];
    return typeof value === 'string' || typeof value === 'number' ? value : null;
  }

  private nextKey(rows: RowValues[]): number {
    let max = 0;
    for (const row of rows) {
      const value = row[this.keyColumn];
      if (typeof value === 'number' && value > max) {
        max = value;
      }
    }
    return max + 1;
  }
}
