/**
 * @fileoverview Dataset snapshot - one fetched page of a table
 * @module data/DatasetSnapshot
 *
 * Owns the ordered row records of a single table page. Fetch is
 * all-or-nothing: the new page is fully built before it replaces the old one.
 */

import { BehaviorSubject, Subject } from 'rxjs';
import type { FetchedPage, PageRequest, RowKey, RowValues, TableRef } from '../types';
import type { IDataSource } from '../services/interfaces';
import { DEFAULT_KEY_COLUMN, DEFAULT_PAGE_SIZE, LOCAL_KEY_PREFIX } from '../core/Constants';
import { FetchError, extractErrorMessage } from '../core/errors';
import { RowRecord, type RowChangeEvent, type DeleteOutcome } from './RowRecord';

/**
 * Dataset snapshot options
 */
export interface DatasetSnapshotOptions {
  table: TableRef;
  dataSource: IDataSource;
  keyColumn?: string;
  pageSize?: number;
  /** Render hint only */
  hasRowComments?: boolean;
}

export class DatasetSnapshot {
  readonly table: TableRef;
  readonly keyColumn: string;
  readonly hasRowComments: boolean;

  /** Current rows in display order; emits after every structural or cell change */
  public readonly rows$: BehaviorSubject<readonly RowRecord[]>;

  /** Row-level change notifications */
  public readonly changes$ = new Subject<RowChangeEvent>();

  private readonly dataSource: IDataSource;
  private records: RowRecord[] = [];
  private _pageOffset: number = 0;
  private _pageSize: number;
  private _totalCount: number = 0;
  private _isLoaded: boolean = false;
  private localKeyCounter: number = 0;

  constructor(options: DatasetSnapshotOptions) {
    this.table = { ...options.table };
    this.dataSource = options.dataSource;
    this.keyColumn = options.keyColumn ?? DEFAULT_KEY_COLUMN;
    this.hasRowComments = options.hasRowComments ?? false;
    this._pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.rows$ = new BehaviorSubject<readonly RowRecord[]>([]);
  }

  // =========================================================================
  // READ OPERATIONS
  // =========================================================================

  /**
   * Rows in fetch order followed by local creates. Soft-deleted rows are
   * included (flagged) so the renderer can strike them through.
   */
  rows(): readonly RowRecord[] {
    return [...this.records];
  }

  /**
   * Rows not marked for deletion
   */
  activeRows(): RowRecord[] {
    return this.records.filter(r => !r.isDeleted);
  }

  getByKey(key: RowKey): RowRecord | undefined {
    return this.records.find(r => r.key === key);
  }

  has(record: RowRecord): boolean {
    return this.records.includes(record);
  }

  get size(): number {
    return this.records.length;
  }

  get pageOffset(): number {
    return this._pageOffset;
  }

  get pageSize(): number {
    return this._pageSize;
  }

  get totalCount(): number {
    return this._totalCount;
  }

  get isLoaded(): boolean {
    return this._isLoaded;
  }

  hasNextPage(): boolean {
    return this._pageOffset + this._pageSize < this._totalCount;
  }

  hasPreviousPage(): boolean {
    return this._pageOffset > 0;
  }

  // =========================================================================
  // FETCH
  // =========================================================================

  /**
   * Replace the rows with a page from the data source.
   * Omitted page fields keep the current window.
   * @throws FetchError - previous rows are kept
   */
  async fetch(page: Partial<PageRequest> = {}): Promise<void> {
    const request: PageRequest = {
      offset: page.offset ?? this._pageOffset,
      limit: page.limit ?? this._pageSize,
    };

    if (!Number.isInteger(request.offset) || request.offset < 0) {
      throw new FetchError(0, `Invalid page offset: ${request.offset}`);
    }
    if (!Number.isInteger(request.limit) || request.limit <= 0) {
      throw new FetchError(0, `Invalid page size: ${request.limit}`);
    }

    let fetched: FetchedPage;
    try {
      fetched = await this.dataSource.fetchPage(this.table, request);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(0, extractErrorMessage(error));
    }

    const records = this._buildRecords(fetched.rows);

    for (const old of this.records) {
      old.detach();
    }
    this.records = records;
    this._pageOffset = request.offset;
    this._pageSize = request.limit;
    this._totalCount = Math.max(fetched.totalCount, request.offset + records.length);
    this._isLoaded = true;

    console.log(
      `[DatasetSnapshot] ${this.table.schema}.${this.table.table}: ` +
      `${records.length} rows at offset ${request.offset} (${this._totalCount} total, ${this.dataSource.kind})`
    );
    this._notify();
  }

  async nextPage(): Promise<void> {
    await this.fetch({ offset: this._pageOffset + this._pageSize });
  }

  async previousPage(): Promise<void> {
    await this.fetch({ offset: Math.max(0, this._pageOffset - this._pageSize) });
  }

  // =========================================================================
  // WRITE OPERATIONS
  // =========================================================================

  /**
   * Append a new, unsaved row
   * @param initial - Optional starting values
   */
  addRow(initial: RowValues = {}): RowRecord {
    this.localKeyCounter += 1;
    const record = new RowRecord({
      key: `${LOCAL_KEY_PREFIX}${this.localKeyCounter}`,
      values: initial,
      isNew: true,
      keyColumn: this.keyColumn,
      onChange: event => this._handleRowChange(event),
    });
    this.records.push(record);
    this.changes$.next({ type: 'created', record });
    this._notify();
    return record;
  }

  /**
   * Delete a row through the snapshot; same as record.markDeleted()
   */
  deleteRow(record: RowRecord): DeleteOutcome {
    if (!this.has(record)) {
      return 'ignored';
    }
    return record.markDeleted();
  }

  /**
   * Drop records from the sequence (confirmed deletes, cancelled creates)
   * @internal Used by ChangeTracker
   */
  removeRecords(toRemove: ReadonlySet<RowRecord>): void {
    if (toRemove.size === 0) return;
    let removedPersisted = 0;
    for (const record of toRemove) {
      if (!record.isNew && this.has(record)) removedPersisted += 1;
      record.detach();
    }
    this.records = this.records.filter(r => !toRemove.has(r));
    this._totalCount = Math.max(0, this._totalCount - removedPersisted);
    this._notify();
  }

  /**
   * Count rows the backend has just created
   * @internal Used by ChangeTracker
   */
  addToTotalCount(created: number): void {
    this._totalCount += created;
  }

  /**
   * Tell subscribers the rows changed (e.g. after reconcile)
   */
  notifyChanged(): void {
    this._notify();
  }

  /**
   * Stop all notifications
   */
  dispose(): void {
    for (const record of this.records) {
      record.detach();
    }
    this.rows$.complete();
    this.changes$.complete();
  }

  // =========================================================================
  // INTERNALS
  // =========================================================================

  private _buildRecords(rows: RowValues[]): RowRecord[] {
    const seen = new Set<RowKey>();
    return rows.map((values, index) => {
      const key = values[this.keyColumn];
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new FetchError(0, `Row ${index} has no usable "${this.keyColumn}" value`);
      }
      if (seen.has(key)) {
        throw new FetchError(0, `Duplicate row key ${String(key)} in fetched page`);
      }
      seen.add(key);
      return new RowRecord({
        key,
        values,
        isNew: false,
        keyColumn: this.keyColumn,
        onChange: event => this._handleRowChange(event),
      });
    });
  }

  private _handleRowChange(event: RowChangeEvent): void {
    if (event.type === 'discarded') {
      // Cancelled create: forget it entirely
      event.record.detach();
      this.records = this.records.filter(r => r !== event.record);
    }
    this.changes$.next(event);
    this._notify();
  }

  private _notify(): void {
    this.rows$.next(this.rows());
  }
}
