/**
 * @fileoverview Row record - one observable table row
 * @module data/RowRecord
 *
 * Holds the values a row was fetched with next to the values the user has
 * typed since. The original values are only replaced by reconcile, never by
 * an edit, so the diff can always be recomputed from the two maps.
 */

import type { Callback, CellValue, RowKey, RowValues, PersistedRowKey } from '../types';
import { cloneValue, deepEqual } from '../utils/deepEqual';

/**
 * What happened to a row
 */
export type RowChangeType = 'created' | 'field' | 'deleted' | 'discarded' | 'restored' | 'reverted' | 'committed';

/**
 * Row change notification
 */
export interface RowChangeEvent {
  type: RowChangeType;
  record: RowRecord;
  /** Column name, for 'field' changes */
  field?: string;
}

/**
 * Result of markDeleted()
 * - deleted: soft-deleted, kept until the backend confirms
 * - discarded: an unsaved create was cancelled; the owner must drop it
 * - ignored: the row was already deleted or discarded
 */
export type DeleteOutcome = 'deleted' | 'discarded' | 'ignored';

/**
 * Row record options
 */
export interface RowRecordOptions {
  key: RowKey;
  /** Values as fetched; empty for new rows */
  values?: RowValues;
  isNew?: boolean;
  /** Column whose value is the row key; immutable on persisted rows */
  keyColumn?: string;
  onChange?: Callback<RowChangeEvent>;
}

export class RowRecord {
  private _key: RowKey;
  private originalValues: RowValues;
  private currentValues: RowValues;
  private _isNew: boolean;
  private _isDeleted: boolean = false;
  private _isDiscarded: boolean = false;
  private _isInFlight: boolean = false;
  private readonly keyColumn: string | null;
  private onChange: Callback<RowChangeEvent> | null;

  constructor(options: RowRecordOptions) {
    this._key = options.key;
    this._isNew = options.isNew ?? false;
    this.keyColumn = options.keyColumn ?? null;
    this.onChange = options.onChange ?? null;

    const values = options.values ?? {};
    this.originalValues = this._isNew ? {} : cloneValue(values);
    this.currentValues = cloneValue(values);
  }

  // =========================================================================
  // READ OPERATIONS
  // =========================================================================

  get key(): RowKey {
    return this._key;
  }

  get isNew(): boolean {
    return this._isNew;
  }

  get isDeleted(): boolean {
    return this._isDeleted;
  }

  /**
   * True once an unsaved create has been cancelled
   */
  get isDiscarded(): boolean {
    return this._isDiscarded;
  }

  /**
   * True while the row is part of a submission awaiting its result
   */
  get isInFlight(): boolean {
    return this._isInFlight;
  }

  getField(name: string): CellValue | undefined {
    return this.currentValues[name];
  }

  /**
   * Copy of the current values
   */
  getValues(): RowValues {
    return cloneValue(this.currentValues);
  }

  /**
   * Copy of the values as last confirmed by the backend
   */
  getOriginalValues(): RowValues {
    return cloneValue(this.originalValues);
  }

  /**
   * Fields whose current value differs from the original.
   * Computed on every call.
   */
  diffFromOriginal(): RowValues {
    const changed: RowValues = {};
    for (const [name, value] of Object.entries(this.currentValues)) {
      if (!deepEqual(value, this.originalValues[name])) {
        changed[name] = cloneValue(value);
      }
    }
    return changed;
  }

  isFieldChanged(name: string): boolean {
    return name in this.currentValues && !deepEqual(this.currentValues[name], this.originalValues[name]);
  }

  hasChanges(): boolean {
    return Object.keys(this.diffFromOriginal()).length > 0;
  }

  // =========================================================================
  // WRITE OPERATIONS (called by the grid renderer)
  // =========================================================================

  /**
   * Set a cell value.
   * @returns false when the edit was refused (deleted row, or key column of a persisted row)
   */
  setField(name: string, value: CellValue): boolean {
    if (this._isDeleted || this._isDiscarded) {
      return false;
    }

    if (!this._isNew && name === this.keyColumn && !deepEqual(value, this.originalValues[name])) {
      console.warn(`[RowRecord] Refused edit of key column "${name}" on row ${String(this._key)}`);
      return false;
    }

    this.currentValues[name] = cloneValue(value);
    this._emit('field', name);
    return true;
  }

  /**
   * Mark the row for deletion; an unsaved create is discarded instead.
   * A create whose submission is in flight is soft-deleted: once the
   * backend issues its key it becomes a pending delete.
   */
  markDeleted(): DeleteOutcome {
    if (this._isDeleted || this._isDiscarded) {
      return 'ignored';
    }

    if (this._isNew && !this._isInFlight) {
      this._isDiscarded = true;
      this._emit('discarded');
      return 'discarded';
    }

    this._isDeleted = true;
    this._emit('deleted');
    return 'deleted';
  }

  /**
   * Undo a soft delete before it is submitted
   */
  restore(): boolean {
    if (!this._isDeleted) {
      return false;
    }
    this._isDeleted = false;
    this._emit('restored');
    return true;
  }

  /**
   * Drop all field edits
   */
  revert(): void {
    if (!this.hasChanges()) {
      return;
    }
    this.currentValues = this._isNew ? {} : cloneValue(this.originalValues);
    this._emit('reverted');
  }

  // =========================================================================
  // RECONCILE (called by ChangeTracker once the backend confirmed)
  // =========================================================================

  /**
   * Fold confirmed values into the originals.
   * Only the submitted values are folded in, so edits made while the
   * submission was in flight stay pending.
   *
   * @param submitted - Values the backend accepted
   * @param key - Backend-issued key, for a confirmed create
   */
  commit(submitted: RowValues, key?: PersistedRowKey): void {
    const wasNew = this._isNew;
    if (wasNew) {
      if (key === undefined) {
        throw new Error(`[RowRecord] Cannot commit create ${String(this._key)} without a key`);
      }
      this._isNew = false;
      this._key = key;
      this.originalValues = {};
    }

    for (const [name, value] of Object.entries(submitted)) {
      this.originalValues[name] = cloneValue(value);
    }

    // The issued key wins over anything typed into the key column
    if (wasNew && this.keyColumn) {
      this.currentValues[this.keyColumn] = this._key;
      this.originalValues[this.keyColumn] = this._key;
    }
    this._emit('committed');
  }

  // =========================================================================
  // SUBMISSION (called by ChangeTracker)
  // =========================================================================

  /**
   * Flag the row as part of an outstanding submission
   */
  markInFlight(): void {
    this._isInFlight = true;
  }

  clearInFlight(): void {
    this._isInFlight = false;
  }

  /**
   * Stop notifying the owner (row left its snapshot)
   */
  detach(): void {
    this.onChange = null;
  }

  private _emit(type: RowChangeType, field?: string): void {
    this.onChange?.({ type, record: this, field });
  }
}
