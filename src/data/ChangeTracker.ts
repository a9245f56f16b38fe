/**
 * @fileoverview Change tracker - derives the pending change-set of a snapshot
 * @module data/ChangeTracker
 *
 * Holds no state of its own: every call scans the snapshot's current rows,
 * so edits made between calls are always reflected.
 *
 * Classification (each row in at most one list):
 * - creates: isNew and not deleted
 * - deletes: persisted and isDeleted
 * - updates: neither, with a non-empty diff
 *
 * A create deleted while its submission is in flight is in no list until
 * the backend issues its key; it then becomes a pending delete.
 */

import type {
  ChangeSet,
  PersistedRowKey,
  RowFailure,
  RowStatus,
  RowValues,
  SubmissionResult,
} from '../types';
import { ConsistencyError, SubmitError } from '../core/errors';
import type { DatasetSnapshot } from './DatasetSnapshot';
import type { RowRecord } from './RowRecord';

/**
 * Summary of an applied reconcile
 */
export interface ReconcileReport {
  created: number;
  updated: number;
  deleted: number;
  /** Result entries that could not be matched; affected rows stay pending */
  inconsistencies: ConsistencyError[];
}

/**
 * Collect every row-level refusal in a submission result
 */
export function collectRowFailures(result: SubmissionResult): RowFailure[] {
  const failures: RowFailure[] = [];
  for (const outcome of result.creates) {
    if (!outcome.success) {
      failures.push({ kind: 'create', key: outcome.localKey, message: outcome.message ?? 'Insert rejected' });
    }
  }
  for (const outcome of result.updates) {
    if (!outcome.success) {
      failures.push({ kind: 'update', key: outcome.key, message: outcome.message ?? 'Update rejected' });
    }
  }
  for (const outcome of result.deletes) {
    if (!outcome.success) {
      failures.push({ kind: 'delete', key: outcome.key, message: outcome.message ?? 'Delete rejected' });
    }
  }
  return failures;
}

export class ChangeTracker {
  constructor(public readonly snapshot: DatasetSnapshot) {}

  // =========================================================================
  // QUERIES
  // =========================================================================

  /**
   * Compute the change-set from the snapshot's current rows
   */
  changeSet(): ChangeSet {
    const changeSet: ChangeSet = { creates: [], updates: [], deletes: [] };

    for (const record of this.snapshot.rows()) {
      if (record.isNew) {
        if (!record.isDeleted) {
          changeSet.creates.push({ localKey: String(record.key), values: record.getValues() });
        }
      } else if (record.isDeleted) {
        changeSet.deletes.push({ key: record.key });
      } else {
        const changed = record.diffFromOriginal();
        if (Object.keys(changed).length > 0) {
          changeSet.updates.push({ key: record.key, changed });
        }
      }
    }

    return changeSet;
  }

  /**
   * True when there is nothing to submit
   */
  isEmpty(): boolean {
    return this.pendingCount() === 0;
  }

  /**
   * Number of rows that would be submitted
   */
  pendingCount(): number {
    const { creates, updates, deletes } = this.changeSet();
    return creates.length + updates.length + deletes.length;
  }

  /**
   * Status of a row, for renderer styling
   */
  getRowStatus(record: RowRecord): RowStatus {
    if (record.isDeleted) return 'deleted';
    if (record.isNew) return 'new';
    if (record.hasChanges()) return 'edited';
    return null;
  }

  // =========================================================================
  // SUBMISSION
  // =========================================================================

  /**
   * Flag the submitted creates as in flight, so deleting one waits for
   * its key instead of dropping it
   */
  beginSubmission(submitted: ChangeSet): void {
    for (const create of submitted.creates) {
      this.snapshot.getByKey(create.localKey)?.markInFlight();
    }
  }

  /**
   * Clear the in-flight flags once the submission settled. Creates that
   * were deleted meanwhile and never got a key are dropped.
   */
  endSubmission(): void {
    const orphans = new Set<RowRecord>();
    for (const record of this.snapshot.rows()) {
      if (!record.isInFlight) continue;
      record.clearInFlight();
      if (record.isNew && record.isDeleted) {
        orphans.add(record);
      }
    }
    this.snapshot.removeRecords(orphans);
  }

  // =========================================================================
  // RECONCILE
  // =========================================================================

  /**
   * Apply a backend result for a submitted change-set.
   *
   * Any refused row means nothing is applied. Otherwise every entry is
   * matched against the snapshot first and only then applied, in one pass.
   *
   * @param submitted - The change-set that was sent
   * @param result - The backend's per-row answer
   * @throws SubmitError when the result refuses any row (snapshot untouched)
   */
  reconcile(submitted: ChangeSet, result: SubmissionResult): ReconcileReport {
    const failures = collectRowFailures(result);
    if (failures.length > 0) {
      throw new SubmitError(0, `${failures.length} row(s) were rejected by the backend`, failures);
    }

    const inconsistencies: ConsistencyError[] = [];
    const steps: Array<() => void> = [];
    const toRemove = new Set<RowRecord>();
    const confirmed = new Set<RowRecord>();
    let createdCount = 0;
    let updatedCount = 0;

    // --- creates ---------------------------------------------------------
    const submittedCreates = new Map<string, RowValues>(submitted.creates.map(c => [c.localKey, c.values]));
    const takenKeys = new Set<PersistedRowKey>(
      this.snapshot.rows().filter(r => !r.isNew).map(r => r.key)
    );
    for (const outcome of result.creates) {
      const record = this.snapshot.getByKey(outcome.localKey);
      const values = submittedCreates.get(outcome.localKey);
      if (!record || !record.isNew || !values) {
        inconsistencies.push(new ConsistencyError(outcome.localKey, `Result names unknown new row ${outcome.localKey}`));
        continue;
      }
      const key = outcome.key;
      if (key === undefined) {
        inconsistencies.push(new ConsistencyError(outcome.localKey, `No key issued for new row ${outcome.localKey}`));
        continue;
      }
      if (takenKeys.has(key)) {
        inconsistencies.push(new ConsistencyError(outcome.localKey, `Issued key ${String(key)} is already used in this snapshot`));
        continue;
      }
      takenKeys.add(key);
      confirmed.add(record);
      createdCount += 1;
      steps.push(() => record.commit(values, key));
    }

    // --- updates ---------------------------------------------------------
    const submittedUpdates = new Map<PersistedRowKey, RowValues>(submitted.updates.map(u => [u.key, u.changed]));
    for (const outcome of result.updates) {
      const record = this.snapshot.getByKey(outcome.key);
      const changed = submittedUpdates.get(outcome.key);
      if (!record || record.isNew || !changed) {
        inconsistencies.push(new ConsistencyError(outcome.key, `Result names unknown updated row ${String(outcome.key)}`));
        continue;
      }
      confirmed.add(record);
      updatedCount += 1;
      steps.push(() => record.commit(changed));
    }

    // --- deletes ---------------------------------------------------------
    const submittedDeletes = new Set<PersistedRowKey>(submitted.deletes.map(d => d.key));
    for (const outcome of result.deletes) {
      const record = this.snapshot.getByKey(outcome.key);
      if (!record || !record.isDeleted || !submittedDeletes.has(outcome.key)) {
        inconsistencies.push(new ConsistencyError(outcome.key, `Result names unknown deleted row ${String(outcome.key)}`));
        continue;
      }
      confirmed.add(record);
      toRemove.add(record);
    }

    // Submitted rows the backend never mentioned stay pending
    const reported = new Set(inconsistencies.map(e => e.key));
    for (const create of submitted.creates) {
      const record = this.snapshot.getByKey(create.localKey);
      if (record && !confirmed.has(record) && !reported.has(create.localKey)) {
        inconsistencies.push(new ConsistencyError(create.localKey, `New row ${create.localKey} was not confirmed`));
      }
    }
    for (const entry of [...submitted.updates, ...submitted.deletes]) {
      const record = this.snapshot.getByKey(entry.key);
      if (record && !record.isNew && !confirmed.has(record) && !reported.has(entry.key)) {
        inconsistencies.push(new ConsistencyError(entry.key, `Row ${String(entry.key)} was not confirmed`));
      }
    }

    // --- apply -----------------------------------------------------------
    for (const step of steps) {
      step();
    }
    this.snapshot.removeRecords(toRemove);
    this.snapshot.addToTotalCount(createdCount);
    this.snapshot.notifyChanged();

    for (const error of inconsistencies) {
      console.error(`[ChangeTracker] ${error.message}`);
    }

    const report: ReconcileReport = {
      created: createdCount,
      updated: updatedCount,
      deleted: toRemove.size,
      inconsistencies,
    };
    console.log(
      `[ChangeTracker] Reconciled ${this.snapshot.table.schema}.${this.snapshot.table.table}: ` +
      `${report.created} created, ${report.updated} updated, ${report.deleted} deleted`
    );
    return report;
  }

  // =========================================================================
  // DISCARD
  // =========================================================================

  /**
   * Throw away every pending change: drop creates, restore deletes,
   * revert edits
   */
  discardAll(): void {
    const creates = new Set<RowRecord>();
    for (const record of this.snapshot.rows()) {
      if (record.isNew) {
        creates.add(record);
        continue;
      }
      record.restore();
      record.revert();
    }
    this.snapshot.removeRecords(creates);
    this.snapshot.notifyChanged();
  }
}
