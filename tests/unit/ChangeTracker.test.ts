import { ChangeTracker, collectRowFailures } from '../../src/data/ChangeTracker';
import { ConsistencyError, SubmitError } from '../../src/core/errors';
import type { SubmissionResult } from '../../src/types';
import { expectEmptyChangeSet, loadedSnapshot } from '../helpers/datasetFixtures';

async function loadedTracker(): Promise<ChangeTracker> {
    return new ChangeTracker(await loadedSnapshot());
}

function row(tracker: ChangeTracker, key: string | number) {
    const record = tracker.snapshot.getByKey(key);
    if (!record) throw new Error(`no row ${String(key)}`);
    return record;
}

describe('ChangeTracker', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('changeSet', () => {
        it('is empty right after a fetch', async () => {
            const tracker = await loadedTracker();
            expectEmptyChangeSet(tracker.changeSet());
            expect(tracker.isEmpty()).toBe(true);
        });

        it('lists an edited row with only its changed fields', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');

            expect(tracker.changeSet()).toEqual({
                creates: [],
                updates: [{ key: 1, changed: { name: 'x' } }],
                deletes: [],
            });
        });

        it('classifies creates, updates and deletes', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('capacity', 4);
            row(tracker, 2).markDeleted();
            tracker.snapshot.addRow({ name: 'c' });

            expect(tracker.changeSet()).toEqual({
                creates: [{ localKey: '__new_1', values: { name: 'c' } }],
                updates: [{ key: 1, changed: { capacity: 4 } }],
                deletes: [{ key: 2 }],
            });
            expect(tracker.pendingCount()).toBe(3);
        });

        it('lists an edited and then deleted row only as a delete', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            row(tracker, 1).markDeleted();

            expect(tracker.changeSet()).toEqual({ creates: [], updates: [], deletes: [{ key: 1 }] });
        });

        it('forgets a create that was deleted before submission', async () => {
            const tracker = await loadedTracker();
            const record = tracker.snapshot.addRow();
            record.setField('name', 'z');
            record.markDeleted();

            expectEmptyChangeSet(tracker.changeSet());
        });

        it('returns the same result when called twice', async () => {
            const tracker = await loadedTracker();
            row(tracker, 2).setField('name', 'q');
            tracker.snapshot.addRow({ name: 'n' });

            expect(tracker.changeSet()).toEqual(tracker.changeSet());
        });
    });

    describe('getRowStatus', () => {
        it('reports the styling status of each row', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            row(tracker, 2).markDeleted();
            const created = tracker.snapshot.addRow();

            expect(tracker.getRowStatus(row(tracker, 1))).toBe('edited');
            expect(tracker.getRowStatus(row(tracker, 2))).toBe('deleted');
            expect(tracker.getRowStatus(created)).toBe('new');
        });
    });

    describe('reconcile', () => {
        it('applies a fully successful result', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            row(tracker, 2).markDeleted();
            const created = tracker.snapshot.addRow({ name: 'c' });
            const submitted = tracker.changeSet();

            const report = tracker.reconcile(submitted, {
                creates: [{ localKey: '__new_1', key: 3, success: true }],
                updates: [{ key: 1, success: true }],
                deletes: [{ key: 2, success: true }],
            });

            expect(report).toEqual({ created: 1, updated: 1, deleted: 1, inconsistencies: [] });
            expect(tracker.snapshot.rows().map(r => r.key)).toEqual([1, 3]);
            expect(created.isNew).toBe(false);
            expect(created.getValues()).toEqual({ name: 'c', id: 3 });
            expectEmptyChangeSet(tracker.changeSet());
            // 2 fetched, 1 deleted, 1 created
            expect(tracker.snapshot.totalCount).toBe(2);
        });

        it('changes nothing when any row was refused', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            row(tracker, 2).setField('name', 'y');
            const submitted = tracker.changeSet();
            const result: SubmissionResult = {
                creates: [],
                updates: [
                    { key: 1, success: true },
                    { key: 2, success: false, message: 'Primary keys must remain unchanged' },
                ],
                deletes: [],
            };

            let caught: unknown;
            try {
                tracker.reconcile(submitted, result);
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(SubmitError);
            if (caught instanceof SubmitError) {
                expect(caught.message).toBe('1 row(s) were rejected by the backend');
                expect(caught.rowFailures).toEqual([
                    { kind: 'update', key: 2, message: 'Primary keys must remain unchanged' },
                ]);
            }
            expect(tracker.changeSet()).toEqual(submitted);
        });

        it('keeps the issued key over a key typed into a create', async () => {
            const tracker = await loadedTracker();
            const created = tracker.snapshot.addRow({ name: 'z' });
            created.setField('id', 99);
            const submitted = tracker.changeSet();

            tracker.reconcile(submitted, {
                creates: [{ localKey: '__new_1', key: 3, success: true }],
                updates: [],
                deletes: [],
            });

            expect(created.key).toBe(3);
            expect(created.getField('id')).toBe(3);
            expect(created.getOriginalValues().id).toBe(3);
            expect(created.diffFromOriginal()).toEqual({});
            expectEmptyChangeSet(tracker.changeSet());
        });

        it('turns a create deleted in flight into a pending delete', async () => {
            const tracker = await loadedTracker();
            const created = tracker.snapshot.addRow({ name: 'z' });
            const submitted = tracker.changeSet();
            tracker.beginSubmission(submitted);

            expect(created.markDeleted()).toBe('deleted');
            expectEmptyChangeSet(tracker.changeSet());
            expect(tracker.getRowStatus(created)).toBe('deleted');

            tracker.reconcile(submitted, {
                creates: [{ localKey: '__new_1', key: 3, success: true }],
                updates: [],
                deletes: [],
            });
            tracker.endSubmission();

            expect(created.isInFlight).toBe(false);
            expect(tracker.snapshot.rows().map(r => r.key)).toEqual([1, 2, 3]);
            expect(tracker.changeSet()).toEqual({ creates: [], updates: [], deletes: [{ key: 3 }] });
        });

        it('keeps edits made while the submission was in flight', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            const submitted = tracker.changeSet();
            row(tracker, 1).setField('name', 'y');

            tracker.reconcile(submitted, { creates: [], updates: [{ key: 1, success: true }], deletes: [] });

            expect(tracker.changeSet().updates).toEqual([{ key: 1, changed: { name: 'y' } }]);
        });

        it('reports result entries for unknown rows and applies the rest', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            const submitted = tracker.changeSet();

            const report = tracker.reconcile(submitted, {
                creates: [],
                updates: [{ key: 1, success: true }, { key: 42, success: true }],
                deletes: [],
            });

            expect(report.updated).toBe(1);
            expect(report.inconsistencies).toHaveLength(1);
            expect(report.inconsistencies[0]).toBeInstanceOf(ConsistencyError);
            expect(report.inconsistencies[0].key).toBe(42);
            expect(report.inconsistencies[0].message).toBe('Result names unknown updated row 42');
            expectEmptyChangeSet(tracker.changeSet());
        });

        it('leaves rows the result does not mention pending', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            row(tracker, 2).setField('name', 'y');
            const submitted = tracker.changeSet();

            const report = tracker.reconcile(submitted, { creates: [], updates: [{ key: 1, success: true }], deletes: [] });

            expect(report.inconsistencies.map(e => e.message)).toEqual(['Row 2 was not confirmed']);
            expect(tracker.changeSet().updates).toEqual([{ key: 2, changed: { name: 'y' } }]);
        });

        it('refuses an issued key that is already in the snapshot', async () => {
            const tracker = await loadedTracker();
            const created = tracker.snapshot.addRow({ name: 'c' });
            const submitted = tracker.changeSet();

            const report = tracker.reconcile(submitted, {
                creates: [{ localKey: '__new_1', key: 2, success: true }],
                updates: [],
                deletes: [],
            });

            expect(report.created).toBe(0);
            expect(report.inconsistencies.map(e => e.message)).toEqual(['Issued key 2 is already used in this snapshot']);
            expect(created.isNew).toBe(true);
        });

        it('reports a create that came back without a key once', async () => {
            const tracker = await loadedTracker();
            tracker.snapshot.addRow({ name: 'c' });
            const submitted = tracker.changeSet();

            const report = tracker.reconcile(submitted, {
                creates: [{ localKey: '__new_1', success: true }],
                updates: [],
                deletes: [],
            });

            expect(report.inconsistencies.map(e => e.message)).toEqual(['No key issued for new row __new_1']);
        });
    });

    describe('endSubmission', () => {
        it('drops a create deleted in flight when the submission failed', async () => {
            const tracker = await loadedTracker();
            const created = tracker.snapshot.addRow({ name: 'z' });
            tracker.beginSubmission(tracker.changeSet());
            created.markDeleted();

            tracker.endSubmission();

            expect(tracker.snapshot.rows().map(r => r.key)).toEqual([1, 2]);
            expect(tracker.snapshot.totalCount).toBe(2);
            expectEmptyChangeSet(tracker.changeSet());
        });

        it('leaves a create that was not deleted pending', async () => {
            const tracker = await loadedTracker();
            const created = tracker.snapshot.addRow({ name: 'z' });
            tracker.beginSubmission(tracker.changeSet());

            tracker.endSubmission();

            expect(created.isInFlight).toBe(false);
            expect(tracker.changeSet().creates).toEqual([{ localKey: '__new_1', values: { name: 'z' } }]);
        });
    });

    describe('discardAll', () => {
        it('drops creates, restores deletes and reverts edits', async () => {
            const tracker = await loadedTracker();
            row(tracker, 1).setField('name', 'x');
            row(tracker, 2).markDeleted();
            tracker.snapshot.addRow({ name: 'c' });

            tracker.discardAll();

            expectEmptyChangeSet(tracker.changeSet());
            expect(tracker.snapshot.rows().map(r => r.key)).toEqual([1, 2]);
            expect(row(tracker, 1).getField('name')).toBe('a');
            expect(row(tracker, 2).isDeleted).toBe(false);
            expect(tracker.snapshot.totalCount).toBe(2);
        });
    });

    it('collectRowFailures fills in default messages', () => {
        expect(collectRowFailures({
            creates: [{ localKey: '__new_1', success: false }],
            updates: [],
            deletes: [{ key: 5, success: false }],
        })).toEqual([
            { kind: 'create', key: '__new_1', message: 'Insert rejected' },
            { kind: 'delete', key: 5, message: 'Delete rejected' },
        ]);
    });
});
