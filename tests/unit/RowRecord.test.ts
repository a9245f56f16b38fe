import { RowRecord, type RowChangeEvent } from '../../src/data/RowRecord';

function persisted(onChange?: (event: RowChangeEvent) => void): RowRecord {
    return new RowRecord({
        key: 1,
        values: { id: 1, name: 'a', geom: { type: 'Point', coordinates: [1, 2] } },
        keyColumn: 'id',
        onChange,
    });
}

describe('RowRecord', () => {
    describe('diffFromOriginal', () => {
        it('is empty right after construction', () => {
            expect(persisted().diffFromOriginal()).toEqual({});
        });

        it('contains only the changed fields', () => {
            const record = persisted();
            record.setField('name', 'x');
            expect(record.diffFromOriginal()).toEqual({ name: 'x' });
        });

        it('drops a field that was changed back to its original value', () => {
            const record = persisted();
            record.setField('name', 'x');
            record.setField('name', 'a');
            expect(record.diffFromOriginal()).toEqual({});
            expect(record.hasChanges()).toBe(false);
        });

        it('treats a -0 set over a fetched 0 as unchanged', () => {
            const record = new RowRecord({ key: 1, values: { id: 1, capacity: 0 }, keyColumn: 'id' });
            record.setField('capacity', -0);
            expect(record.diffFromOriginal()).toEqual({});
            expect(record.hasChanges()).toBe(false);
        });

        it('compares structured values by content', () => {
            const record = persisted();
            record.setField('geom', { type: 'Point', coordinates: [1, 2] });
            expect(record.isFieldChanged('geom')).toBe(false);

            record.setField('geom', { type: 'Point', coordinates: [1, 3] });
            expect(record.diffFromOriginal()).toEqual({ geom: { type: 'Point', coordinates: [1, 3] } });
        });

        it('reports a newly introduced field', () => {
            const record = persisted();
            record.setField('comment', null);
            expect(record.diffFromOriginal()).toEqual({ comment: null });
        });
    });

    describe('setField', () => {
        it('notifies the owner', () => {
            const onChange = vi.fn();
            const record = persisted(onChange);
            record.setField('name', 'x');
            expect(onChange).toHaveBeenCalledWith({ type: 'field', record, field: 'name' });
        });

        it('does not alias caller objects', () => {
            const record = persisted();
            const coordinates = [5, 6];
            record.setField('geom', { type: 'Point', coordinates });
            coordinates.push(7);
            expect(record.getField('geom')).toEqual({ type: 'Point', coordinates: [5, 6] });
        });

        it('refuses edits of the key column on a persisted row', () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
            const record = persisted();
            expect(record.setField('id', 99)).toBe(false);
            expect(record.getField('id')).toBe(1);
            expect(warn).toHaveBeenCalledTimes(1);
            warn.mockRestore();
        });

        it('allows setting the key column on a new row', () => {
            const record = new RowRecord({ key: '__new_1', isNew: true, keyColumn: 'id' });
            expect(record.setField('id', 7)).toBe(true);
            expect(record.getValues()).toEqual({ id: 7 });
        });

        it('refuses edits of a deleted row', () => {
            const record = persisted();
            record.markDeleted();
            expect(record.setField('name', 'x')).toBe(false);
            expect(record.getField('name')).toBe('a');
        });
    });

    describe('markDeleted', () => {
        it('soft-deletes a persisted row', () => {
            const onChange = vi.fn();
            const record = persisted(onChange);
            expect(record.markDeleted()).toBe('deleted');
            expect(record.isDeleted).toBe(true);
            expect(onChange).toHaveBeenCalledWith({ type: 'deleted', record, field: undefined });
        });

        it('discards an unsaved create', () => {
            const record = new RowRecord({ key: '__new_1', isNew: true });
            expect(record.markDeleted()).toBe('discarded');
            expect(record.isDiscarded).toBe(true);
            expect(record.isDeleted).toBe(false);
        });

        it('soft-deletes a create whose submission is in flight', () => {
            const record = new RowRecord({ key: '__new_1', isNew: true });
            record.markInFlight();
            expect(record.markDeleted()).toBe('deleted');
            expect(record.isDeleted).toBe(true);
            expect(record.isDiscarded).toBe(false);
        });

        it('ignores a second delete', () => {
            const record = persisted();
            record.markDeleted();
            expect(record.markDeleted()).toBe('ignored');
        });
    });

    describe('restore and revert', () => {
        it('restore undoes a soft delete', () => {
            const record = persisted();
            record.markDeleted();
            expect(record.restore()).toBe(true);
            expect(record.isDeleted).toBe(false);
            expect(record.restore()).toBe(false);
        });

        it('revert drops all edits', () => {
            const record = persisted();
            record.setField('name', 'x');
            record.setField('comment', 'hi');
            record.revert();
            expect(record.getValues()).toEqual(record.getOriginalValues());
            expect(record.hasChanges()).toBe(false);
        });

        it('revert without edits emits nothing', () => {
            const onChange = vi.fn();
            persisted(onChange).revert();
            expect(onChange).not.toHaveBeenCalled();
        });
    });

    describe('commit', () => {
        it('folds submitted values into the originals', () => {
            const record = persisted();
            record.setField('name', 'x');
            record.commit({ name: 'x' });
            expect(record.diffFromOriginal()).toEqual({});
            expect(record.getOriginalValues()).toMatchObject({ name: 'x' });
        });

        it('keeps edits made after the submission pending', () => {
            const record = persisted();
            record.setField('name', 'x');
            const submitted = record.diffFromOriginal();
            record.setField('name', 'y');
            record.commit(submitted);
            expect(record.diffFromOriginal()).toEqual({ name: 'y' });
        });

        it('turns a create into a persisted row with the issued key', () => {
            const record = new RowRecord({ key: '__new_1', isNew: true, keyColumn: 'id' });
            record.setField('name', 'z');
            record.commit({ name: 'z' }, 3);
            expect(record.isNew).toBe(false);
            expect(record.key).toBe(3);
            expect(record.getValues()).toEqual({ name: 'z', id: 3 });
            expect(record.diffFromOriginal()).toEqual({});
        });

        it('replaces a typed key column value with the issued key', () => {
            const record = new RowRecord({ key: '__new_1', isNew: true, keyColumn: 'id' });
            record.setField('id', 99);
            record.setField('name', 'z');
            record.commit({ id: 99, name: 'z' }, 3);
            expect(record.getField('id')).toBe(3);
            expect(record.getOriginalValues()).toEqual({ id: 3, name: 'z' });
            expect(record.diffFromOriginal()).toEqual({});
        });

        it('throws for a create without a key', () => {
            const record = new RowRecord({ key: '__new_1', isNew: true });
            expect(() => record.commit({})).toThrow('without a key');
        });
    });

    it('stops notifying once detached', () => {
        const onChange = vi.fn();
        const record = persisted(onChange);
        record.detach();
        record.setField('name', 'x');
        expect(onChange).not.toHaveBeenCalled();
    });
});
