import { isCellValue, parseFetchedPage, parseSaveResponse } from '../../src/data/sources/wire';

describe('wire guards', () => {
    it('accepts JSON values and refuses the rest', () => {
        expect(isCellValue({ a: [1, 'x', null, true] })).toBe(true);
        expect(isCellValue(Number.NaN)).toBe(false);
        expect(isCellValue(undefined)).toBe(false);
        expect(isCellValue({ a: () => 1 })).toBe(false);
    });

    describe('parseFetchedPage', () => {
        it('reads rows and count', () => {
            expect(parseFetchedPage({ rows: [{ id: 1 }], count: 40 })).toEqual({ rows: [{ id: 1 }], totalCount: 40 });
        });

        it('refuses a negative or fractional count', () => {
            expect(parseFetchedPage({ rows: [], count: -1 })).toBeNull();
            expect(parseFetchedPage({ rows: [], count: 1.5 })).toBeNull();
        });

        it('refuses rows that are not objects', () => {
            expect(parseFetchedPage({ rows: [[1, 2]] })).toBeNull();
            expect(parseFetchedPage([])).toBeNull();
        });
    });

    describe('parseSaveResponse', () => {
        it('accepts creates without a key', () => {
            const body = { creates: [{ success: false, message: 'no' }], updates: [], deletes: [] };
            expect(parseSaveResponse(body)).toEqual(body);
        });

        it('refuses outcomes without a success flag', () => {
            expect(parseSaveResponse({ creates: [], updates: [{ key: 1 }], deletes: [] })).toBeNull();
            expect(parseSaveResponse({ creates: [], updates: [] })).toBeNull();
        });
    });
});
