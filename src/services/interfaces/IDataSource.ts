/**
 * @fileoverview IDataSource Interface
 * @module services/interfaces/IDataSource
 * 
 * Backend boundary for reading a page of rows and saving a change-set.
 * One implementation per backend kind, chosen when the editor is composed;
 * call sites never branch on which backend they talk to.
 */

import type { FetchedPage, PageRequest, SaveResponse, SubmitPayload, TableRef } from '../../types';

export interface IDataSource {
    /**
     * Human-readable backend kind, for logs only
     */
    readonly kind: string;

    /**
     * Fetch one page of rows, in backend order
     * @throws FetchError on transport or parse failure
     */
    fetchPage(table: TableRef, page: PageRequest): Promise<FetchedPage>;

    /**
     * Save a change-set. Row-level refusals are reported in the response;
     * only transport failures throw.
     * @throws SubmitError on transport failure
     */
    save(table: TableRef, payload: SubmitPayload, token: string | null): Promise<SaveResponse>;
}
