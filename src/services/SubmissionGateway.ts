/**
 * @fileoverview Submission Gateway - sends a change-set to the backend
 * @module services/SubmissionGateway
 * 
 * Serializes the change-set into the wire payload, attaches the session's
 * authenticity token and maps the backend's positional create outcomes back
 * onto the placeholder keys of the rows that produced them.
 */

import type { ChangeSet, SaveResponse, SubmissionResult, SubmitPayload, TableRef } from '../types';
import type { IDataSource, ISubmissionGateway, ITokenProvider, SubmitOptions } from './interfaces';
import { SubmitError, extractErrorMessage } from '../core/errors';

/**
 * Submission gateway options
 */
export interface SubmissionGatewayOptions {
    dataSource: IDataSource;
    tokenProvider: ITokenProvider;
}

/**
 * Convert a change-set to the submission wire format
 */
export function toSubmitPayload(changeSet: ChangeSet, message?: string): SubmitPayload {
    const payload: SubmitPayload = {
        creates: changeSet.creates.map(c => c.values),
        updates: changeSet.updates.map(u => ({ key: u.key, changedFields: u.changed })),
        deletes: changeSet.deletes.map(d => d.key),
    };
    if (message !== undefined && message.trim() !== '') {
        payload.message = message.trim();
    }
    return payload;
}

export class SubmissionGateway implements ISubmissionGateway {
    private readonly dataSource: IDataSource;
    private readonly tokenProvider: ITokenProvider;

    constructor(options: SubmissionGatewayOptions) {
        this.dataSource = options.dataSource;
        this.tokenProvider = options.tokenProvider;
    }

    async submit(table: TableRef, changeSet: ChangeSet, options: SubmitOptions = {}): Promise<SubmissionResult> {
        const payload = toSubmitPayload(changeSet, options.message);
        const token = this.tokenProvider.getToken();
        if (token === null) {
            console.warn('[SubmissionGateway] No authenticity token available; the backend may refuse the change');
        }

        console.log(
            `[SubmissionGateway] Submitting ${table.schema}.${table.table} via ${this.dataSource.kind}: ` +
            `${payload.creates.length} creates, ${payload.updates.length} updates, ${payload.deletes.length} deletes`
        );

        let response: SaveResponse;
        try {
            response = await this.dataSource.save(table, payload, token);
        } catch (error) {
            if (error instanceof SubmitError) throw error;
            throw new SubmitError(0, extractErrorMessage(error));
        }

        if (response.creates.length !== changeSet.creates.length) {
            throw new SubmitError(
                0,
                `Backend answered ${response.creates.length} create outcome(s) for ${changeSet.creates.length} new row(s)`
            );
        }

        return {
            creates: response.creates.map((outcome, index) => ({
                ...outcome,
                localKey: changeSet.creates[index].localKey,
            })),
            updates: response.updates,
            deletes: response.deletes,
        };
    }
}
