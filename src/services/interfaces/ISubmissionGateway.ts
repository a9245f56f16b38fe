/**
 * @fileoverview ISubmissionGateway Interface
 * @module services/interfaces/ISubmissionGateway
 */

import type { ChangeSet, SubmissionResult, TableRef } from '../../types';

/**
 * Options for a single submission
 */
export interface SubmitOptions {
    /** Commit message stored alongside the change */
    message?: string;
}

export interface ISubmissionGateway {
    /**
     * Send a change-set and return the per-row result
     * @throws SubmitError on transport failure or a malformed result
     */
    submit(table: TableRef, changeSet: ChangeSet, options?: SubmitOptions): Promise<SubmissionResult>;
}
