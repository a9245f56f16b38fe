/**
 * @fileoverview Error taxonomy for fetch, submit and reconcile failures
 * @module core/errors
 */

import type { RowFailure, RowKey } from '../types';

/**
 * Base class for all errors raised by the dataset editor
 */
export class DatasetEditorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetEditorError';
  }
}

/**
 * Transport or parse failure while loading a page.
 * `status` is the HTTP status, or 0 when no response was received.
 */
export class FetchError extends DatasetEditorError {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Transport or validation failure while saving a change-set
 */
export class SubmitError extends DatasetEditorError {
  constructor(
    public readonly status: number,
    message: string,
    public readonly rowFailures: RowFailure[] = [],
  ) {
    super(message);
    this.name = 'SubmitError';
  }

  /** True when the backend answered but refused individual rows */
  isPartial(): boolean {
    return this.rowFailures.length > 0;
  }
}

/**
 * Local state and a backend result disagree (e.g. unknown row key)
 */
export class ConsistencyError extends DatasetEditorError {
  constructor(
    public readonly key: RowKey,
    message: string,
  ) {
    super(message);
    this.name = 'ConsistencyError';
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function extractErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (error && typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }

    if ('reason' in error && typeof error.reason === 'string') {
      return error.reason;
    }
  }

  return 'Unknown error';
}
