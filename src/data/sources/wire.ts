/**
 * @fileoverview Wire-format guards for backend JSON
 * @module data/sources/wire
 * 
 * Backend responses are untrusted JSON; these guards narrow them to the
 * typed shapes the snapshot and gateway work with.
 */

import type { CellValue, FetchedPage, PersistedRowKey, RowOutcome, RowValues, SaveResponse } from '../../types';

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isCellValue(value: unknown): value is CellValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isCellValue);
      return Object.values(value).every(isCellValue);
    default:
      return false;
  }
}

export function isRowValues(value: unknown): value is RowValues {
  return isObject(value) && Object.values(value).every(isCellValue);
}

export function isPersistedRowKey(value: unknown): value is PersistedRowKey {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function isRowOutcome(value: unknown): value is RowOutcome {
  return isObject(value)
    && isPersistedRowKey(value.key)
    && typeof value.success === 'boolean'
    && isOptionalString(value.message);
}

function isCreateOutcome(value: unknown): value is SaveResponse['creates'][number] {
  return isObject(value)
    && (value.key === undefined || isPersistedRowKey(value.key))
    && typeof value.success === 'boolean'
    && isOptionalString(value.message);
}

/**
 * Parse a page body: `{ "rows": [...], "count": n }`
 * @returns null when the body has another shape
 */
export function parseFetchedPage(body: unknown): FetchedPage | null {
  if (!isObject(body) || !Array.isArray(body.rows) || !body.rows.every(isRowValues)) {
    return null;
  }
  let totalCount: number = body.rows.length;
  const count = body.count;
  if (count !== undefined) {
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
      return null;
    }
    totalCount = count;
  }
  return { rows: body.rows, totalCount };
}

/**
 * Parse a save body: `{ "creates": [...], "updates": [...], "deletes": [...] }`
 * @returns null when the body has another shape
 */
export function parseSaveResponse(body: unknown): SaveResponse | null {
  if (!isObject(body)) return null;
  const { creates, updates, deletes } = body;
  if (!Array.isArray(creates) || !creates.every(isCreateOutcome)) return null;
  if (!Array.isArray(updates) || !updates.every(isRowOutcome)) return null;
  if (!Array.isArray(deletes) || !deletes.every(isRowOutcome)) return null;
  return { creates, updates, deletes };
}
