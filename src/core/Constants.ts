/**
 * @fileoverview Application-wide constants
 * @module core/Constants
 * 
 * Centralized constants to eliminate magic strings.
 */

import type { ViewKind, ViewStatus } from '../types';

/**
 * Rows fetched per page when the caller does not say otherwise
 */
export const DEFAULT_PAGE_SIZE = 100;

/**
 * Column holding the backend-issued row key
 */
export const DEFAULT_KEY_COLUMN = 'id';

/**
 * Prefix of placeholder keys given to unsaved rows
 */
export const LOCAL_KEY_PREFIX = '__new_';

/**
 * Base path of the REST data API
 */
export const DEFAULT_API_BASE_URL = '/api/v0';

/**
 * Cookie carrying the per-session authenticity token
 */
export const DEFAULT_TOKEN_COOKIE = 'csrftoken';

/**
 * Header the authenticity token is sent in
 */
export const TOKEN_HEADER = 'X-CSRFToken';

/**
 * Both view slots, in display order
 */
export const VIEW_KINDS: readonly ViewKind[] = Object.freeze(['main', 'unchecked'] as const);

/**
 * Statuses during which a network call is outstanding
 */
export const BUSY_STATUSES: ReadonlySet<ViewStatus> = new Set<ViewStatus>(['loading', 'submitting']);

/**
 * Labels for view slots
 */
export const VIEW_LABELS: Readonly<Record<ViewKind, string>> = Object.freeze({
  main: 'Published data',
  unchecked: 'Pending review',
} as const);
