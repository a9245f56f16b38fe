/**
 * @fileoverview Dataset editor configuration
 * @module core/EditorConfig
 * 
 * Typed defaults merged with caller overrides. Created once in the
 * composition root and injected; nothing reads configuration globally.
 * 
 * Usage:
 *   const config = resolveEditorConfig({ pageSize: 50 });
 *   new DualViewCoordinator({ config, ... });
 */

import {
  DEFAULT_API_BASE_URL,
  DEFAULT_KEY_COLUMN,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TOKEN_COOKIE,
} from './Constants';
import { DEFAULT_UNCHECKED_NAMING, type UncheckedNamingConfig } from './UncheckedTableNaming';

/**
 * Editor configuration
 */
export interface EditorConfig {
  /** Rows per fetched page */
  pageSize: number;
  /** Column holding the backend row key */
  keyColumn: string;
  /** Base URL of the REST data API */
  apiBaseUrl: string;
  /** Cookie holding the authenticity token */
  tokenCookieName: string;
  /** Unchecked twin naming rule */
  uncheckedNaming: UncheckedNamingConfig;
  /** Whether each view starts visible */
  initiallyVisible: {
    main: boolean;
    unchecked: boolean;
  };
}

/**
 * Overrides accepted by resolveEditorConfig
 */
export type EditorConfigOverrides = Partial<Omit<EditorConfig, 'uncheckedNaming' | 'initiallyVisible'>> & {
  uncheckedNaming?: Partial<UncheckedNamingConfig>;
  initiallyVisible?: Partial<EditorConfig['initiallyVisible']>;
};

/**
 * Default configuration
 */
export const DEFAULT_EDITOR_CONFIG: Readonly<EditorConfig> = Object.freeze({
  pageSize: DEFAULT_PAGE_SIZE,
  keyColumn: DEFAULT_KEY_COLUMN,
  apiBaseUrl: DEFAULT_API_BASE_URL,
  tokenCookieName: DEFAULT_TOKEN_COOKIE,
  uncheckedNaming: DEFAULT_UNCHECKED_NAMING,
  initiallyVisible: Object.freeze({ main: true, unchecked: false }),
});

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveEditorConfig(overrides: EditorConfigOverrides = {}): EditorConfig {
  const config: EditorConfig = {
    pageSize: overrides.pageSize ?? DEFAULT_EDITOR_CONFIG.pageSize,
    keyColumn: overrides.keyColumn ?? DEFAULT_EDITOR_CONFIG.keyColumn,
    apiBaseUrl: (overrides.apiBaseUrl ?? DEFAULT_EDITOR_CONFIG.apiBaseUrl).replace(/\/+$/, ''),
    tokenCookieName: overrides.tokenCookieName ?? DEFAULT_EDITOR_CONFIG.tokenCookieName,
    uncheckedNaming: {
      ...DEFAULT_EDITOR_CONFIG.uncheckedNaming,
      ...overrides.uncheckedNaming,
    },
    initiallyVisible: {
      ...DEFAULT_EDITOR_CONFIG.initiallyVisible,
      ...overrides.initiallyVisible,
    },
  };

  if (!Number.isInteger(config.pageSize) || config.pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${config.pageSize}`);
  }
  if (config.keyColumn.trim() === '') {
    throw new RangeError('keyColumn must not be empty');
  }

  return config;
}
