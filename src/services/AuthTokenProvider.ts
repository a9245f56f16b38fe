/**
 * @fileoverview Authenticity token providers
 * @module services/AuthTokenProvider
 * 
 * The token is read at submission time and handed to the data source as a
 * parameter; nothing caches it in module state.
 */

import type { ITokenProvider } from './interfaces';
import { DEFAULT_TOKEN_COOKIE } from '../core/Constants';

/**
 * Cookie token provider options
 */
export interface CookieTokenProviderOptions {
    cookieName?: string;
    /** Returns the raw cookie header; defaults to document.cookie */
    readCookies?: () => string;
}

/**
 * Reads the token from a cookie string (`a=1; csrftoken=abc`)
 */
export class CookieTokenProvider implements ITokenProvider {
    private readonly cookieName: string;
    private readonly readCookies: () => string;

    constructor(options: CookieTokenProviderOptions = {}) {
        this.cookieName = options.cookieName ?? DEFAULT_TOKEN_COOKIE;
        this.readCookies = options.readCookies ?? (() => (typeof document === 'undefined' ? '' : document.cookie));
    }

    getToken(): string | null {
        const raw = this.readCookies();
        if (!raw) return null;

        for (const part of raw.split(';')) {
            const separator = part.indexOf('=');
            if (separator === -1) continue;
            const name = part.slice(0, separator).trim();
            if (name !== this.cookieName) continue;
            const value = part.slice(separator + 1).trim();
            if (value === '') return null;
            try {
                return decodeURIComponent(value);
            } catch (error) {
                console.warn(`[CookieTokenProvider] Malformed ${this.cookieName} cookie, using it verbatim:`, error);
                return value;
            }
        }
        return null;
    }
}

/**
 * Fixed token (server-rendered pages, scripts)
 */
export class StaticTokenProvider implements ITokenProvider {
    constructor(private readonly token: string | null) {}

    getToken(): string | null {
        return this.token;
    }
}
