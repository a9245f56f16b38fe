/**
 * @fileoverview REST data source - JSON over HTTP
 * @module data/sources/RestDataSource
 * 
 * Endpoints (relative to baseUrl):
 *   GET  /schema/{schema}/tables/{table}/rows/?offset=&limit=  → { rows, count }
 *   POST /schema/{schema}/tables/{table}/rows/changes          → { creates, updates, deletes }
 * 
 * Cookies travel with every request; the authenticity token is sent in the
 * X-CSRFToken header.
 */

import type { FetchedPage, PageRequest, SaveResponse, SubmitPayload, TableRef } from '../../types';
import type { IDataSource } from '../../services/interfaces';
import { DEFAULT_API_BASE_URL, TOKEN_HEADER } from '../../core/Constants';
import { FetchError, SubmitError, extractErrorMessage } from '../../core/errors';
import { parseFetchedPage, parseSaveResponse } from './wire';

/**
 * fetch-compatible function (injectable for tests)
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * REST data source options
 */
export interface RestDataSourceOptions {
  baseUrl?: string;
  fetchImpl?: FetchFn;
}

export class RestDataSource implements IDataSource {
  readonly kind = 'rest';
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: RestDataSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchPage(table: TableRef, page: PageRequest): Promise<FetchedPage> {
    const url = `${this.rowsUrl(table)}/?offset=${page.offset}&limit=${page.limit}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        credentials: 'include',
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      throw new FetchError(0, `Network error: ${extractErrorMessage(error)}`);
    }

    const body = await this.readBody(response);
    if (!response.ok) {
      throw new FetchError(response.status, this.describeFailure(response.status, body));
    }

    const parsed = parseFetchedPage(body);
    if (!parsed) {
      throw new FetchError(response.status, 'Malformed page in response');
    }
    return parsed;
  }

  async save(table: TableRef, payload: SubmitPayload, token: string | null): Promise<SaveResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (token) {
      headers[TOKEN_HEADER] = token;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.rowsUrl(table)}/changes`, {
        method: 'POST',
        credentials: 'include',
        headers,
        body: JSON.stringify(payload),
      });
    } catch (error) {
      throw new SubmitError(0, `Network error: ${extractErrorMessage(error)}`);
    }

    const body = await this.readBody(response);
    if (!response.ok) {
      throw new SubmitError(response.status, this.describeFailure(response.status, body));
    }

    const parsed = parseSaveResponse(body);
    if (!parsed) {
      throw new SubmitError(response.status, 'Malformed submission result');
    }
    return parsed;
  }

  private rowsUrl(table: TableRef): string {
    return `${this.baseUrl}/schema/${encodeURIComponent(table.schema)}/tables/${encodeURIComponent(table.table)}/rows`;
  }

  /**
   * Read a JSON body; undefined for empty or non-JSON bodies
   */
  private async readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private describeFailure(status: number, body: unknown): string {
    if (body && typeof body === 'object') {
      const message = extractErrorMessage(body);
      if (message !== 'Unknown error') {
        return message;
      }
    }
    if (typeof body === 'string' && body.trim() !== '') {
      return body.trim();
    }
    return `Request failed with status ${status}`;
  }
}
