/**
 * @fileoverview Composition root for the browser
 * @module services/createDatasetEditor
 *
 * Wires the REST data source and the cookie token provider from one
 * resolved configuration, builds the coordinator and its views, and loads
 * every visible view.
 */

import type { TableFlags, TableRef } from '../types';
import type { IGridRenderer } from './interfaces';
import { VIEW_KINDS } from '../core/Constants';
import { resolveEditorConfig, type EditorConfigOverrides } from '../core/EditorConfig';
import { RestDataSource, type FetchFn } from '../data/sources';
import { CookieTokenProvider } from './AuthTokenProvider';
import { DualViewCoordinator, type ViewSettings } from './DualViewCoordinator';

/**
 * Options for createDatasetEditor
 */
export interface CreateDatasetEditorOptions<TContainer> {
    table: TableRef;
    flags: TableFlags;
    renderer: IGridRenderer<TContainer>;
    views: {
        main: ViewSettings<TContainer>;
        unchecked?: ViewSettings<TContainer>;
    };
    config?: EditorConfigOverrides;
    /** Custom fetch (tests, instrumented clients) */
    fetchImpl?: FetchFn;
    /** Cookie source; defaults to document.cookie */
    readCookies?: () => string;
}

export async function createDatasetEditor<TContainer>(
    options: CreateDatasetEditorOptions<TContainer>
): Promise<DualViewCoordinator<TContainer>> {
    const config = resolveEditorConfig(options.config);

    const coordinator = new DualViewCoordinator<TContainer>({
        table: options.table,
        dataSource: new RestDataSource({ baseUrl: config.apiBaseUrl, fetchImpl: options.fetchImpl }),
        tokenProvider: new CookieTokenProvider({
            cookieName: config.tokenCookieName,
            readCookies: options.readCookies,
        }),
        renderer: options.renderer,
        views: options.views,
        config,
    });

    coordinator.initialize(options.flags);

    // Hidden views load on first show
    const loads = VIEW_KINDS
        .filter(kind => coordinator.hasView(kind) && coordinator.isVisible(kind))
        .map(kind => coordinator.load(kind));
    await Promise.all(loads);

    return coordinator;
}
