/**
 * @fileoverview Dual-View Coordinator
 * @module services/DualViewCoordinator
 *
 * Runs the published ("main") view of a table and, when the table has one,
 * its pending-review ("unchecked") twin. Each view has its own snapshot,
 * tracker, status and busy flag; the two never share row records.
 *
 * Fetch and submit failures stop here: they become entries on `messages$`
 * and never propagate to the page.
 *
 * ARCHITECTURE:
 *   IDataSource ──► DatasetSnapshot ──► IGridRenderer (edits flow back
 *                        │                 through RowRecord)
 *                   ChangeTracker ──► ISubmissionGateway ──► IDataSource
 */

import { Subject } from 'rxjs';
import type { PageRequest, TableFlags, TableRef, ViewKind, ViewMessage } from '../types';
import type { IDataSource, IGridRenderer, ISubmissionGateway, ITokenProvider, SubmitOptions } from './interfaces';
import { VIEW_KINDS, VIEW_LABELS } from '../core/Constants';
import { resolveEditorConfig, type EditorConfig } from '../core/EditorConfig';
import { SubmitError, extractErrorMessage } from '../core/errors';
import { resolveUncheckedTable } from '../core/UncheckedTableNaming';
import type { ReconcileReport } from '../data/ChangeTracker';
import { DatasetSnapshot } from '../data/DatasetSnapshot';
import { DatasetView } from './DatasetView';
import { SubmissionGateway } from './SubmissionGateway';

/**
 * How a load request ended
 */
export type LoadOutcome = 'loaded' | 'failed' | 'busy' | 'has-changes' | 'no-view' | 'abandoned';

/**
 * How a submit request ended
 */
export type SubmitOutcome = 'submitted' | 'empty' | 'failed' | 'busy' | 'not-loaded' | 'no-view' | 'abandoned';

/**
 * Per-view settings
 */
export interface ViewSettings<TContainer> {
    container: TContainer;
    editable?: boolean;
    /** Backend for this view; defaults to the coordinator's dataSource */
    dataSource?: IDataSource;
    /** Gateway for this view; defaults to one built on the view's data source */
    gateway?: ISubmissionGateway;
}

/**
 * Dual-view coordinator options
 */
export interface DualViewCoordinatorOptions<TContainer> {
    /** The published table */
    table: TableRef;
    dataSource: IDataSource;
    tokenProvider: ITokenProvider;
    renderer: IGridRenderer<TContainer>;
    views: {
        main: ViewSettings<TContainer>;
        unchecked?: ViewSettings<TContainer>;
    };
    config?: EditorConfig;
}

/**
 * Load options
 */
export interface LoadOptions extends Partial<PageRequest> {
    /** Reload even though the view holds unsubmitted changes */
    discardChanges?: boolean;
}

export class DualViewCoordinator<TContainer = unknown> {
    /** User-visible notices (errors, confirmations) */
    public readonly messages$ = new Subject<ViewMessage>();

    private readonly options: DualViewCoordinatorOptions<TContainer>;
    private readonly config: EditorConfig;
    private readonly views = new Map<ViewKind, DatasetView<TContainer>>();
    private readonly gateways = new Map<ViewKind, ISubmissionGateway>();
    private _isDisposed = false;

    constructor(options: DualViewCoordinatorOptions<TContainer>) {
        this.options = options;
        this.config = options.config ?? resolveEditorConfig();
    }

    // =========================================================================
    // INITIALIZATION
    // =========================================================================

    /**
     * Build the views for the table. The unchecked view exists only when the
     * page says the table has a pending-review twin; its table name is
     * resolved here, once, from the naming configuration.
     */
    initialize(flags: TableFlags): void {
        this.teardownViews();

        this.createView('main', this.options.table, this.options.views.main, flags);

        if (flags.hasUncheckedTwin) {
            const settings = this.options.views.unchecked;
            if (!settings) {
                console.warn('[DualViewCoordinator] Table has an unchecked twin but no container was configured for it');
            } else {
                const twin = resolveUncheckedTable(this.options.table, this.config.uncheckedNaming);
                this.createView('unchecked', twin, settings, flags);
            }
        }

        console.log(
            `[DualViewCoordinator] Initialized ${this.options.table.schema}.${this.options.table.table} ` +
            `with views: ${[...this.views.keys()].join(', ')}`
        );
    }

    private createView(kind: ViewKind, table: TableRef, settings: ViewSettings<TContainer>, flags: TableFlags): void {
        const dataSource = settings.dataSource ?? this.options.dataSource;
        const snapshot = new DatasetSnapshot({
            table,
            dataSource,
            keyColumn: this.config.keyColumn,
            pageSize: this.config.pageSize,
            hasRowComments: flags.hasRowComments ?? false,
        });
        this.views.set(kind, new DatasetView({
            kind,
            snapshot,
            container: settings.container,
            editable: settings.editable ?? true,
            visible: this.config.initiallyVisible[kind],
        }));
        this.gateways.set(
            kind,
            settings.gateway ?? new SubmissionGateway({ dataSource, tokenProvider: this.options.tokenProvider })
        );
    }

    // =========================================================================
    // ACCESSORS
    // =========================================================================

    getView(kind: ViewKind): DatasetView<TContainer> | undefined {
        return this.views.get(kind);
    }

    hasView(kind: ViewKind): boolean {
        return this.views.has(kind);
    }

    get isDisposed(): boolean {
        return this._isDisposed;
    }

    // =========================================================================
    // VISIBILITY
    // =========================================================================

    isVisible(kind: ViewKind): boolean {
        return this.views.get(kind)?.isVisible ?? false;
    }

    /**
     * Show or hide a view. Showing a view that was never loaded loads it;
     * otherwise it is re-rendered.
     */
    async setVisible(kind: ViewKind, visible: boolean): Promise<void> {
        const view = this.views.get(kind);
        if (!view) return;
        view.setVisible(visible);
        if (!visible) return;

        if (view.status === 'unloaded') {
            await this.load(kind);
        } else {
            this.render(kind);
        }
    }

    async toggleVisible(kind: ViewKind): Promise<boolean> {
        const next = !this.isVisible(kind);
        await this.setVisible(kind, next);
        return next;
    }

    // =========================================================================
    // LOAD
    // =========================================================================

    /**
     * Fetch a page into a view. Refused while the view is busy, and while it
     * holds unsubmitted changes unless `discardChanges` is set.
     */
    async load(kind: ViewKind, options: LoadOptions = {}): Promise<LoadOutcome> {
        const view = this.views.get(kind);
        if (!view) return 'no-view';

        if (view.isBusy) {
            console.warn(`[DualViewCoordinator] ${kind} is busy (${view.status}); load ignored`);
            return 'busy';
        }
        if (view.status === 'dirty' && !options.discardChanges) {
            this.notify(kind, 'warning', 'Submit or discard your changes before loading other rows');
            return 'has-changes';
        }

        view.transition('loading');
        try {
            await view.snapshot.fetch({ offset: options.offset, limit: options.limit });
        } catch (error) {
            if (!view.isAlive) return 'abandoned';
            console.error(`[DualViewCoordinator] Fetch failed for ${kind}:`, error);
            view.transition('fetch-failed');
            if (view.snapshot.isLoaded) {
                // The previous page (and any edits on it) is still in place
                view.settle();
            } else {
                view.transition('unloaded');
            }
            this.notify(kind, 'error', `Could not load ${VIEW_LABELS[kind].toLowerCase()}: ${extractErrorMessage(error)}`);
            return 'failed';
        }

        if (!view.isAlive) return 'abandoned';
        view.transition('loaded');
        this.renderIfVisible(kind);
        return 'loaded';
    }

    // =========================================================================
    // RENDER
    // =========================================================================

    /**
     * Hand the view's rows to the grid renderer. Safe to call repeatedly.
     */
    render(kind: ViewKind): boolean {
        const view = this.views.get(kind);
        if (!view || !view.isAlive) return false;

        this.options.renderer.render({
            view: kind,
            rows: view.snapshot.rows(),
            editable: view.editable,
            container: view.container,
            tracker: view.tracker,
        });
        return true;
    }

    /**
     * Render every visible view
     */
    renderAll(): void {
        for (const kind of VIEW_KINDS) {
            this.renderIfVisible(kind);
        }
    }

    private renderIfVisible(kind: ViewKind): void {
        if (this.isVisible(kind)) {
            this.render(kind);
        }
    }

    // =========================================================================
    // SUBMIT
    // =========================================================================

    /**
     * Submit a view's pending changes. An empty change-set never reaches the
     * gateway. On failure the changes stay in place for a retry.
     */
    async submit(kind: ViewKind, options: SubmitOptions = {}): Promise<SubmitOutcome> {
        const view = this.views.get(kind);
        const gateway = this.gateways.get(kind);
        if (!view || !gateway) return 'no-view';

        if (view.isBusy) {
            console.warn(`[DualViewCoordinator] ${kind} is busy (${view.status}); submit ignored`);
            return 'busy';
        }

        if (view.status === 'unloaded') {
            console.warn(`[DualViewCoordinator] ${kind} is not loaded; submit ignored`);
            return 'not-loaded';
        }

        const changeSet = view.tracker.changeSet();
        if (view.tracker.isEmpty()) {
            console.log(`[DualViewCoordinator] Nothing to submit for ${kind}`);
            return 'empty';
        }

        if (!view.transition('submitting')) {
            return 'busy';
        }
        view.tracker.beginSubmission(changeSet);

        let report: ReconcileReport;
        try {
            const result = await gateway.submit(view.snapshot.table, changeSet, options);
            if (!view.isAlive) return 'abandoned';
            report = view.tracker.reconcile(changeSet, result);
        } catch (error) {
            if (!view.isAlive) return 'abandoned';
            console.error(`[DualViewCoordinator] Submit failed for ${kind}:`, error);
            view.tracker.endSubmission();
            view.transition('submit-failed');
            view.settle();
            this.notify(
                kind,
                'error',
                `Saving failed: ${extractErrorMessage(error)}`,
                error instanceof SubmitError && error.isPartial() ? error.rowFailures : undefined
            );
            return 'failed';
        }

        view.tracker.endSubmission();
        view.settle();
        if (report.inconsistencies.length > 0) {
            this.notify(
                kind,
                'warning',
                `${report.inconsistencies.length} row(s) could not be matched to the saved result and are still pending`
            );
        } else {
            this.notify(kind, 'success', `Saved ${report.created + report.updated + report.deleted} row(s)`);
        }
        this.render(kind);
        return 'submitted';
    }

    // =========================================================================
    // DISCARD
    // =========================================================================

    /**
     * Throw away a view's pending changes
     */
    discard(kind: ViewKind): boolean {
        const view = this.views.get(kind);
        if (!view || view.isBusy) return false;
        view.tracker.discardAll();
        view.refreshDirtyState();
        this.renderIfVisible(kind);
        return true;
    }

    // =========================================================================
    // LIFECYCLE
    // =========================================================================

    /**
     * Tear down both views. Responses still in flight are dropped.
     */
    dispose(): void {
        if (this._isDisposed) return;
        this._isDisposed = true;
        this.teardownViews();
        this.messages$.complete();
        console.log('[DualViewCoordinator] Disposed');
    }

    private teardownViews(): void {
        for (const view of this.views.values()) {
            view.dispose();
        }
        this.views.clear();
        this.gateways.clear();
    }

    private notify(kind: ViewKind, level: ViewMessage['level'], text: string, rowFailures?: ViewMessage['rowFailures']): void {
        if (this._isDisposed) return;
        const message: ViewMessage = { view: kind, level, text };
        if (rowFailures) {
            message.rowFailures = rowFailures;
        }
        this.messages$.next(message);
    }
}
