/**
 * @fileoverview DatasetView - one view slot (main or unchecked)
 * @module services/DatasetView
 *
 * Bundles a snapshot with its change tracker and owns the view's lifecycle
 * status. The status machine:
 *
 *   unloaded → loading → loaded ⇄ dirty → submitting → loaded
 *              loading → fetch-failed → unloaded (or loaded/dirty, if a page remains)
 *                        submitting → submit-failed → dirty
 *
 * At most one network operation runs per view; `isBusy` guards it.
 */

import { BehaviorSubject, Subscription } from 'rxjs';
import type { ViewKind, ViewStatus } from '../types';
import { BUSY_STATUSES } from '../core/Constants';
import { ChangeTracker } from '../data/ChangeTracker';
import type { DatasetSnapshot } from '../data/DatasetSnapshot';

/**
 * Legal status transitions
 */
const TRANSITIONS: Readonly<Record<ViewStatus, readonly ViewStatus[]>> = Object.freeze({
    'unloaded': ['loading'],
    'loading': ['loaded', 'fetch-failed'],
    'fetch-failed': ['unloaded', 'loaded', 'dirty'],
    'loaded': ['dirty', 'loading'],
    'dirty': ['loaded', 'loading', 'submitting'],
    'submitting': ['loaded', 'dirty', 'submit-failed'],
    'submit-failed': ['dirty', 'loaded'],
});

/**
 * Dataset view options
 */
export interface DatasetViewOptions<TContainer = unknown> {
    kind: ViewKind;
    snapshot: DatasetSnapshot;
    /** Render target handed to the grid renderer */
    container: TContainer;
    editable?: boolean;
    visible?: boolean;
}

export class DatasetView<TContainer = unknown> {
    readonly kind: ViewKind;
    readonly snapshot: DatasetSnapshot;
    readonly tracker: ChangeTracker;
    readonly container: TContainer;
    readonly editable: boolean;

    /** Lifecycle status stream */
    public readonly status$ = new BehaviorSubject<ViewStatus>('unloaded');

    private _visible: boolean;
    private _alive: boolean = true;
    private readonly subscription: Subscription;

    constructor(options: DatasetViewOptions<TContainer>) {
        this.kind = options.kind;
        this.snapshot = options.snapshot;
        this.tracker = new ChangeTracker(options.snapshot);
        this.container = options.container;
        this.editable = options.editable ?? true;
        this._visible = options.visible ?? true;

        // Grid edits flip loaded ⇄ dirty
        this.subscription = this.snapshot.changes$.subscribe(() => this.refreshDirtyState());
    }

    // =========================================================================
    // STATE
    // =========================================================================

    get status(): ViewStatus {
        return this.status$.value;
    }

    /**
     * True while a fetch or submit is outstanding
     */
    get isBusy(): boolean {
        return BUSY_STATUSES.has(this.status);
    }

    /**
     * False once the view was torn down; late network callbacks must check it
     */
    get isAlive(): boolean {
        return this._alive;
    }

    get isVisible(): boolean {
        return this._visible;
    }

    setVisible(visible: boolean): void {
        this._visible = visible;
    }

    /**
     * Move to a new status
     * @returns false (and logs) when the transition is not allowed
     */
    transition(next: ViewStatus): boolean {
        if (!this._alive) return false;
        const current = this.status;
        if (current === next) return true;
        if (!TRANSITIONS[current].includes(next)) {
            console.warn(`[DatasetView:${this.kind}] Illegal transition ${current} → ${next}`);
            return false;
        }
        this.status$.next(next);
        return true;
    }

    /**
     * Settle on loaded or dirty from the tracker's current contents
     */
    settle(): void {
        this.transition(this.tracker.isEmpty() ? 'loaded' : 'dirty');
    }

    /**
     * Re-derive loaded/dirty after an edit; other statuses are left alone
     */
    refreshDirtyState(): void {
        if (this.status === 'loaded' || this.status === 'dirty') {
            this.settle();
        }
    }

    // =========================================================================
    // LIFECYCLE
    // =========================================================================

    dispose(): void {
        if (!this._alive) return;
        this._alive = false;
        this.subscription.unsubscribe();
        this.snapshot.dispose();
        this.status$.complete();
    }
}
