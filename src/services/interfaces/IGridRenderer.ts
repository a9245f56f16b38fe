/**
 * @fileoverview IGridRenderer Interface
 * @module services/interfaces/IGridRenderer
 * 
 * The grid widget the core renders into. The renderer calls back into the
 * core through the row records (setField / markDeleted) and the tracker's
 * snapshot (addRow); it receives those collaborators as parameters and
 * never looks them up globally.
 */

import type { ChangeTracker } from '../../data/ChangeTracker';
import type { RowRecord } from '../../data/RowRecord';
import type { ViewKind } from '../../types';

/**
 * Everything a renderer needs for one view
 */
export interface GridRenderRequest<TContainer = unknown> {
    view: ViewKind;
    /** Rows in display order; soft-deleted rows included */
    rows: readonly RowRecord[];
    /** Whether cells accept edits */
    editable: boolean;
    /** Render target (DOM element, virtual container, ...) */
    container: TContainer;
    /** Change tracker of this view; doubles as the row mirror store */
    tracker: ChangeTracker;
}

export interface IGridRenderer<TContainer = unknown> {
    render(request: GridRenderRequest<TContainer>): void;
}
