// =============================================================================
// CORE TYPES - Dataset Editor
// =============================================================================

/**
 * A single cell value as it travels over the wire.
 * Geometry columns arrive already translated to a structured (GeoJSON-like)
 * value and are treated as any other JSON value.
 */
export type CellValue =
  | string
  | number
  | boolean
  | null
  | CellValue[]
  | { [key: string]: CellValue };

/**
 * Row values keyed by column name
 */
export type RowValues = Record<string, CellValue>;

/**
 * Key issued by the backend for a persisted row
 */
export type PersistedRowKey = string | number;

/**
 * Any row key: persisted, or a local placeholder for an unsaved create
 */
export type RowKey = PersistedRowKey;

/**
 * Schema-qualified table reference
 */
export interface TableRef {
  schema: string;
  table: string;
}

/**
 * Which of the two dataset slots a view occupies
 * - main: the published (checked) table
 * - unchecked: the pending-review twin
 */
export type ViewKind = 'main' | 'unchecked';

/**
 * Per-view lifecycle status
 *
 * unloaded → loading → loaded ⇄ dirty → submitting → loaded
 * loading → fetch-failed → unloaded
 * submitting → submit-failed → dirty
 */
export type ViewStatus =
  | 'unloaded'
  | 'loading'
  | 'fetch-failed'
  | 'loaded'
  | 'dirty'
  | 'submitting'
  | 'submit-failed';

/**
 * Row change-tracking status (for renderer styling)
 */
export type RowStatus = 'new' | 'edited' | 'deleted' | null;

/**
 * Table-level flags supplied by the hosting page
 */
export interface TableFlags {
  /** Whether a pending-review twin exists for this table */
  hasUncheckedTwin: boolean;
  /** Render hint: rows carry comments */
  hasRowComments?: boolean;
}

// =============================================================================
// PAGING
// =============================================================================

/**
 * Window of rows requested from the backend
 */
export interface PageRequest {
  offset: number;
  limit: number;
}

/**
 * One page of rows returned by a data source
 */
export interface FetchedPage {
  rows: RowValues[];
  /** Total number of rows in the table (all pages) */
  totalCount: number;
}

// =============================================================================
// CHANGE-SET
// =============================================================================

/**
 * A row created locally and not yet saved
 */
export interface RowCreate {
  /** Placeholder key assigned by the snapshot */
  localKey: string;
  values: RowValues;
}

/**
 * Changed fields of a persisted row
 */
export interface RowUpdate {
  key: PersistedRowKey;
  changed: RowValues;
}

/**
 * A persisted row marked for deletion
 */
export interface RowDelete {
  key: PersistedRowKey;
}

/**
 * Minimal set of changes against a snapshot, each list in snapshot row order
 */
export interface ChangeSet {
  creates: RowCreate[];
  updates: RowUpdate[];
  deletes: RowDelete[];
}

// =============================================================================
// SUBMISSION WIRE FORMAT
// =============================================================================

/**
 * Body sent to the submission endpoint
 */
export interface SubmitPayload {
  creates: RowValues[];
  updates: Array<{ key: PersistedRowKey; changedFields: RowValues }>;
  deletes: PersistedRowKey[];
  /** Optional commit message stored with the change */
  message?: string;
}

/**
 * Outcome for one created row; `key` is set on success
 */
export interface CreateOutcome {
  localKey: string;
  key?: PersistedRowKey;
  success: boolean;
  message?: string;
}

/**
 * Outcome for one updated or deleted row
 */
export interface RowOutcome {
  key: PersistedRowKey;
  success: boolean;
  message?: string;
}

/**
 * Per-item result of a submission
 */
export interface SubmissionResult {
  creates: CreateOutcome[];
  updates: RowOutcome[];
  deletes: RowOutcome[];
}

/**
 * What a data source answers to a save: create outcomes are positional,
 * in the order of `SubmitPayload.creates`
 */
export interface SaveResponse {
  creates: Array<{ key?: PersistedRowKey; success: boolean; message?: string }>;
  updates: RowOutcome[];
  deletes: RowOutcome[];
}

/**
 * A single row the backend refused
 */
export interface RowFailure {
  kind: 'create' | 'update' | 'delete';
  key: RowKey;
  message: string;
}

// =============================================================================
// USER-VISIBLE MESSAGES
// =============================================================================

export type MessageLevel = 'info' | 'success' | 'warning' | 'error';

/**
 * Notice surfaced to the page (toast, banner, ...)
 */
export interface ViewMessage {
  view: ViewKind;
  level: MessageLevel;
  text: string;
  /** Per-row failures, when the backend reported any */
  rowFailures?: RowFailure[];
}

/**
 * Callback function type
 */
export type Callback<T = void> = (value: T) => void;
