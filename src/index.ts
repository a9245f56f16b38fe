/**
 * @fileoverview Public API of the dataset editor core
 * @module dataset-editor-core
 */

export * from './types';
export * from './core/Constants';
export * from './core/errors';
export { resolveEditorConfig, DEFAULT_EDITOR_CONFIG, type EditorConfig, type EditorConfigOverrides } from './core/EditorConfig';
export { resolveUncheckedTable, qualifiedName, DEFAULT_UNCHECKED_NAMING, type UncheckedNamingConfig } from './core/UncheckedTableNaming';
export { RowRecord, type RowRecordOptions, type RowChangeEvent, type RowChangeType, type DeleteOutcome } from './data/RowRecord';
export { DatasetSnapshot, type DatasetSnapshotOptions } from './data/DatasetSnapshot';
export { ChangeTracker, collectRowFailures, type ReconcileReport } from './data/ChangeTracker';
export * from './data/sources';
export * from './services';
export { deepEqual } from './utils/deepEqual';
