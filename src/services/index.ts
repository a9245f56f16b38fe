/**
 * Services Index
 * 
 * Central export for all service modules.
 */

export { DualViewCoordinator, type DualViewCoordinatorOptions, type ViewSettings, type LoadOptions, type LoadOutcome, type SubmitOutcome } from './DualViewCoordinator';
export { DatasetView, type DatasetViewOptions } from './DatasetView';
export { SubmissionGateway, toSubmitPayload, type SubmissionGatewayOptions } from './SubmissionGateway';
export { CookieTokenProvider, StaticTokenProvider, type CookieTokenProviderOptions } from './AuthTokenProvider';
export { createDatasetEditor, type CreateDatasetEditorOptions } from './createDatasetEditor';

export type { IDataSource, ITokenProvider, IGridRenderer, GridRenderRequest, ISubmissionGateway, SubmitOptions } from './interfaces';
