/**
 * @fileoverview Service Interfaces - External I/O Boundaries
 * @module services/interfaces
 * 
 * Interfaces for services that cross external boundaries (backend, cookie
 * store, grid widget). Internal services (RowRecord, ChangeTracker, ...)
 * don't need interfaces - use their class types directly.
 */

export type { IDataSource } from './IDataSource';
export type { ITokenProvider } from './ITokenProvider';
export type { IGridRenderer, GridRenderRequest } from './IGridRenderer';
export type { ISubmissionGateway, SubmitOptions } from './ISubmissionGateway';
