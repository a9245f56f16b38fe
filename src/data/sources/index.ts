/**
 * Data source variants, one per backend kind
 */
export { RestDataSource, type RestDataSourceOptions, type FetchFn } from './RestDataSource';
export { InMemoryDataSource, type InMemoryDataSourceOptions } from './InMemoryDataSource';
export { parseFetchedPage, parseSaveResponse } from './wire';
