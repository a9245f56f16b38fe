/**
 * @fileoverview Shared fixtures for dataset editor tests
 * @module tests/helpers/datasetFixtures
 *
 * In-process backends and a recording renderer; nothing here touches the
 * network.
 */

import { expect, vi } from 'vitest';
import type { ChangeSet, RowValues, TableRef } from '../../src/types';
import type { GridRenderRequest, IGridRenderer } from '../../src/services/interfaces';
import { InMemoryDataSource } from '../../src/data/sources/InMemoryDataSource';
import { DatasetSnapshot } from '../../src/data/DatasetSnapshot';

export const WIND_TABLE: TableRef = { schema: 'model_draft', table: 'wind' };
export const WIND_UNCHECKED: TableRef = { schema: '_model_draft', table: '_wind_insert' };

export const TEST_TOKEN = 'test-secret';

/**
 * Two published rows, used by most scenarios
 */
export function windRows(): RowValues[] {
  return [
    { id: 1, name: 'a', capacity: 2.5 },
    { id: 2, name: 'b', capacity: 3 },
  ];
}

/**
 * Backend with the published table and its unchecked twin seeded
 */
export function seededSource(options: { requiredToken?: string } = {}): InMemoryDataSource {
  const source = new InMemoryDataSource({ requiredToken: options.requiredToken });
  source.seed(WIND_TABLE, windRows());
  source.seed(WIND_UNCHECKED, [{ id: 10, name: 'pending', capacity: 1 }]);
  return source;
}

/**
 * Snapshot of WIND_TABLE, already fetched
 */
export async function loadedSnapshot(source: InMemoryDataSource = seededSource()): Promise<DatasetSnapshot> {
  const snapshot = new DatasetSnapshot({ table: WIND_TABLE, dataSource: source });
  await snapshot.fetch();
  return snapshot;
}

/**
 * Renderer that records every render request
 */
export class RecordingRenderer implements IGridRenderer<string> {
  readonly requests: GridRenderRequest<string>[] = [];
  readonly render = vi.fn((request: GridRenderRequest<string>) => {
    this.requests.push(request);
  });

  last(): GridRenderRequest<string> | undefined {
    return this.requests[this.requests.length - 1];
  }
}

/**
 * Assert that a change-set has nothing to submit
 */
export function expectEmptyChangeSet(changeSet: ChangeSet): void {
  expect(changeSet).toEqual({ creates: [], updates: [], deletes: [] });
}
