/**
 * @fileoverview Structural equality for cell values
 * @module utils/deepEqual
 */

import type { CellValue } from '../types';

function isRecord(value: CellValue): value is { [key: string]: CellValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function areArraysEqual(a: CellValue[], b: CellValue[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (!deepEqual(a[i], b[i])) {
      return false;
    }
  }
  return true;
}

function areObjectsEqual(a: { [key: string]: CellValue }, b: { [key: string]: CellValue }): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);

  if (keysA.length !== keysB.length) {
    return false;
  }

  for (const key of keysA) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) {
      return false;
    }
    if (!deepEqual(a[key], b[key])) {
      return false;
    }
  }

  return true;
}

/**
 * Compare two cell values by content (geometry objects, arrays, scalars)
 */
export function deepEqual(a: CellValue | undefined, b: CellValue | undefined): boolean {
  if (Object.is(a, b)) {
    return true;
  }

  // 0 and -0 are the same cell value
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b;
  }

  if (a === undefined || b === undefined || a === null || b === null) {
    return false;
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return areArraysEqual(a, b);
  }

  if (isRecord(a) && isRecord(b)) {
    return areObjectsEqual(a, b);
  }

  return false;
}

/**
 * Deep copy of row values, so snapshots never alias caller objects
 */
export function cloneValue<T extends CellValue>(value: T): T {
  return structuredClone(value);
}
