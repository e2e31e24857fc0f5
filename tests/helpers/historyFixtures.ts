/**
 * @fileoverview Shared fixtures for history tests
 * @module tests/helpers/historyFixtures
 *
 * A small two-field project that restores whole snapshots, plus a spy
 * target that records every value handed to `restore`.
 */

import { vi } from 'vitest';
import type { HistoryEntry, Restorable } from '../../src/types';

/**
 * Plain snapshot of the sample project
 */
export interface ProjectState {
  a: number;
  b: number;
}

/**
 * Sample application object owning the state under history
 */
export class Project implements Restorable<ProjectState> {
  a: number;
  b: number;

  constructor(a = 5, b = 1) {
    this.a = a;
    this.b = b;
  }

  snapshot(): ProjectState {
    return { a: this.a, b: this.b };
  }

  restore(value: ProjectState): void {
    this.a = value.a;
    this.b = value.b;
  }
}

export const sameProjectState = (x: ProjectState, y: ProjectState): boolean =>
  x.a === y.a && x.b === y.b;

/**
 * Restorable spy that keeps restored values in call order
 */
export function createRecordingTarget<T>() {
  const restored: T[] = [];
  const restore = vi.fn((value: T) => {
    restored.push(value);
  });
  const target: Restorable<T> = { restore };
  return { target, restore, restored };
}

/**
 * Flatten entries for readable assertions: singles become their value,
 * groups become an array of their values.
 */
export function entryValues<T>(entries: readonly HistoryEntry<T>[]): Array<T | T[]> {
  return entries.map(entry => (entry.kind === 'single' ? entry.value : [...entry.values]));
}
