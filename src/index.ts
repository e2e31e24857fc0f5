/**
 * @fileoverview Value history - undo/redo for a single piece of application state
 */

export { HistoryManager } from './data/HistoryManager';
export type { HistoryManagerOptions } from './data/HistoryManager';
export { HistoryEngine, stateAfter } from './data/HistoryEngine';
export type { HistoryEngineOptions } from './data/HistoryEngine';
export { HistoryDiagnostics } from './core/HistoryDiagnostics';
export { DEFAULT_HISTORY_OPTIONS, DIAGNOSTIC_MESSAGES, LOG_PREFIX, MAX_HISTORY_SIZE } from './core/Constants';
export type { IHistoryManager, HistoryStateCallback } from './services/interfaces';
export type {
  Restorable,
  HistoryEntry,
  SingleEntry,
  GroupEntry,
  HistoryState,
  HistoryDiagnostic,
  HistoryDiagnosticCode,
  HistoryLogger,
  EqualityFn,
} from './types';
