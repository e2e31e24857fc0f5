// =============================================================================
// CORE TYPES - Value History
// =============================================================================

/**
 * Capability supplied by the application that owns the recorded state.
 * The history calls `restore` during undo/redo to re-apply a stored value.
 */
export interface Restorable<T> {
  restore(value: T): void;
}

/**
 * One value committed on its own.
 * A buffered entry also carries the state its interaction ended on: undoing
 * the entry restores `value`, redoing it restores `after`.
 */
export interface SingleEntry<T> {
  kind: 'single';
  value: T;
  after?: T;
  /** Human-readable label (e.g., "Rename Layer") */
  label?: string;
}

/**
 * Several values committed as one undo/redo unit.
 * Values are kept in push order.
 */
export interface GroupEntry<T> {
  kind: 'group';
  values: readonly T[];
  label?: string;
}

/**
 * Unit stored on the past/future stacks
 */
export type HistoryEntry<T> = SingleEntry<T> | GroupEntry<T>;

/**
 * Snapshot of the history published after each change
 */
export interface HistoryState {
  canUndo: boolean;
  canRedo: boolean;
  /** Entries on the past stack */
  undoCount: number;
  /** Entries on the future stack */
  redoCount: number;
  undoLabel?: string;
  redoLabel?: string;
  isBuffering: boolean;
  isGrouping: boolean;
}

/**
 * Misuse and informational conditions reported through the diagnostic channel
 * - reentry: a buffer/group was opened while the same mode was already open
 * - unmatched-close: finish/cancel with nothing open
 * - nesting-violation: buffer inside group, or group inside buffer
 * - empty-undo / empty-redo: nothing to traverse
 * - unclosed-group: an open group was committed by undo/redo/clear
 * - discarded-buffer: an open buffer was dropped by undo/redo/clear
 * - empty-group: a group was finished without any values
 * - no-change: a buffer finished with a value equal to its snapshot
 * - not-a-group: reopenGroup found no group entry on top of the past stack
 * - duplicate: a push was skipped because it matched the top entry
 */
export type HistoryDiagnosticCode =
  | 'reentry'
  | 'unmatched-close'
  | 'nesting-violation'
  | 'empty-undo'
  | 'empty-redo'
  | 'unclosed-group'
  | 'discarded-buffer'
  | 'empty-group'
  | 'no-change'
  | 'not-a-group'
  | 'duplicate';

export interface HistoryDiagnostic {
  code: HistoryDiagnosticCode;
  message: string;
}

/**
 * Where diagnostics are written when enabled
 */
export type HistoryLogger = Pick<Console, 'warn'>;

/**
 * Equality used for buffer collapse and duplicate skipping
 */
export type EqualityFn<T> = (a: T, b: T) => boolean;
