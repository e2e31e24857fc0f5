/**
 * @fileoverview History manager - undo/redo of application state values
 * @module data/HistoryManager
 *
 * Wraps HistoryEngine with two recording modes:
 * - BUFFER: remembers the value at the start of a continuous interaction
 *   (dragging a slider) and records it only if the interaction changed anything
 * - GROUP: collects several pushes and commits them as one undo/redo unit
 *
 * Misuse (double open, unmatched close, nesting, empty undo/redo) never throws.
 * The call becomes a no-op and, when verbose, a diagnostic is logged.
 */

import { BehaviorSubject, Observable } from 'rxjs';
import type {
  EqualityFn,
  GroupEntry,
  HistoryDiagnostic,
  HistoryEntry,
  HistoryLogger,
  HistoryState,
  Restorable,
} from '../types';
import type { HistoryStateCallback, IHistoryManager } from '../services/interfaces/IHistoryManager';
import { DEFAULT_HISTORY_OPTIONS, isValidHistoryLimit } from '../core/Constants';
import { HistoryDiagnostics } from '../core/HistoryDiagnostics';
import { HistoryEngine, stateAfter } from './HistoryEngine';

/**
 * History manager options
 */
export interface HistoryManagerOptions<T> {
  /** Log misuse through `logger` and emit it on `diagnostics$` */
  verbose?: boolean;
  /** Equality for buffer collapse and duplicate skipping (default: Object.is) */
  equals?: EqualityFn<T>;
  /** State restored when undo empties the past stack */
  initial?: T;
  /** Oldest entries are dropped past this size (default: unbounded) */
  maxHistory?: number;
  /** Skip a push equal to the single entry on top of the past stack */
  skipDuplicates?: boolean;
  logger?: HistoryLogger;
  onStateChange?: HistoryStateCallback;
}

interface OpenBuffer<T> {
  snapshot: T;
}

interface OpenGroup<T> {
  values: T[];
  label?: string;
  /** Set by reopenGroup: the committed entry this group replaces on finish */
  reopened?: GroupEntry<T>;
}

/**
 * History manager for undo/redo of values
 *
 * Usage:
 * ```typescript
 * const history = new HistoryManager<Settings>({ initial: settings });
 *
 * history.push({ ...settings, volume: 3 });
 * history.undo(app);   // app.restore(settings)
 * history.redo(app);   // app.restore({ ...settings, volume: 3 })
 *
 * history.startGroup('Reset audio');
 * history.push(a);
 * history.push(b);
 * history.finishGroup();  // one undo reverts both
 * ```
 */
export class HistoryManager<T> implements IHistoryManager<T> {
  private readonly engine: HistoryEngine<T>;
  private readonly diagnostics: HistoryDiagnostics;
  private readonly equals: EqualityFn<T>;
  private readonly skipDuplicates: boolean;
  private readonly onStateChange?: HistoryStateCallback;

  private buffer: OpenBuffer<T> | null = null;
  private group: OpenGroup<T> | null = null;

  private readonly _state$: BehaviorSubject<HistoryState>;

  /**
   * @param options - Configuration
   * @throws RangeError if maxHistory is not a positive integer or Infinity
   */
  constructor(options: HistoryManagerOptions<T> = {}) {
    const maxHistory = options.maxHistory ?? DEFAULT_HISTORY_OPTIONS.maxHistory;
    if (!isValidHistoryLimit(maxHistory)) {
      throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
    }

    this.diagnostics = new HistoryDiagnostics(options.verbose ?? DEFAULT_HISTORY_OPTIONS.verbose, options.logger);
    this.engine = new HistoryEngine<T>({
      maxHistory,
      baseline: options.initial !== undefined ? { value: options.initial } : null,
      diagnostics: this.diagnostics,
    });
    this.equals = options.equals ?? Object.is;
    this.skipDuplicates = options.skipDuplicates ?? DEFAULT_HISTORY_OPTIONS.skipDuplicates;
    this.onStateChange = options.onStateChange;
    this._state$ = new BehaviorSubject<HistoryState>(this.buildState());
  }

  get state$(): Observable<HistoryState> {
    return this._state$.asObservable();
  }

  get diagnostics$(): Observable<HistoryDiagnostic> {
    return this.diagnostics.diagnostics$;
  }

  /**
   * Current state (synchronous access)
   */
  get currentState(): HistoryState {
    return this._state$.value;
  }

  // ==========================================================================
  // Recording
  // ==========================================================================

  push(value: T, label?: string): void {
    if (this.group) {
      this.group.values.push(value);
      return;
    }

    if (this.skipDuplicates) {
      const top = this.engine.peekUndo();
      if (top?.kind === 'single' && this.equals(stateAfter(top), value)) {
        this.diagnostics.report('duplicate');
        return;
      }
    }

    this.engine.commit({ kind: 'single', value, label });
    this._notifyStateChange();
  }

  startBuffer(current: T): void {
    if (this.buffer) {
      this.diagnostics.report('reentry', 'buffer');
      return;
    }
    if (this.group) {
      this.diagnostics.report('nesting-violation', 'buffer');
      return;
    }

    this.buffer = { snapshot: current };
    this._notifyStateChange();
  }

  finishBuffer(finalValue: T): boolean {
    const buffer = this.buffer;
    if (!buffer) {
      this.diagnostics.report('unmatched-close', 'buffer');
      return false;
    }

    this.buffer = null;

    if (this.equals(buffer.snapshot, finalValue)) {
      this.diagnostics.report('no-change', 'buffer');
      this._notifyStateChange();
      return false;
    }

    // Bypasses push: a changed value is always recorded, duplicates or not
    this.engine.commit({ kind: 'single', value: buffer.snapshot, after: finalValue });
    this._notifyStateChange();
    return true;
  }

  cancelBuffer(): void {
    if (!this.buffer) {
      this.diagnostics.report('unmatched-close', 'buffer');
      return;
    }
    this.buffer = null;
    this._notifyStateChange();
  }

  startGroup(label?: string): void {
    if (this.group) {
      this.diagnostics.report('reentry', 'group');
      return;
    }
    if (this.buffer) {
      this.diagnostics.report('nesting-violation', 'group');
      return;
    }

    this.group = { values: [], label };
    this._notifyStateChange();
  }

  finishGroup(): boolean {
    const group = this.group;
    if (!group) {
      this.diagnostics.report('unmatched-close', 'group');
      return false;
    }

    this.group = null;

    if (group.values.length === 0) {
      this.diagnostics.report('empty-group', 'group');
      this._notifyStateChange();
      return false;
    }

    if (group.reopened && this.engine.peekUndo() === group.reopened) {
      this.engine.takeLast();
    }
    this.engine.commit({ kind: 'group', values: group.values, label: group.label });
    this._notifyStateChange();
    return true;
  }

  cancelGroup(): void {
    if (!this.group) {
      this.diagnostics.report('unmatched-close', 'group');
      return;
    }
    this.group = null;
    this._notifyStateChange();
  }

  reopenGroup(): boolean {
    if (this.group) {
      this.diagnostics.report('reentry', 'group');
      return false;
    }
    if (this.buffer) {
      this.diagnostics.report('nesting-violation', 'group');
      return false;
    }

    const top = this.engine.peekUndo();
    if (!top || top.kind !== 'group') {
      this.diagnostics.report('not-a-group', 'group');
      return false;
    }

    this.group = { values: [...top.values], label: top.label, reopened: top };
    this._notifyStateChange();
    return true;
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  undo(target: Restorable<T>): boolean {
    this.settleRecordings('undo');
    const restored = this.engine.undo(target);
    this._notifyStateChange();
    return restored;
  }

  redo(target: Restorable<T>): boolean {
    this.settleRecordings('redo');
    const restored = this.engine.redo(target);
    this._notifyStateChange();
    return restored;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  canUndo(): boolean {
    return this.engine.canUndo();
  }

  canRedo(): boolean {
    return this.engine.canRedo();
  }

  isBuffering(): boolean {
    return this.buffer !== null;
  }

  isInGroup(): boolean {
    return this.group !== null;
  }

  getBuffer(): T | undefined {
    return this.buffer?.snapshot;
  }

  getUndoLabel(): string | undefined {
    return this.engine.peekUndo()?.label;
  }

  getRedoLabel(): string | undefined {
    return this.engine.peekRedo()?.label;
  }

  getPast(): readonly HistoryEntry<T>[] {
    return this.engine.getPast();
  }

  getFuture(): readonly HistoryEntry<T>[] {
    return this.engine.getFuture();
  }

  isEmpty(): boolean {
    return this.engine.isEmpty();
  }

  setVerbose(verbose: boolean): void {
    this.diagnostics.setEnabled(verbose);
  }

  /**
   * Clear all history.
   * An open group is committed first, so it is cleared along with the rest.
   */
  clear(): void {
    this.settleRecordings('clear');
    this.engine.clear();
    this._notifyStateChange();
  }

  destroy(): void {
    this._state$.complete();
    this.diagnostics.complete();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Close anything left open before the stacks move.
   * A forgotten group is committed; a buffer snapshot would be stale, so it is dropped.
   */
  private settleRecordings(operation: string): void {
    if (this.group) {
      this.diagnostics.report('unclosed-group', operation);
      this.finishGroup();
    }
    if (this.buffer) {
      this.diagnostics.report('discarded-buffer', operation);
      this.buffer = null;
    }
  }

  private buildState(): HistoryState {
    return {
      canUndo: this.engine.canUndo(),
      canRedo: this.engine.canRedo(),
      undoCount: this.engine.undoDepth,
      redoCount: this.engine.redoDepth,
      undoLabel: this.getUndoLabel(),
      redoLabel: this.getRedoLabel(),
      isBuffering: this.isBuffering(),
      isGrouping: this.isInGroup(),
    };
  }

  /**
   * Notify subscribers of state changes
   * @private
   */
  private _notifyStateChange(): void {
    const state = this.buildState();
    this._state$.next(state);
    if (this.onStateChange) {
      this.onStateChange(state);
    }
  }
}
