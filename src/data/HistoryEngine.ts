/**
 * @fileoverview History engine - past/future stacks and traversal
 * @module data/HistoryEngine
 *
 * The top of the past stack is the state the application currently shows:
 * - Undo moves the top entry to the future stack and restores the new top
 * - Redo moves the top future entry back and restores it
 * - Any commit while the future stack holds entries discards them
 *
 * Group entries are restored value by value in push order, for undo and redo
 * alike, so the group's last value is the one left applied.
 *
 * A buffered entry holds both ends of its interaction. Undoing it restores the
 * pre-interaction value directly; landing on it restores the final value.
 */

import type { HistoryEntry, Restorable, SingleEntry } from '../types';

/**
 * State the application shows while a single entry is on top of the past stack
 */
export function stateAfter<T>(entry: SingleEntry<T>): T {
  return entry.after !== undefined ? entry.after : entry.value;
}
import type { HistoryDiagnostics } from '../core/HistoryDiagnostics';

/**
 * History engine options
 */
export interface HistoryEngineOptions<T> {
  maxHistory: number;
  /** State restored when undo empties the past stack */
  baseline: { value: T } | null;
  diagnostics: HistoryDiagnostics;
}

export class HistoryEngine<T> {
  private past: HistoryEntry<T>[] = [];
  private future: HistoryEntry<T>[] = [];
  private readonly maxHistory: number;
  private readonly baseline: { value: T } | null;
  private readonly diagnostics: HistoryDiagnostics;
  /** Set once the history limit has dropped an entry; the baseline is stale from then on */
  private truncated = false;

  constructor(options: HistoryEngineOptions<T>) {
    this.maxHistory = options.maxHistory;
    this.baseline = options.baseline;
    this.diagnostics = options.diagnostics;
  }

  /**
   * Append an entry to the past stack.
   * Clears the future stack if it holds anything.
   */
  commit(entry: HistoryEntry<T>): void {
    this.past.push(entry);

    if (this.future.length > 0) {
      this.future = []; // Clear redo on new entry
    }

    // Limit history size
    if (this.past.length > this.maxHistory) {
      this.past.shift();
      this.truncated = true;
    }
  }

  /**
   * Step back one entry
   * @returns True if `target.restore` was called
   */
  undo(target: Restorable<T>): boolean {
    const entry = this.past.pop();
    if (!entry) {
      this.diagnostics.report('empty-undo');
      return false;
    }

    this.future.push(entry);

    if (entry.kind === 'single' && entry.after !== undefined) {
      target.restore(entry.value);
      return true;
    }

    const current = this.peekUndo();
    if (current) {
      this.apply(current, target);
      return true;
    }

    if (this.baseline && !this.truncated) {
      target.restore(this.baseline.value);
      return true;
    }

    return false;
  }

  /**
   * Step forward one entry
   * @returns True if `target.restore` was called
   */
  redo(target: Restorable<T>): boolean {
    const entry = this.future.pop();
    if (!entry) {
      this.diagnostics.report('empty-redo');
      return false;
    }

    this.past.push(entry);
    this.apply(entry, target);
    return true;
  }

  /**
   * Remove and return the top past entry without restoring anything.
   * Used to reopen a committed group.
   */
  takeLast(): HistoryEntry<T> | undefined {
    return this.past.pop();
  }

  canUndo(): boolean {
    return this.past.length > 0;
  }

  canRedo(): boolean {
    return this.future.length > 0;
  }

  get undoDepth(): number {
    return this.past.length;
  }

  get redoDepth(): number {
    return this.future.length;
  }

  /**
   * Entry on top of the past stack (the current state)
   */
  peekUndo(): HistoryEntry<T> | undefined {
    return this.past.length > 0 ? this.past[this.past.length - 1] : undefined;
  }

  /**
   * Entry the next redo would restore
   */
  peekRedo(): HistoryEntry<T> | undefined {
    return this.future.length > 0 ? this.future[this.future.length - 1] : undefined;
  }

  getPast(): readonly HistoryEntry<T>[] {
    return [...this.past];
  }

  getFuture(): readonly HistoryEntry<T>[] {
    return [...this.future];
  }

  isEmpty(): boolean {
    return this.past.length === 0 && this.future.length === 0;
  }

  clear(): void {
    this.past = [];
    this.future = [];
    this.truncated = false;
  }

  private apply(entry: HistoryEntry<T>, target: Restorable<T>): void {
    if (entry.kind === 'single') {
      target.restore(stateAfter(entry));
      return;
    }
    for (const value of entry.values) {
      target.restore(value);
    }
  }
}
