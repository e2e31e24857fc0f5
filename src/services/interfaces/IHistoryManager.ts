/**
 * @fileoverview IHistoryManager Interface
 * @module services/interfaces/IHistoryManager
 *
 * Public contract of the value history. Applications that keep separate
 * undo domains (e.g. scene and viewport) hold one instance per domain.
 */

import type { Observable } from 'rxjs';
import type { HistoryDiagnostic, HistoryEntry, HistoryState, Restorable } from '../../types';

/**
 * History state change callback
 */
export type HistoryStateCallback = (state: HistoryState) => void;

export interface IHistoryManager<T> {
    /** Current state, replayed to new subscribers */
    readonly state$: Observable<HistoryState>;

    /** Diagnostics emitted while verbose */
    readonly diagnostics$: Observable<HistoryDiagnostic>;

    /**
     * Record a value. Goes to the open group if there is one.
     */
    push(value: T, label?: string): void;

    /**
     * Step back one entry
     * @returns True if a value was restored onto target
     */
    undo(target: Restorable<T>): boolean;

    /**
     * Step forward one entry
     * @returns True if a value was restored onto target
     */
    redo(target: Restorable<T>): boolean;

    /**
     * Remember the value at the start of a continuous interaction
     */
    startBuffer(current: T): void;

    /**
     * Record the remembered value if the interaction changed anything
     * @returns True if an entry was recorded
     */
    finishBuffer(finalValue: T): boolean;

    /**
     * Close the buffer without recording
     */
    cancelBuffer(): void;

    /**
     * Start collecting pushes into a single undo unit
     */
    startGroup(label?: string): void;

    /**
     * Commit the collected pushes as one entry
     * @returns True if an entry was committed
     */
    finishGroup(): boolean;

    /**
     * Drop the collected pushes
     */
    cancelGroup(): void;

    /**
     * Turn the last committed group back into an open group
     * @returns True if a group was reopened
     */
    reopenGroup(): boolean;

    canUndo(): boolean;
    canRedo(): boolean;
    isBuffering(): boolean;
    isInGroup(): boolean;

    /**
     * Snapshot held by the open buffer
     */
    getBuffer(): T | undefined;

    getUndoLabel(): string | undefined;
    getRedoLabel(): string | undefined;

    /**
     * Past entries, oldest first
     */
    getPast(): readonly HistoryEntry<T>[];

    /**
     * Future entries, the next redo last
     */
    getFuture(): readonly HistoryEntry<T>[];

    isEmpty(): boolean;

    setVerbose(verbose: boolean): void;

    /**
     * Clear all history
     */
    clear(): void;

    /**
     * Complete the observables
     */
    destroy(): void;
}
