/**
 * @fileoverview History-wide constants
 * @module core/Constants
 *
 * Defaults for HistoryManager options and the text of every diagnostic.
 */

import type { HistoryDiagnosticCode } from '../types';

/**
 * Prefix put in front of every logged diagnostic
 */
export const LOG_PREFIX = '[HistoryManager]';

/**
 * Maximum history size for undo (unbounded unless configured)
 */
export const MAX_HISTORY_SIZE = Number.POSITIVE_INFINITY;

/**
 * Default option values
 */
export const DEFAULT_HISTORY_OPTIONS = Object.freeze({
  verbose: false,
  maxHistory: MAX_HISTORY_SIZE,
  skipDuplicates: false,
} as const);

/**
 * Human-readable text for each diagnostic code
 */
export const DIAGNOSTIC_MESSAGES: Readonly<Record<HistoryDiagnosticCode, string>> = Object.freeze({
  'reentry': 'Already open, close the current one first',
  'unmatched-close': 'Nothing open to close',
  'nesting-violation': "Buffers and groups can't be nested",
  'empty-undo': 'Nothing to undo',
  'empty-redo': 'Nothing to redo',
  'unclosed-group': 'Open group was committed automatically',
  'discarded-buffer': 'Open buffer was discarded',
  'empty-group': 'Group has no values, nothing committed',
  'no-change': "Skipping commit, values don't differ",
  'not-a-group': 'Last entry is not a group',
  'duplicate': 'Value matches the last entry, skipping',
} as const);

/**
 * Validate a history limit
 * @param value - Candidate limit
 * @returns True for a positive integer or Infinity
 */
export function isValidHistoryLimit(value: number): boolean {
  return value === Number.POSITIVE_INFINITY || (Number.isInteger(value) && value > 0);
}
