/**
 * @fileoverview Service Interfaces
 * @module services/interfaces
 *
 * Contracts applications can depend on instead of the concrete classes,
 * which keeps them easy to mock in unit tests.
 */

export type { IHistoryManager, HistoryStateCallback } from './IHistoryManager';
