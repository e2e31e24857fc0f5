/**
 * @fileoverview Diagnostic channel for history misuse
 * @module core/HistoryDiagnostics
 *
 * Reports are dropped unless the channel is enabled. Enabling it changes
 * what gets logged, never what the history does.
 */

import { Observable, Subject } from 'rxjs';
import type { HistoryDiagnostic, HistoryDiagnosticCode, HistoryLogger } from '../types';
import { DIAGNOSTIC_MESSAGES, LOG_PREFIX } from './Constants';

export class HistoryDiagnostics {
  private enabled: boolean;
  private readonly logger: HistoryLogger;
  private readonly _diagnostics$ = new Subject<HistoryDiagnostic>();

  /**
   * @param enabled - Start with reporting on
   * @param logger - Sink for human-readable warnings (defaults to console)
   */
  constructor(enabled: boolean, logger: HistoryLogger = console) {
    this.enabled = enabled;
    this.logger = logger;
  }

  /**
   * Emitted diagnostics (only while enabled)
   */
  get diagnostics$(): Observable<HistoryDiagnostic> {
    return this._diagnostics$.asObservable();
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Report a condition
   * @param code - What happened
   * @param subject - Which recording mode or operation it concerns (e.g. "buffer")
   */
  report(code: HistoryDiagnosticCode, subject?: string): void {
    if (!this.enabled) return;

    const base = DIAGNOSTIC_MESSAGES[code];
    const message = subject ? `${subject}: ${base}` : base;
    this.logger.warn(`${LOG_PREFIX} ${message}`);
    this._diagnostics$.next({ code, message });
  }

  complete(): void {
    this._diagnostics$.complete();
  }
}
