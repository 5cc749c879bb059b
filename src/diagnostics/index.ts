/**
 * @module diagnostics
 *
 * Diagnostics raised by rewrite rules.
 *
 * Contains:
 * - Severities and codes (DiagnosticSeverity, DiagnosticCode)
 * - Message catalog (DiagnosticMessages)
 * - Per-run collector (DiagnosticSink)
 * - Text output (formatDiagnostic)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticMessages,
  DiagnosticSink,
  formatDiagnostic,
  isDiagnosticSeverity,
  type Diagnostic,
  type FormatDiagnosticOptions,
} from './diagnostics.js';
