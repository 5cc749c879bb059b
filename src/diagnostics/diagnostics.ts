// Rule diagnostics: severities, the message catalog and the per-run sink

import type { SyntaxNode } from '../syntax/syntax.js';
import { locate } from '../syntax/syntax_printer.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Style warnings (W001-W099)
  W001_OneVariableDeclarationPerLine = 'W001',
}

// Message text for each code. Rules pass the code; the sink resolves the text.
export const DiagnosticMessages: Readonly<Record<DiagnosticCode, string>> = {
  [DiagnosticCode.W001_OneVariableDeclarationPerLine]: 'split variable binding into multiple declarations',
};

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  /** Node in the tree handed to the rule, before any rewrite. */
  readonly node: SyntaxNode;
  readonly rule: string;
}

const SEVERITIES: readonly string[] = Object.values(DiagnosticSeverity);

export function isDiagnosticSeverity(value: string): value is DiagnosticSeverity {
  return SEVERITIES.includes(value);
}

/**
 * Append-only, ordered collection of the diagnostics raised during one run.
 * No deduplication and no filtering: severity gating belongs to whoever
 * reports the diagnostics. A sink must not be shared by concurrent runs.
 */
export class DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  record(severity: DiagnosticSeverity, code: DiagnosticCode, node: SyntaxNode, rule: string): Diagnostic {
    const diagnostic: Diagnostic = Object.freeze({
      severity,
      code,
      message: DiagnosticMessages[code],
      node,
      rule,
    });
    this.entries.push(diagnostic);
    return diagnostic;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries.slice();
  }

  get count(): number {
    return this.entries.length;
  }

  /** Return everything recorded so far and empty the sink. */
  drain(): Diagnostic[] {
    return this.entries.splice(0, this.entries.length);
  }
}

export interface FormatDiagnosticOptions {
  /** Tree the diagnostic's node belongs to; enables line:col output. */
  readonly root?: SyntaxNode;
  readonly file?: string;
}

// `file:line:col: severity CODE: message [Rule]`, leaving out the parts that
// are unknown.
export function formatDiagnostic(diagnostic: Diagnostic, opts: FormatDiagnosticOptions = {}): string {
  const { severity, code, message, rule } = diagnostic;
  const pos = opts.root ? locate(opts.root, diagnostic.node) : null;

  const where: string[] = [];
  if (opts.file) where.push(opts.file);
  if (pos) where.push(`${pos.line}:${pos.col}`);
  const prefix = where.length > 0 ? `${where.join(':')}: ` : '';

  return `${prefix}${severity} ${code}: ${message} [${rule}]`;
}
