import {
  DiagnosticSeverity,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSink,
} from '../diagnostics/diagnostics.js';
import type { SyntaxNode } from '../syntax/syntax.js';

/**
 * What a rule can see and do while the rewriter walks a tree: the severity it
 * reports at and a way to raise diagnostics.
 */
export interface RuleContext {
  readonly severity: DiagnosticSeverity;
  diagnose(code: DiagnosticCode, node: SyntaxNode): Diagnostic;
}

/**
 * A format rule. Every hook is optional; a rule that leaves one out does
 * nothing at the matching rewrite sites.
 *
 * `processStatements` receives the CodeBlockItemList of each SourceFile,
 * CodeBlock and ClosureExpr, before the statements' own descendants are
 * visited, and returns a replacement list or `null` to leave it untouched.
 */
export interface FormatRule {
  readonly name: string;
  processStatements?(items: SyntaxNode, context: RuleContext): SyntaxNode | null;
}

export function createRuleContext(
  rule: Pick<FormatRule, 'name'>,
  sink: DiagnosticSink,
  severity: DiagnosticSeverity = DiagnosticSeverity.Warning
): RuleContext {
  return {
    severity,
    diagnose: (code, node) => sink.record(severity, code, node, rule.name),
  };
}
