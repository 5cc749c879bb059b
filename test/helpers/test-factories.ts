/**
 * Shortcuts for reading trees and running a rule in tests.
 */

import { DiagnosticSink, DiagnosticSeverity } from '../../src/diagnostics/diagnostics.js';
import { createRuleContext, type FormatRule } from '../../src/rewrite/rule.js';
import { rewrite } from '../../src/rewrite/syntax_rewriter.js';
import { OneVariableDeclarationPerLine } from '../../src/rules/one_variable_declaration_per_line.js';
import {
  codeBlockItemParts,
  isNode,
  statementsOf,
  type SyntaxKind,
  type SyntaxNode,
} from '../../src/syntax/syntax.js';

/** The CodeBlockItems of a SourceFile, CodeBlock or ClosureExpr. */
export function itemsOf(site: SyntaxNode): SyntaxNode[] {
  return statementsOf(site).children.filter(isNode);
}

/** The statement wrapped by the index-th CodeBlockItem of `site`. */
export function statementAt(site: SyntaxNode, index: number): SyntaxNode {
  const item = itemsOf(site)[index];
  if (!item) throw new Error(`no statement at index ${index}`);
  return codeBlockItemParts(item).item;
}

export function collectNodes(root: SyntaxNode, kind: SyntaxKind): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  const walk = (node: SyntaxNode): void => {
    if (node.kind === kind) out.push(node);
    for (const child of node.children) if (isNode(child)) walk(child);
  };
  walk(root);
  return out;
}

export function applyRule(
  root: SyntaxNode,
  rule: FormatRule = new OneVariableDeclarationPerLine(),
  severity: DiagnosticSeverity = DiagnosticSeverity.Warning
): { tree: SyntaxNode; sink: DiagnosticSink } {
  const sink = new DiagnosticSink();
  const tree = rewrite(root, rule, createRuleContext(rule, sink, severity));
  return { tree, sink };
}
