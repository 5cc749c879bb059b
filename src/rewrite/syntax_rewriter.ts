import {
  SyntaxKind,
  isNode,
  statementsOf,
  withChildren,
  withStatements,
  type SyntaxNode,
} from '../syntax/syntax.js';
import type { FormatRule, RuleContext } from './rule.js';

/**
 * Depth-first tree rebuild driven by one rule.
 *
 * - Entry: `rewrite(root)`; `visit` dispatches on the node kind
 * - SourceFile, CodeBlock and ClosureExpr are rewrite sites: their statement
 *   list goes to the rule first, so diagnostics anchor on nodes of the input
 *   tree, then the (possibly replaced) site is rebuilt from its visited children
 * - Every other kind is rebuilt generically; a node none of whose children
 *   changed is returned as is
 *
 * Subclasses may override a `visitXxx` method and call `super` to keep the
 * default behaviour.
 */
export class SyntaxRewriter {
  constructor(
    protected readonly rule: FormatRule,
    protected readonly context: RuleContext
  ) {}

  rewrite(root: SyntaxNode): SyntaxNode {
    return this.visit(root);
  }

  visit(node: SyntaxNode): SyntaxNode {
    switch (node.kind) {
      case SyntaxKind.SourceFile:
        return this.visitSourceFile(node);
      case SyntaxKind.CodeBlock:
        return this.visitCodeBlock(node);
      case SyntaxKind.ClosureExpr:
        return this.visitClosureExpr(node);
      default:
        return this.visitChildren(node);
    }
  }

  visitSourceFile(node: SyntaxNode): SyntaxNode {
    return this.visitRewriteSite(node);
  }

  visitCodeBlock(node: SyntaxNode): SyntaxNode {
    return this.visitRewriteSite(node);
  }

  visitClosureExpr(node: SyntaxNode): SyntaxNode {
    return this.visitRewriteSite(node);
  }

  protected visitRewriteSite(node: SyntaxNode): SyntaxNode {
    const replaced = this.rule.processStatements?.(statementsOf(node), this.context) ?? null;
    return this.visitChildren(replaced ? withStatements(node, replaced) : node);
  }

  protected visitChildren(node: SyntaxNode): SyntaxNode {
    const children = node.children.map(child => (isNode(child) ? this.visit(child) : child));
    return withChildren(node, children);
  }
}

export function rewrite(root: SyntaxNode, rule: FormatRule, context: RuleContext): SyntaxNode {
  return new SyntaxRewriter(rule, context).rewrite(root);
}
