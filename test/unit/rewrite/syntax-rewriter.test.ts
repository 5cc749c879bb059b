import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticSink } from '../../../src/diagnostics/diagnostics.js';
import { createRuleContext, type FormatRule } from '../../../src/rewrite/rule.js';
import { SyntaxRewriter, rewrite } from '../../../src/rewrite/syntax_rewriter.js';
import { OneVariableDeclarationPerLine } from '../../../src/rules/one_variable_declaration_per_line.js';
import {
  SyntaxKind,
  codeBlockItemParts,
  isNodeOfKind,
  withChildren,
  type SyntaxNode,
} from '../../../src/syntax/syntax.js';
import { SyntaxFactory as F } from '../../../src/syntax/syntax_factory.js';
import { printSyntax } from '../../../src/syntax/syntax_printer.js';
import { applyRule } from '../../helpers/test-factories.js';

function nestedFile(): SyntaxNode {
  return F.sourceFile([
    F.expressionStmt(F.callExpr('a')),
    F.functionDecl(
      'main',
      F.codeBlock([
        F.expressionStmt(F.callExpr('b')),
        F.variableDecl('let', [F.binding('x', { value: 1 })]),
        F.expressionStmt(
          F.callExpr(
            'run',
            [],
            F.closure([F.expressionStmt(F.callExpr('c'))], { indent: 4, outerIndent: 2 })
          )
        ),
      ])
    ),
  ]);
}

/** Removes every expression statement from each list it is given. */
class DropExpressionStatements implements FormatRule {
  readonly name = 'DropExpressionStatements';

  processStatements(items: SyntaxNode): SyntaxNode | null {
    const kept = items.children.filter(
      item => !isNodeOfKind(item, SyntaxKind.CodeBlockItem) || codeBlockItemParts(item).item.kind !== SyntaxKind.ExpressionStmt
    );
    return kept.length === items.children.length ? null : withChildren(items, kept);
  }
}

describe('SyntaxRewriter', () => {
  it('hands every statement list to the rule, outermost first', () => {
    const seen: number[] = [];
    const rule: FormatRule = {
      name: 'Recorder',
      processStatements: items => {
        seen.push(items.children.length);
        return null;
      },
    };

    applyRule(nestedFile(), rule);

    assert.deepEqual(seen, [2, 3, 1]);
  });

  it('returns the input tree when the rule changes nothing', () => {
    const file = nestedFile();

    const { tree } = applyRule(file, { name: 'Noop', processStatements: () => null });

    assert.equal(tree, file);
  });

  it('returns the input tree for a rule without hooks', () => {
    const file = nestedFile();

    assert.equal(applyRule(file, { name: 'Empty' }).tree, file);
  });

  it('rewrites statement lists at every depth', () => {
    const file = nestedFile();
    assert.equal(
      printSyntax(file),
      'a()\nfunc main() {\n  b()\n  let x = 1\n  run() {\n    c()\n  }\n}\n'
    );

    const { tree } = applyRule(file, new DropExpressionStatements());

    assert.equal(printSyntax(tree), '\nfunc main() {\n  let x = 1\n}\n');
  });

  it('reaches closures nested inside expressions', () => {
    const inner = F.closure([F.variableDecl('var', [F.binding('p'), F.binding('q')])]);
    const file = F.sourceFile([F.expressionStmt(F.callExpr('run', [], inner))]);
    const seen: number[] = [];
    const rule: FormatRule = {
      name: 'Wrapper',
      processStatements: (items, context) => {
        seen.push(items.children.length);
        return new OneVariableDeclarationPerLine().processStatements(items, context);
      },
    };

    const { tree, sink } = applyRule(file, rule);

    assert.deepEqual(seen, [1, 1]);
    assert.equal(sink.count, 1);
    assert.equal(printSyntax(tree), 'run() {\n  var p\n  var q\n}\n');
  });

  it('lets subclasses skip code blocks', () => {
    class TopLevelOnly extends SyntaxRewriter {
      override visitCodeBlock(node: SyntaxNode): SyntaxNode {
        return node;
      }
    }
    const rule = new DropExpressionStatements();
    const file = nestedFile();

    const tree = new TopLevelOnly(rule, createRuleContext(rule, new DiagnosticSink())).rewrite(file);

    assert.equal(printSyntax(tree), '\nfunc main() {\n  b()\n  let x = 1\n  run() {\n    c()\n  }\n}\n');
  });

  it('keeps untouched subtrees shared with the input', () => {
    const file = F.sourceFile([
      F.variableDecl('var', [F.binding('a'), F.binding('b')]),
      F.expressionStmt(F.callExpr('run', [], F.closure([F.variableDecl('var', [F.binding('x')])]))),
    ]);
    const sink = new DiagnosticSink();
    const rule = new OneVariableDeclarationPerLine();

    const tree = rewrite(file, rule, createRuleContext(rule, sink));

    const before = file.children[0];
    const after = tree.children[0];
    assert.ok(isNodeOfKind(before, SyntaxKind.CodeBlockItemList));
    assert.ok(isNodeOfKind(after, SyntaxKind.CodeBlockItemList));
    assert.equal(after.children[2], before.children[1]);
  });
});
