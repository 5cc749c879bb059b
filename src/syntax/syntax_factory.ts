// Node constructors carrying the trivia a parser would attach.
//
// Conventions: a token's trailing trivia holds same-line spaces after it; the
// line break and indentation before a statement live in the leading trivia of
// its first token. `itemList` adds the line break and indentation, so any
// leading trivia already on an item (a comment, say) follows the indentation.

import { Trivia, EMPTY_TRIVIA, concatTrivia } from './trivia.js';
import {
  SyntaxKind,
  TokenKind,
  firstToken,
  isNodeOfKind,
  makeNode,
  makeToken,
  replaceToken,
  withLeadingTrivia,
  type SyntaxElement,
  type SyntaxNode,
  type Token,
} from './syntax.js';

export interface BlockLayout {
  /** Indentation of the statements inside the braces. */
  readonly indent?: number;
  /** Indentation of the closing brace. */
  readonly outerIndent?: number;
}

export interface BindingOptions {
  readonly type?: string | SyntaxNode;
  readonly value?: SyntaxNode | string | number;
}

function keyword(text: string, leading: Trivia = EMPTY_TRIVIA): Token {
  return makeToken(TokenKind.KEYWORD, text, leading, Trivia.spaces(1));
}

function punct(text: string, leading: Trivia = EMPTY_TRIVIA, trailing: Trivia = EMPTY_TRIVIA): Token {
  return makeToken(TokenKind.PUNCT, text, leading, trailing);
}

function ident(name: string): Token {
  return makeToken(TokenKind.IDENT, name);
}

function toExpression(value: SyntaxNode | string | number): SyntaxNode {
  if (typeof value === 'number') return SyntaxFactory.integerLiteral(value);
  if (typeof value === 'string') return SyntaxFactory.identifierExpr(value);
  return value;
}

function prependLeading(node: SyntaxNode, trivia: Trivia): SyntaxNode {
  const tok = firstToken(node);
  if (!tok) return node;
  return replaceToken(node, tok, withLeadingTrivia(tok, concatTrivia(trivia, tok.leadingTrivia)));
}

function braced(kind: SyntaxKind, items: readonly SyntaxNode[], layout: BlockLayout): SyntaxNode {
  const indent = layout.indent ?? 2;
  const outerIndent = layout.outerIndent ?? 0;
  const closeLeading = concatTrivia(Trivia.newlines(1), Trivia.spaces(outerIndent));
  return makeNode(kind, [
    punct('{'),
    SyntaxFactory.itemList(items, indent, true),
    punct('}', closeLeading),
  ]);
}

function separated(elements: readonly SyntaxNode[]): SyntaxElement[] {
  const out: SyntaxElement[] = [];
  elements.forEach((element, i) => {
    out.push(element);
    if (i < elements.length - 1) out.push(punct(',', EMPTY_TRIVIA, Trivia.spaces(1)));
  });
  return out;
}

export const SyntaxFactory = {
  identifierPattern: (name: string): SyntaxNode => makeNode(SyntaxKind.IdentifierPattern, [ident(name)]),

  tuplePattern: (names: readonly string[]): SyntaxNode =>
    makeNode(SyntaxKind.TuplePattern, [
      punct('('),
      ...separated(names.map(n => SyntaxFactory.identifierPattern(n))),
      punct(')'),
    ]),

  typeIdentifier: (name: string): SyntaxNode => makeNode(SyntaxKind.TypeIdentifier, [ident(name)]),

  typeAnnotation: (type: string | SyntaxNode): SyntaxNode =>
    makeNode(SyntaxKind.TypeAnnotation, [
      punct(':', EMPTY_TRIVIA, Trivia.spaces(1)),
      typeof type === 'string' ? SyntaxFactory.typeIdentifier(type) : type,
    ]),

  identifierExpr: (name: string): SyntaxNode => makeNode(SyntaxKind.IdentifierExpr, [ident(name)]),

  integerLiteral: (value: number): SyntaxNode =>
    makeNode(SyntaxKind.LiteralExpr, [makeToken(TokenKind.INT, String(value))]),

  stringLiteral: (value: string): SyntaxNode =>
    makeNode(SyntaxKind.LiteralExpr, [makeToken(TokenKind.STRING, JSON.stringify(value))]),

  initializer: (value: SyntaxNode | string | number): SyntaxNode =>
    makeNode(SyntaxKind.InitializerClause, [
      makeToken(TokenKind.OPERATOR, '=', Trivia.spaces(1), Trivia.spaces(1)),
      toExpression(value),
    ]),

  /** A binding without a trailing comma; `variableDecl` adds the separators. */
  binding: (pattern: string | SyntaxNode, options: BindingOptions = {}): SyntaxNode => {
    const children: SyntaxElement[] = [
      typeof pattern === 'string' ? SyntaxFactory.identifierPattern(pattern) : pattern,
    ];
    if (options.type !== undefined) children.push(SyntaxFactory.typeAnnotation(options.type));
    if (options.value !== undefined) children.push(SyntaxFactory.initializer(options.value));
    return makeNode(SyntaxKind.PatternBinding, children);
  },

  variableDecl: (
    introducer: 'var' | 'let',
    bindings: readonly SyntaxNode[],
    leading: Trivia = EMPTY_TRIVIA
  ): SyntaxNode => {
    const withCommas = bindings.map((binding, i) => {
      const hasComma = binding.children.some(c => c.type === 'token' && c.text === ',');
      if (i === bindings.length - 1 || hasComma) return binding;
      return makeNode(SyntaxKind.PatternBinding, [
        ...binding.children,
        punct(',', EMPTY_TRIVIA, Trivia.spaces(1)),
      ]);
    });
    return makeNode(SyntaxKind.VariableDecl, [
      keyword(introducer, leading),
      makeNode(SyntaxKind.PatternBindingList, withCommas),
    ]);
  },

  callExpr: (callee: string, args: readonly SyntaxNode[] = [], trailingClosure?: SyntaxNode): SyntaxNode => {
    const children: SyntaxElement[] = [
      SyntaxFactory.identifierExpr(callee),
      punct('('),
      ...separated(args),
      punct(')'),
    ];
    if (trailingClosure) children.push(prependLeading(trailingClosure, Trivia.spaces(1)));
    return makeNode(SyntaxKind.CallExpr, children);
  },

  closure: (items: readonly SyntaxNode[], layout: BlockLayout = {}): SyntaxNode =>
    braced(SyntaxKind.ClosureExpr, items, layout),

  codeBlock: (items: readonly SyntaxNode[], layout: BlockLayout = {}): SyntaxNode =>
    braced(SyntaxKind.CodeBlock, items, layout),

  ifStmt: (condition: SyntaxNode, body: SyntaxNode): SyntaxNode =>
    makeNode(SyntaxKind.IfStmt, [keyword('if'), condition, prependLeading(body, Trivia.spaces(1))]),

  functionDecl: (name: string, body: SyntaxNode): SyntaxNode =>
    makeNode(SyntaxKind.FunctionDecl, [
      keyword('func'),
      ident(name),
      punct('('),
      punct(')'),
      prependLeading(body, Trivia.spaces(1)),
    ]),

  expressionStmt: (expr: SyntaxNode): SyntaxNode => makeNode(SyntaxKind.ExpressionStmt, [expr]),

  codeBlockItem: (item: SyntaxNode, semicolon = false): SyntaxNode =>
    makeNode(SyntaxKind.CodeBlockItem, semicolon ? [item, punct(';')] : [item]),

  /**
   * Lay statements out one per line at `indent`. The first statement starts a
   * new line only when `firstOnNewLine` is set (block bodies, not files).
   */
  itemList: (items: readonly SyntaxNode[], indent = 0, firstOnNewLine = false): SyntaxNode =>
    makeNode(
      SyntaxKind.CodeBlockItemList,
      items.map((raw, i) => {
        const item = isNodeOfKind(raw, SyntaxKind.CodeBlockItem) ? raw : SyntaxFactory.codeBlockItem(raw);
        if (i === 0 && !firstOnNewLine) return prependLeading(item, Trivia.spaces(indent));
        return prependLeading(item, concatTrivia(Trivia.newlines(1), Trivia.spaces(indent)));
      })
    ),

  /** A file whose statements start at column 1 and which ends with a newline. */
  sourceFile: (items: readonly SyntaxNode[]): SyntaxNode =>
    makeNode(SyntaxKind.SourceFile, [
      SyntaxFactory.itemList(items),
      makeToken(TokenKind.EOF, '', items.length > 0 ? Trivia.newlines(1) : EMPTY_TRIVIA),
    ]),
};
