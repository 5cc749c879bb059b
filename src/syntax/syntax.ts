/**
 * @module syntax/syntax
 *
 * Immutable syntax tree: tokens with trivia, and nodes that own an ordered
 * list of children. Every node and child array is frozen; edits build new
 * nodes that share the untouched children by reference.
 *
 * Shapes the rewrite rules rely on (children in order, `?` optional):
 * - SourceFile: CodeBlockItemList, EOF
 * - CodeBlock / ClosureExpr: `{`, CodeBlockItemList, `}`
 * - CodeBlockItem: item node, `;`?
 * - VariableDecl: `var` | `let`, PatternBindingList
 * - PatternBinding: pattern, TypeAnnotation?, InitializerClause?, `,`?
 */

import { EMPTY_TRIVIA, type Trivia } from './trivia.js';

export enum TokenKind {
  KEYWORD = 'KEYWORD',
  IDENT = 'IDENT',
  INT = 'INT',
  STRING = 'STRING',
  PUNCT = 'PUNCT',
  OPERATOR = 'OPERATOR',
  EOF = 'EOF',
}

export enum SyntaxKind {
  SourceFile = 'SourceFile',
  CodeBlock = 'CodeBlock',
  ClosureExpr = 'ClosureExpr',
  CodeBlockItemList = 'CodeBlockItemList',
  CodeBlockItem = 'CodeBlockItem',
  VariableDecl = 'VariableDecl',
  PatternBindingList = 'PatternBindingList',
  PatternBinding = 'PatternBinding',
  IdentifierPattern = 'IdentifierPattern',
  TuplePattern = 'TuplePattern',
  TypeAnnotation = 'TypeAnnotation',
  TypeIdentifier = 'TypeIdentifier',
  InitializerClause = 'InitializerClause',
  IdentifierExpr = 'IdentifierExpr',
  LiteralExpr = 'LiteralExpr',
  CallExpr = 'CallExpr',
  ExpressionStmt = 'ExpressionStmt',
  IfStmt = 'IfStmt',
  FunctionDecl = 'FunctionDecl',
}

export interface Token {
  readonly type: 'token';
  readonly tokenKind: TokenKind;
  readonly text: string;
  readonly leadingTrivia: Trivia;
  readonly trailingTrivia: Trivia;
}

export interface SyntaxNode {
  readonly type: 'node';
  readonly kind: SyntaxKind;
  readonly children: readonly SyntaxElement[];
}

export type SyntaxElement = SyntaxNode | Token;

/** Node kinds whose children include a statement list. */
export type RewriteSiteKind = SyntaxKind.SourceFile | SyntaxKind.CodeBlock | SyntaxKind.ClosureExpr;

/**
 * Thrown when a tree does not have the shape its kind promises. Trees come
 * from the parser, so this is a contract violation upstream, never a
 * condition to recover from.
 */
export class SyntaxInvariantError extends Error {
  public readonly nodeKind: SyntaxKind;

  constructor(message: string, nodeKind: SyntaxKind) {
    super(`${nodeKind}: ${message}`);
    this.nodeKind = nodeKind;
    this.name = 'SyntaxInvariantError';
  }
}

export function makeToken(
  tokenKind: TokenKind,
  text: string,
  leadingTrivia: Trivia = EMPTY_TRIVIA,
  trailingTrivia: Trivia = EMPTY_TRIVIA
): Token {
  return Object.freeze({ type: 'token', tokenKind, text, leadingTrivia, trailingTrivia });
}

export function makeNode(kind: SyntaxKind, children: readonly SyntaxElement[]): SyntaxNode {
  return Object.freeze({ type: 'node', kind, children: Object.freeze([...children]) });
}

export function isToken(element: SyntaxElement): element is Token {
  return element.type === 'token';
}

export function isNode(element: SyntaxElement): element is SyntaxNode {
  return element.type === 'node';
}

export function isNodeOfKind(element: SyntaxElement | null | undefined, kind: SyntaxKind): element is SyntaxNode {
  return element != null && element.type === 'node' && element.kind === kind;
}

export function isRewriteSite(node: SyntaxNode): node is SyntaxNode & { readonly kind: RewriteSiteKind } {
  return (
    node.kind === SyntaxKind.SourceFile ||
    node.kind === SyntaxKind.CodeBlock ||
    node.kind === SyntaxKind.ClosureExpr
  );
}

export function withLeadingTrivia(token: Token, leadingTrivia: Trivia): Token {
  return makeToken(token.tokenKind, token.text, leadingTrivia, token.trailingTrivia);
}

export function withTrailingTrivia(token: Token, trailingTrivia: Trivia): Token {
  return makeToken(token.tokenKind, token.text, token.leadingTrivia, trailingTrivia);
}

/**
 * Rebuild `node` with new children. Returns `node` itself when every child is
 * the same object, so unchanged subtrees keep their identity.
 */
export function withChildren(node: SyntaxNode, children: readonly SyntaxElement[]): SyntaxNode {
  if (
    children.length === node.children.length &&
    children.every((child, i) => child === node.children[i])
  ) {
    return node;
  }
  return makeNode(node.kind, children);
}

export function replaceChild(node: SyntaxNode, index: number, child: SyntaxElement): SyntaxNode {
  if (index < 0 || index >= node.children.length) {
    throw new SyntaxInvariantError(`child index ${index} out of range`, node.kind);
  }
  const children = node.children.slice();
  children[index] = child;
  return withChildren(node, children);
}

export function firstToken(element: SyntaxElement): Token | null {
  if (isToken(element)) return element;
  for (const child of element.children) {
    const tok = firstToken(child);
    if (tok) return tok;
  }
  return null;
}

export function lastToken(element: SyntaxElement): Token | null {
  if (isToken(element)) return element;
  for (let i = element.children.length - 1; i >= 0; i--) {
    const child = element.children[i];
    const tok = child === undefined ? null : lastToken(child);
    if (tok) return tok;
  }
  return null;
}

/**
 * Rebuild `node` with `target` (matched by identity) swapped for
 * `replacement`. Ancestors of the token are rebuilt; everything else is
 * shared. Returns `node` unchanged when `target` is not inside it.
 */
export function replaceToken(node: SyntaxNode, target: Token, replacement: Token): SyntaxNode {
  const children = node.children.map(child => {
    if (isNode(child)) return replaceToken(child, target, replacement);
    return child === target ? replacement : child;
  });
  return withChildren(node, children);
}

export function* tokensOf(element: SyntaxElement): Generator<Token> {
  if (isToken(element)) {
    yield element;
    return;
  }
  for (const child of element.children) yield* tokensOf(child);
}

// ------------------------------------------------------------
// Typed views
// ------------------------------------------------------------

function expectKind(node: SyntaxNode, kind: SyntaxKind): void {
  if (node.kind !== kind) {
    throw new SyntaxInvariantError(`expected ${kind}`, node.kind);
  }
}

function childIndexOfKind(node: SyntaxNode, kind: SyntaxKind): number {
  return node.children.findIndex(child => isNodeOfKind(child, kind));
}

function requireChild(node: SyntaxNode, kind: SyntaxKind): { index: number; child: SyntaxNode } {
  const index = childIndexOfKind(node, kind);
  const child = node.children[index];
  if (index < 0 || !isNodeOfKind(child, kind)) {
    throw new SyntaxInvariantError(`missing ${kind} child`, node.kind);
  }
  return { index, child };
}

/** The CodeBlockItemList owned by a SourceFile, CodeBlock or ClosureExpr. */
export function statementsOf(site: SyntaxNode): SyntaxNode {
  if (!isRewriteSite(site)) {
    throw new SyntaxInvariantError('node does not own a statement list', site.kind);
  }
  return requireChild(site, SyntaxKind.CodeBlockItemList).child;
}

export function withStatements(site: SyntaxNode, statements: SyntaxNode): SyntaxNode {
  expectKind(statements, SyntaxKind.CodeBlockItemList);
  const { index } = requireChild(site, SyntaxKind.CodeBlockItemList);
  return replaceChild(site, index, statements);
}

export interface CodeBlockItemParts {
  readonly item: SyntaxNode;
  readonly semicolon: Token | null;
}

export function codeBlockItemParts(item: SyntaxNode): CodeBlockItemParts {
  expectKind(item, SyntaxKind.CodeBlockItem);
  const [inner, semicolon] = item.children;
  if (inner === undefined || !isNode(inner)) {
    throw new SyntaxInvariantError('missing item node', item.kind);
  }
  return { item: inner, semicolon: semicolon !== undefined && isToken(semicolon) ? semicolon : null };
}

export function withItem(codeBlockItem: SyntaxNode, item: SyntaxNode): SyntaxNode {
  expectKind(codeBlockItem, SyntaxKind.CodeBlockItem);
  return replaceChild(codeBlockItem, 0, item);
}

export interface VariableDeclParts {
  readonly introducer: Token;
  readonly bindingList: SyntaxNode;
  readonly bindings: readonly SyntaxNode[];
}

export function variableDeclParts(decl: SyntaxNode): VariableDeclParts {
  expectKind(decl, SyntaxKind.VariableDecl);
  const introducer = decl.children.find(isToken);
  if (!introducer) {
    throw new SyntaxInvariantError('missing introducer keyword', decl.kind);
  }
  const bindingList = requireChild(decl, SyntaxKind.PatternBindingList).child;
  const bindings = bindingList.children.filter((child): child is SyntaxNode =>
    isNodeOfKind(child, SyntaxKind.PatternBinding)
  );
  if (bindings.length === 0) {
    throw new SyntaxInvariantError('declaration has no bindings', decl.kind);
  }
  return { introducer, bindingList, bindings };
}

export function withBindings(decl: SyntaxNode, bindings: readonly SyntaxNode[]): SyntaxNode {
  const { index } = requireChild(decl, SyntaxKind.PatternBindingList);
  return replaceChild(decl, index, makeNode(SyntaxKind.PatternBindingList, bindings));
}

export interface PatternBindingParts {
  readonly pattern: SyntaxNode;
  readonly typeAnnotation: SyntaxNode | null;
  readonly initializer: SyntaxNode | null;
  readonly trailingComma: Token | null;
}

export function patternBindingParts(binding: SyntaxNode): PatternBindingParts {
  expectKind(binding, SyntaxKind.PatternBinding);
  const [pattern] = binding.children;
  if (pattern === undefined || !isNode(pattern)) {
    throw new SyntaxInvariantError('missing pattern', binding.kind);
  }
  let typeAnnotation: SyntaxNode | null = null;
  let initializer: SyntaxNode | null = null;
  let trailingComma: Token | null = null;
  for (const child of binding.children.slice(1)) {
    if (isNodeOfKind(child, SyntaxKind.TypeAnnotation)) typeAnnotation = child;
    else if (isNodeOfKind(child, SyntaxKind.InitializerClause)) initializer = child;
    else if (isToken(child) && child.text === ',') trailingComma = child;
  }
  return { pattern, typeAnnotation, initializer, trailingComma };
}

export function makePatternBinding(parts: PatternBindingParts): SyntaxNode {
  const children: SyntaxElement[] = [parts.pattern];
  if (parts.typeAnnotation) children.push(parts.typeAnnotation);
  if (parts.initializer) children.push(parts.initializer);
  if (parts.trailingComma) children.push(parts.trailingComma);
  return makeNode(SyntaxKind.PatternBinding, children);
}

export function withTypeAnnotation(binding: SyntaxNode, typeAnnotation: SyntaxNode | null): SyntaxNode {
  const parts = patternBindingParts(binding);
  if (parts.typeAnnotation === typeAnnotation) return binding;
  return makePatternBinding({ ...parts, typeAnnotation });
}

export function withTrailingComma(binding: SyntaxNode, trailingComma: Token | null): SyntaxNode {
  const parts = patternBindingParts(binding);
  if (parts.trailingComma === trailingComma) return binding;
  return makePatternBinding({ ...parts, trailingComma });
}
