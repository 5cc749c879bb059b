/**
 * @module syntax
 *
 * Syntax tree model.
 *
 * Contains:
 * - Trivia pieces and sequences (Trivia, TriviaPiece)
 * - Tokens, nodes and typed views (Token, SyntaxNode, SyntaxKind)
 * - Node constructors (SyntaxFactory)
 * - Lossless printer and locator (printSyntax, locate)
 */

export {
  Trivia,
  EMPTY_TRIVIA,
  concatTrivia,
  containsComment,
  containsNewline,
  isCommentPiece,
  isCountedPiece,
  isNewlinePiece,
  normalizeTrivia,
  triviaText,
  type CommentTriviaPiece,
  type CountedTriviaKind,
  type CountedTriviaPiece,
  type TriviaPiece,
} from './trivia.js';
export {
  SyntaxInvariantError,
  SyntaxKind,
  TokenKind,
  codeBlockItemParts,
  firstToken,
  isNode,
  isNodeOfKind,
  isRewriteSite,
  isToken,
  lastToken,
  makeNode,
  makePatternBinding,
  makeToken,
  patternBindingParts,
  replaceChild,
  replaceToken,
  statementsOf,
  tokensOf,
  variableDeclParts,
  withBindings,
  withChildren,
  withItem,
  withLeadingTrivia,
  withStatements,
  withTrailingComma,
  withTrailingTrivia,
  withTypeAnnotation,
  type CodeBlockItemParts,
  type PatternBindingParts,
  type RewriteSiteKind,
  type SyntaxElement,
  type SyntaxNode,
  type Token,
  type VariableDeclParts,
} from './syntax.js';
export { SyntaxFactory, type BindingOptions, type BlockLayout } from './syntax_factory.js';
export { locate, printSyntax } from './syntax_printer.js';
