/**
 * @module rewrite
 *
 * Rule contract and the tree rewriter that drives it.
 */

export { createRuleContext, type FormatRule, type RuleContext } from './rule.js';
export { SyntaxRewriter, rewrite } from './syntax_rewriter.js';
export {
  endsWithLineComment,
  leadingTriviaOnNewLine,
  replaceLeadingTrivia,
  replaceTrailingTrivia,
  withoutNewlines,
} from './trivia_utils.js';
