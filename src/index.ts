/**
 * @module syntax-rewrite
 *
 * Rule-based rewriting of trivia-preserving syntax trees.
 *
 * A parser (not part of this package) produces an immutable tree; a rule
 * walks it through `runRule`, reports diagnostics and, in format mode, hands
 * back a rewritten tree that shares every untouched subtree with the input.
 *
 * @example
 * ```typescript
 * import { SyntaxFactory as F, OneVariableDeclarationPerLine, printSyntax, runRule } from 'syntax-rewrite';
 *
 * const file = F.sourceFile([F.variableDecl('var', [F.binding('a'), F.binding('b', { type: 'Int' })])]);
 * const { tree, diagnostics } = runRule(file, new OneVariableDeclarationPerLine(), { mode: 'format' });
 * printSyntax(tree); // "var a: Int\nvar b: Int\n"
 * diagnostics.length; // 1
 * ```
 */

// Tree model
export * from './syntax/index.js';
export type { Position } from './types.js';

// Diagnostics
export * from './diagnostics/index.js';

// Rewriting
export * from './rewrite/index.js';
export { OneVariableDeclarationPerLine, allRules } from './rules/index.js';
export { runRule, type RuleRunResult, type RunMode, type RunOptions } from './runner.js';

// Ambient services
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, type LogMetadata, type LogWriter } from './utils/logger.js';
