import { ConfigService } from './config/config-service.js';
import { DiagnosticSink, type Diagnostic, type DiagnosticSeverity } from './diagnostics/diagnostics.js';
import { createRuleContext, type FormatRule } from './rewrite/rule.js';
import { rewrite } from './rewrite/syntax_rewriter.js';
import { SyntaxInvariantError, type SyntaxNode } from './syntax/syntax.js';
import { createLogger, type Logger } from './utils/logger.js';

/**
 * `lint` reports only and hands back the input tree; `format` also hands back
 * the rewritten tree.
 */
export type RunMode = 'lint' | 'format';

export interface RunOptions {
  readonly mode?: RunMode;
  /** Overrides the configured default severity. */
  readonly severity?: DiagnosticSeverity;
  readonly config?: ConfigService;
  readonly logger?: Logger;
}

export interface RuleRunResult {
  readonly tree: SyntaxNode;
  readonly diagnostics: readonly Diagnostic[];
  /** Whether the rule rewrote anything, in either mode. */
  readonly changed: boolean;
}

export function runRule(root: SyntaxNode, rule: FormatRule, options: RunOptions = {}): RuleRunResult {
  const config = options.config ?? ConfigService.getInstance();
  const logger = options.logger ?? createLogger('runner', config);
  const mode = options.mode ?? 'lint';

  if (!config.isRuleEnabled(rule.name)) {
    logger.debug('rule disabled by configuration', { rule: rule.name });
    return { tree: root, diagnostics: [], changed: false };
  }

  const sink = new DiagnosticSink();
  const context = createRuleContext(rule, sink, options.severity ?? config.defaultSeverity);

  const started = performance.now();
  let rewritten: SyntaxNode;
  try {
    rewritten = rewrite(root, rule, context);
  } catch (e) {
    if (e instanceof SyntaxInvariantError) {
      logger.error('malformed syntax tree', e, { rule: rule.name, nodeKind: e.nodeKind });
    }
    throw e;
  }

  const diagnostics = sink.drain();
  const changed = rewritten !== root;
  logger.debug('rule finished', {
    rule: rule.name,
    mode,
    diagnostics: diagnostics.length,
    changed,
    duration_ms: performance.now() - started,
  });

  return { tree: mode === 'format' ? rewritten : root, diagnostics, changed };
}
