import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../src/config/config-service.js';
import { DiagnosticSeverity } from '../../src/diagnostics/diagnostics.js';
import { OneVariableDeclarationPerLine, allRules } from '../../src/rules/index.js';
import { runRule } from '../../src/runner.js';
import { SyntaxInvariantError } from '../../src/syntax/syntax.js';
import { SyntaxFactory as F } from '../../src/syntax/syntax_factory.js';
import { printSyntax } from '../../src/syntax/syntax_printer.js';
import { LogLevel, Logger } from '../../src/utils/logger.js';
import { statementAt } from '../helpers/test-factories.js';

function fileWithMultiBinding() {
  return F.sourceFile([F.variableDecl('var', [F.binding('a'), F.binding('b', { type: 'Int' })])]);
}

function captureLogger(): { logger: Logger; entries: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  return {
    logger: new Logger('runner', LogLevel.DEBUG, (line) => lines.push(line)),
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

const rule = new OneVariableDeclarationPerLine();
const config = ConfigService.fromEnv({});

describe('runRule', () => {
  it('reports without rewriting in lint mode', () => {
    const file = fileWithMultiBinding();

    const result = runRule(file, rule, { config, logger: captureLogger().logger });

    assert.equal(result.tree, file);
    assert.equal(result.changed, true);
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0]?.node, statementAt(file, 0));
  });

  it('returns the rewritten tree in format mode', () => {
    const result = runRule(fileWithMultiBinding(), rule, {
      mode: 'format',
      config,
      logger: captureLogger().logger,
    });

    assert.equal(printSyntax(result.tree), 'var a: Int\nvar b: Int\n');
    assert.equal(result.diagnostics.length, 1);
  });

  it('reports nothing for a tree already in shape', () => {
    const file = F.sourceFile([F.variableDecl('let', [F.binding('a', { value: 1 })])]);

    const result = runRule(file, rule, { mode: 'format', config, logger: captureLogger().logger });

    assert.equal(result.tree, file);
    assert.equal(result.changed, false);
    assert.deepEqual(result.diagnostics, []);
  });

  it('uses the configured severity unless the caller overrides it', () => {
    const strict = ConfigService.fromEnv({ SYNTAX_REWRITE_SEVERITY: 'error' });
    const { logger } = captureLogger();

    const configured = runRule(fileWithMultiBinding(), rule, { config: strict, logger });
    const overridden = runRule(fileWithMultiBinding(), rule, {
      config: strict,
      logger,
      severity: DiagnosticSeverity.Hint,
    });

    assert.equal(configured.diagnostics[0]?.severity, DiagnosticSeverity.Error);
    assert.equal(overridden.diagnostics[0]?.severity, DiagnosticSeverity.Hint);
  });

  it('skips a disabled rule', () => {
    const file = fileWithMultiBinding();
    const capture = captureLogger();
    const disabled = ConfigService.fromEnv({ SYNTAX_REWRITE_DISABLED_RULES: 'OneVariableDeclarationPerLine' });

    const result = runRule(file, rule, { mode: 'format', config: disabled, logger: capture.logger });

    assert.equal(result.tree, file);
    assert.equal(result.changed, false);
    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(
      capture.entries().map((e) => e.message),
      ['rule disabled by configuration']
    );
  });

  it('logs a summary of each run', () => {
    const capture = captureLogger();

    runRule(fileWithMultiBinding(), rule, { mode: 'format', config, logger: capture.logger });

    const [entry] = capture.entries();
    assert.ok(entry);
    assert.equal(entry.message, 'rule finished');
    assert.equal(entry.rule, 'OneVariableDeclarationPerLine');
    assert.equal(entry.mode, 'format');
    assert.equal(entry.diagnostics, 1);
    assert.equal(entry.changed, true);
    assert.equal(typeof entry.duration_ms, 'number');
  });

  it('logs and rethrows when the tree is malformed', () => {
    const capture = captureLogger();
    const broken = F.sourceFile([F.variableDecl('var', [])]);

    assert.throws(() => runRule(broken, rule, { config, logger: capture.logger }), SyntaxInvariantError);

    const [entry] = capture.entries();
    assert.ok(entry);
    assert.equal(entry.level, 'ERROR');
    assert.equal(entry.message, 'malformed syntax tree');
    assert.equal(entry.errorName, 'SyntaxInvariantError');
    assert.equal(entry.nodeKind, 'VariableDecl');
  });

  it('runs every registered rule by name', () => {
    const names = allRules().map((r) => {
      const result = runRule(fileWithMultiBinding(), r, { config, logger: captureLogger().logger });
      assert.equal(result.diagnostics.every((d) => d.rule === r.name), true);
      return r.name;
    });

    assert.deepEqual(names, ['OneVariableDeclarationPerLine']);
  });
});
