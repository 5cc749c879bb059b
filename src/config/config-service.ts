/**
 * @module config-service
 *
 * Environment-backed settings, read once per process.
 *
 * | Variable | Meaning | Default |
 * | --- | --- | --- |
 * | `LOG_LEVEL` | minimum log level (`DEBUG`, `INFO`, `WARN`, `ERROR`) | `INFO` |
 * | `SYNTAX_REWRITE_SEVERITY` | severity rules report at | `warning` |
 * | `SYNTAX_REWRITE_DISABLED_RULES` | comma-separated rule names to skip | none |
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (!config.isRuleEnabled('OneVariableDeclarationPerLine')) {
 *   // skip
 * }
 * ```
 */

import { DiagnosticSeverity, isDiagnosticSeverity } from '../diagnostics/diagnostics.js';
import { LogLevel } from '../utils/logger.js';

export class ConfigService {
  private static instance: ConfigService | null = null;

  /** Minimum level written by loggers (default INFO). */
  readonly logLevel: LogLevel;

  /** Severity rules report at unless the caller passes one (default warning). */
  readonly defaultSeverity: DiagnosticSeverity;

  /** Rules the runner skips. */
  readonly disabledRules: ReadonlySet<string>;

  private constructor(env: NodeJS.ProcessEnv) {
    this.logLevel = ConfigService.parseLogLevel(env.LOG_LEVEL);
    this.defaultSeverity = ConfigService.parseSeverity(env.SYNTAX_REWRITE_SEVERITY);
    this.disabledRules = ConfigService.parseRuleList(env.SYNTAX_REWRITE_DISABLED_RULES);
  }

  private static parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.trim().toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private static parseSeverity(raw: string | undefined): DiagnosticSeverity {
    const value = raw?.trim().toLowerCase() ?? '';
    return isDiagnosticSeverity(value) ? value : DiagnosticSeverity.Warning;
  }

  private static parseRuleList(raw: string | undefined): ReadonlySet<string> {
    if (!raw) return new Set();
    return new Set(
      raw
        .split(',')
        .map(name => name.trim())
        .filter(name => name.length > 0)
    );
  }

  isRuleEnabled(name: string): boolean {
    return !this.disabledRules.has(name);
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService(process.env);
    }
    return ConfigService.instance;
  }

  /** Build a standalone instance from explicit variables, bypassing the singleton. */
  static fromEnv(env: NodeJS.ProcessEnv): ConfigService {
    return new ConfigService(env);
  }

  /**
   * Drop the cached instance (tests only). The next getInstance() reads the
   * environment again.
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
