import type { FormatRule } from '../rewrite/rule.js';
import { OneVariableDeclarationPerLine } from './one_variable_declaration_per_line.js';

export { OneVariableDeclarationPerLine };

/** One instance of every rule, in no particular order. */
export function allRules(): FormatRule[] {
  return [new OneVariableDeclarationPerLine()];
}
