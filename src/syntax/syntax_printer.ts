import type { Position } from '../types.js';
import { triviaText } from './trivia.js';
import { isToken, tokensOf, type SyntaxElement, type SyntaxNode } from './syntax.js';

// Lossless printer: every token contributes its leading trivia, its text and
// its trailing trivia, in document order. Printing the tree a parser built
// reproduces the parsed source byte for byte.
export function printSyntax(element: SyntaxElement): string {
  let out = '';
  for (const tok of tokensOf(element)) {
    out += triviaText(tok.leadingTrivia);
    out += tok.text;
    out += triviaText(tok.trailingTrivia);
  }
  return out;
}

function advance(pos: { line: number; col: number }, text: string): void {
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n') {
      pos.line++;
      pos.col = 1;
    } else if (ch !== '\r' || text[i + 1] !== '\n') {
      pos.col++;
    }
  }
}

/**
 * Position (1-based) where `target` starts inside `root`, past its leading
 * trivia. `null` when `target` is not part of `root` or has no tokens.
 */
export function locate(root: SyntaxNode, target: SyntaxNode): Position | null {
  const pos = { line: 1, col: 1 };
  let found: Position | null = null;

  const walk = (element: SyntaxElement, inside: boolean): boolean => {
    if (isToken(element)) {
      advance(pos, triviaText(element.leadingTrivia));
      if (inside && found === null) found = { line: pos.line, col: pos.col };
      advance(pos, element.text);
      advance(pos, triviaText(element.trailingTrivia));
      return found !== null;
    }
    const here = inside || element === target;
    for (const child of element.children) {
      if (walk(child, here)) return true;
    }
    return false;
  };

  walk(root, false);
  return found;
}
