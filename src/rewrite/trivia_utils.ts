import { Trivia, concatTrivia, isNewlinePiece, normalizeTrivia, type TriviaPiece } from '../syntax/trivia.js';
import { replaceToken, withLeadingTrivia, withTrailingTrivia, type SyntaxNode, type Token } from '../syntax/syntax.js';

/**
 * Drop the line breaks from `trivia`, keeping spaces, tabs and comments in
 * their original order. A line comment runs to the end of its line, so the
 * break right after one survives as a single newline; anything else would
 * comment out the code that follows.
 */
export function withoutNewlines(trivia: Trivia): Trivia {
  const kept: TriviaPiece[] = [];
  let prev: TriviaPiece | undefined;
  for (const piece of trivia) {
    if (!isNewlinePiece(piece)) {
      kept.push(piece);
    } else if (prev?.kind === 'lineComment') {
      kept.push({ kind: 'newlines', count: 1 });
    }
    prev = piece;
  }
  return normalizeTrivia(kept);
}

/** Whether `trivia` ends in a line comment, ignoring spaces and tabs after it. */
export function endsWithLineComment(trivia: Trivia): boolean {
  for (let i = trivia.length - 1; i >= 0; i--) {
    const piece = trivia[i];
    if (piece === undefined || piece.kind === 'spaces' || piece.kind === 'tabs') continue;
    return piece.kind === 'lineComment';
  }
  return false;
}

/** Leading trivia for a token moved to the start of a fresh line. */
export function leadingTriviaOnNewLine(original: Trivia): Trivia {
  return concatTrivia(Trivia.newlines(1), withoutNewlines(original));
}

export function replaceLeadingTrivia(node: SyntaxNode, token: Token, leadingTrivia: Trivia): SyntaxNode {
  return replaceToken(node, token, withLeadingTrivia(token, leadingTrivia));
}

export function replaceTrailingTrivia(node: SyntaxNode, token: Token, trailingTrivia: Trivia): SyntaxNode {
  return replaceToken(node, token, withTrailingTrivia(token, trailingTrivia));
}
