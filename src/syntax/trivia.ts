/**
 * @module syntax/trivia
 *
 * Non-semantic text attached to tokens: whitespace, line breaks and comments.
 *
 * A trivia sequence is an ordered, immutable list of pieces. Counted pieces
 * (spaces, tabs, newlines) carry a repeat count so that `\n\n` is one piece
 * with `count: 2`, not two pieces.
 */

export type CountedTriviaKind = 'spaces' | 'tabs' | 'newlines' | 'carriageReturnLineFeeds';

export interface CountedTriviaPiece {
  readonly kind: CountedTriviaKind;
  readonly count: number;
}

export interface CommentTriviaPiece {
  readonly kind: 'lineComment' | 'blockComment';
  /** Full comment text, delimiters included. */
  readonly text: string;
}

export type TriviaPiece = CountedTriviaPiece | CommentTriviaPiece;

export type Trivia = readonly TriviaPiece[];

function frozen(pieces: TriviaPiece[]): Trivia {
  return Object.freeze(pieces);
}

export const EMPTY_TRIVIA: Trivia = frozen([]);

function counted(kind: CountedTriviaKind, count: number): Trivia {
  return count > 0 ? frozen([{ kind, count }]) : EMPTY_TRIVIA;
}

export const Trivia = {
  spaces: (count: number): Trivia => counted('spaces', count),
  tabs: (count: number): Trivia => counted('tabs', count),
  newlines: (count: number): Trivia => counted('newlines', count),
  carriageReturnLineFeeds: (count: number): Trivia => counted('carriageReturnLineFeeds', count),
  lineComment: (text: string): Trivia => frozen([{ kind: 'lineComment', text }]),
  blockComment: (text: string): Trivia => frozen([{ kind: 'blockComment', text }]),
};

export function isCountedPiece(piece: TriviaPiece): piece is CountedTriviaPiece {
  return piece.kind !== 'lineComment' && piece.kind !== 'blockComment';
}

export function isNewlinePiece(piece: TriviaPiece): boolean {
  return piece.kind === 'newlines' || piece.kind === 'carriageReturnLineFeeds';
}

export function isCommentPiece(piece: TriviaPiece): piece is CommentTriviaPiece {
  return !isCountedPiece(piece);
}

/**
 * Append pieces one by one, folding a counted piece into the previous piece
 * when both have the same kind.
 */
export function normalizeTrivia(pieces: readonly TriviaPiece[]): Trivia {
  const out: TriviaPiece[] = [];
  for (const piece of pieces) {
    if (isCountedPiece(piece) && piece.count <= 0) continue;
    const prev = out[out.length - 1];
    if (prev && isCountedPiece(prev) && isCountedPiece(piece) && prev.kind === piece.kind) {
      out[out.length - 1] = { kind: prev.kind, count: prev.count + piece.count };
    } else {
      out.push(piece);
    }
  }
  return frozen(out);
}

export function concatTrivia(...parts: readonly Trivia[]): Trivia {
  return normalizeTrivia(parts.flat());
}

export function containsNewline(trivia: Trivia): boolean {
  return trivia.some(isNewlinePiece);
}

export function containsComment(trivia: Trivia): boolean {
  return trivia.some(isCommentPiece);
}

function pieceText(piece: TriviaPiece): string {
  switch (piece.kind) {
    case 'spaces':
      return ' '.repeat(piece.count);
    case 'tabs':
      return '\t'.repeat(piece.count);
    case 'newlines':
      return '\n'.repeat(piece.count);
    case 'carriageReturnLineFeeds':
      return '\r\n'.repeat(piece.count);
    case 'lineComment':
    case 'blockComment':
      return piece.text;
  }
}

export function triviaText(trivia: Trivia): string {
  let out = '';
  for (const piece of trivia) out += pieceText(piece);
  return out;
}
