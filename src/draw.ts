import type { Board } from './board.js';
import { makeBoardFen, makeCastlingFen } from './fen.js';
import type { Color, Piece, Square } from './types.js';
import { defined, isLightSquare, makeSquare } from './util.js';

/**
 * Half-move clock value from which a draw may be claimed (50 moves).
 */
export const CLAIMABLE_HALFMOVES = 100;

/**
 * Half-move clock value that ends the game automatically (75 moves).
 */
export const AUTOMATIC_HALFMOVES = 150;

export const CLAIMABLE_REPETITIONS = 3;

export const AUTOMATIC_REPETITIONS = 5;

/**
 * Comparable snapshot of a position for repetition counting: piece
 * placement, side to move, castling rights and en passant target.
 *
 * Two positions with different castling rights or en passant targets never
 * match, even if they allow exactly the same moves.
 */
export const fingerprint = (board: Board, turn: Color): string =>
  [
    makeBoardFen(board),
    turn[0],
    makeCastlingFen(board.castles.toRights()),
    defined(board.epSquare) ? makeSquare(board.epSquare) : '-',
  ].join(' ');

export const countRepetitions = (history: readonly string[], current: string): number =>
  history.reduce((count, entry) => (entry === current ? count + 1 : count), 0);

/**
 * Whether neither side can possibly deliver checkmate: king against king,
 * king and a single bishop or knight against king, or king and bishop
 * against king and bishop with both bishops on squares of the same colour.
 */
export const isDeadPosition = (board: Board): boolean => {
  const others: [Square, Piece][] = [];
  for (const [square, piece] of board) {
    if (piece.role !== 'king') others.push([square, piece]);
  }

  if (others.length === 0) return true;

  if (others.length === 1) {
    const role = others[0][1].role;
    return role === 'knight' || role === 'bishop';
  }

  if (others.length === 2) {
    const [[sqA, a], [sqB, b]] = others;
    return (
      a.role === 'bishop' && b.role === 'bishop' && a.color !== b.color && isLightSquare(sqA) === isLightSquare(sqB)
    );
  }

  return false;
};
