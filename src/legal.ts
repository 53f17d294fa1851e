import { isAttacked } from './attacks.js';
import type { Board } from './board.js';
import { attackCoverage, pseudoDests } from './movegen.js';
import { playMove } from './play.js';
import type { Color, Square } from './types.js';
import { defined, opposite } from './util.js';

export type Classification = 'inProgress' | 'check' | 'checkmate' | 'stalemate';

/**
 * Whether the move `from`-`to` leaves the mover's own king safe. The move is
 * played on a scratch copy of `board`, which is dropped afterwards.
 */
export const keepsKingSafe = (board: Board, from: Square, to: Square): boolean => {
  const scratch = board.clone();
  const effects = playMove(scratch, from, to);
  if (!effects) return false;
  const king = scratch.kingOf(effects.piece.color);
  return !defined(king) || !attackCoverage(scratch, opposite(effects.piece.color)).has(king);
};

/**
 * Legal destinations of the piece on `square`, in ascending square order.
 */
export const legalDests = (board: Board, square: Square): Square[] =>
  pseudoDests(board, square)
    .filter(to => keepsKingSafe(board, square, to))
    .sort((a, b) => a - b);

export const isCheck = (board: Board, color: Color): boolean => {
  const king = board.kingOf(color);
  return defined(king) && isAttacked(king, opposite(color), board);
};

export const hasLegalMoves = (board: Board, color: Color): boolean =>
  board.pieces(color).some(square => legalDests(board, square).length > 0);

/**
 * Classifies the position for `color` to move: without a legal move it is
 * checkmate when the king is attacked and stalemate otherwise.
 */
export const classify = (board: Board, color: Color): Classification => {
  const check = isCheck(board, color);
  if (!hasLegalMoves(board, color)) return check ? 'checkmate' : 'stalemate';
  return check ? 'check' : 'inProgress';
};
