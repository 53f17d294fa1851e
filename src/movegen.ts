import { attacks, between, isAttacked, kingAttacks, pawnAttacks } from './attacks.js';
import type { Board } from './board.js';
import { type ByRole, CASTLING_SIDES, type Color, type Piece, type Square } from './types.js';
import { kingCastlesTo, kingOrigin, opposite, rookOrigin, squareRank } from './util.js';

type DestGenerator = (board: Board, square: Square, piece: Piece) => Square[];

const withoutOwn = (board: Board, squares: readonly Square[], color: Color): Square[] =>
  squares.filter(sq => board.get(sq)?.color !== color);

const pawnDests: DestGenerator = (board, square, piece) => {
  const forward = piece.color === 'white' ? 8 : -8;
  const epRank = piece.color === 'white' ? 5 : 2;
  const dests = pawnAttacks(piece.color, square).filter(to => {
    const target = board.get(to);
    if (target) return target.color !== piece.color;
    return to === board.epSquare && squareRank(to) === epRank;
  });
  const step = square + forward;
  if (0 <= step && step < 64 && !board.has(step)) {
    dests.push(step);
    const startRank = piece.color === 'white' ? 1 : 6;
    const doubleStep = step + forward;
    if (squareRank(square) === startRank && !board.has(doubleStep)) dests.push(doubleStep);
  }
  return dests;
};

const stepOrSlide: DestGenerator = (board, square, piece) =>
  withoutOwn(board, attacks(piece, square, board), piece.color);

const kingDests: DestGenerator = (board, square, piece) => {
  const dests = withoutOwn(board, kingAttacks(square), piece.color);
  return square === kingOrigin(piece.color) ? dests.concat(castlingDests(board, piece.color)) : dests;
};

const GENERATORS: ByRole<DestGenerator> = {
  pawn: pawnDests,
  knight: stepOrSlide,
  bishop: stepOrSlide,
  rook: stepOrSlide,
  queen: stepOrSlide,
  king: kingDests,
};

/**
 * Destinations of the king of `color` that castle, given as the square the
 * king lands on (c- or g-file).
 *
 * Requires the castling right, the king and rook on their original squares,
 * nothing between them, and none of the squares the king starts on, passes
 * or lands on attacked before the move.
 */
export const castlingDests = (board: Board, color: Color): Square[] => {
  const king = kingOrigin(color);
  const kingPiece = board.get(king);
  if (!kingPiece || kingPiece.role !== 'king' || kingPiece.color !== color) return [];
  const dests: Square[] = [];
  for (const side of CASTLING_SIDES) {
    if (!board.castles.has(color, side)) continue;
    const rookFrom = rookOrigin(color, side);
    const rook = board.get(rookFrom);
    if (!rook || rook.role !== 'rook' || rook.color !== color) continue;
    if (between(king, rookFrom).some(sq => board.has(sq))) continue;
    const kingTo = kingCastlesTo(color, side);
    const kingPath = [king, ...between(king, kingTo), kingTo];
    if (kingPath.some(sq => isAttacked(sq, opposite(color), board))) continue;
    dests.push(kingTo);
  }
  return dests;
};

/**
 * Pseudo-legal destinations of the piece on `square`: consistent with how
 * the piece moves and with the occupancy of the board, but not yet checked
 * for leaving the own king attacked.
 */
export const pseudoDests = (board: Board, square: Square): Square[] => {
  const piece = board.get(square);
  if (!piece) return [];
  return GENERATORS[piece.role](board, square, piece);
};

/**
 * Squares `color` currently attacks or defends. Pawn pushes, castling and
 * en passant are moves, not attacks, and are not included.
 */
export const attackCoverage = (board: Board, color: Color): Set<Square> => {
  const coverage = new Set<Square>();
  for (const [square, piece] of board) {
    if (piece.color !== color) continue;
    for (const sq of attacks(piece, square, board)) coverage.add(sq);
  }
  return coverage;
};
