import type { Board } from './board.js';
import type { CastlingSide, Color, Piece, Square } from './types.js';
import {
  backrank,
  defined,
  kingCastlesTo,
  kingOrigin,
  opposite,
  rookCastlesTo,
  rookOrigin,
  squareFile,
  squareRank,
} from './util.js';

export interface MoveEffects {
  piece: Piece;
  captured: Piece | undefined;
  castling: CastlingSide | undefined;
  enPassant: boolean;
  /**
   * The pawn landed on the last rank and still has to be replaced by the
   * chosen promotion role.
   */
  promotion: boolean;
}

export const castlingSide = (piece: Piece, from: Square, to: Square): CastlingSide | undefined => {
  if (piece.role !== 'king' || from !== kingOrigin(piece.color)) return;
  if (to === kingCastlesTo(piece.color, 'a')) return 'a';
  if (to === kingCastlesTo(piece.color, 'h')) return 'h';
  return;
};

const capturedEpSquare = (color: Color, epSquare: Square): Square => epSquare + (color === 'white' ? -8 : 8);

/**
 * Plays the move `from`-`to` on `board` without checking it, including its
 * side effects: captures (en passant too), the rook hop of castling, lost
 * castling rights and the en passant target. A pawn reaching the last rank
 * stays a pawn; promotion is left to the caller.
 *
 * `piece` is the piece standing on `from`.
 */
export const movePiece = (board: Board, piece: Piece, from: Square, to: Square): MoveEffects => {
  board.take(from);
  const prevEp = board.epSquare;
  board.epSquare = undefined;

  let captured = board.get(to);
  let enPassant = false;
  const castling = castlingSide(piece, from, to);

  if (piece.role === 'pawn') {
    if (to === prevEp && !defined(captured) && squareFile(from) !== squareFile(to)) {
      captured = board.take(capturedEpSquare(piece.color, prevEp));
      enPassant = defined(captured);
    }
    if (Math.abs(to - from) === 16) board.epSquare = (from + to) >> 1;
  } else if (piece.role === 'king') {
    if (castling) {
      const rook = board.take(rookOrigin(piece.color, castling));
      if (rook) board.set(rookCastlesTo(piece.color, castling), rook);
    }
    board.castles.discardColor(piece.color);
  }

  board.castles.discardRook(from);
  board.castles.discardRook(to);
  board.set(to, piece);

  return {
    piece,
    captured,
    castling,
    enPassant,
    promotion: piece.role === 'pawn' && squareRank(to) === backrank(opposite(piece.color)),
  };
};

/**
 * Like {@link movePiece}, for whatever stands on `from`. Returns `undefined`
 * if the square is empty.
 */
export const playMove = (board: Board, from: Square, to: Square): MoveEffects | undefined => {
  const piece = board.get(from);
  return piece && movePiece(board, piece, from, to);
};
