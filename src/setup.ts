import { Board } from './board.js';
import type { ByCastlingSide, ByColor, Color, Square } from './types.js';

/**
 * A not necessarily legal chess position. Only the pieces of `board` are
 * read; castling rights and the en passant square come from the fields of
 * the setup itself.
 */
export interface Setup {
  board: Board;
  turn: Color;
  castlingRights: ByColor<ByCastlingSide<boolean>>;
  epSquare: Square | undefined;
  halfmoves: number;
  fullmoves: number;
}

export const defaultSetup = (): Setup => ({
  board: Board.default(),
  turn: 'white',
  castlingRights: {
    white: { a: true, h: true },
    black: { a: true, h: true },
  },
  epSquare: undefined,
  halfmoves: 0,
  fullmoves: 1,
});
