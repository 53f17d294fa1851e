import { Result } from '@badrap/result';
import { Board } from './board.js';
import type { Setup } from './setup.js';
import type { ByCastlingSide, ByColor, Color, Piece, Square } from './types.js';
import { charToRole, defined, makeSquare, parseSquare, roleToChar } from './util.js';

export const INITIAL_BOARD_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR';
export const INITIAL_FEN = `${INITIAL_BOARD_FEN} w KQkq - 0 1`;
export const EMPTY_BOARD_FEN = '8/8/8/8/8/8/8/8';

export enum InvalidFen {
  Fen = 'ERR_FEN',
  Board = 'ERR_BOARD',
  Turn = 'ERR_TURN',
  Castling = 'ERR_CASTLING',
  EpSquare = 'ERR_EP_SQUARE',
  Halfmoves = 'ERR_HALFMOVES',
  Fullmoves = 'ERR_FULLMOVES',
}

export class FenError extends Error {}

const charToPiece = (ch: string): Piece | undefined => {
  const role = charToRole(ch);
  return role && { role, color: ch.toLowerCase() === ch ? 'black' : 'white' };
};

export const parseBoardFen = (boardPart: string): Result<Board, FenError> => {
  const board = Board.empty();
  let rank = 7;
  let file = 0;
  for (let i = 0; i < boardPart.length; i++) {
    const c = boardPart[i];
    if (c === '/' && file === 8) {
      file = 0;
      rank--;
      if (rank < 0) return Result.err(new FenError(InvalidFen.Board));
    } else {
      const step = parseInt(c, 10);
      if (step > 0 && step <= 8) file += step;
      else {
        if (file >= 8) return Result.err(new FenError(InvalidFen.Board));
        const piece = charToPiece(c);
        if (!piece) return Result.err(new FenError(InvalidFen.Board));
        board.set(file + rank * 8, piece);
        file++;
      }
      if (file > 8) return Result.err(new FenError(InvalidFen.Board));
    }
  }
  if (rank !== 0 || file !== 8) return Result.err(new FenError(InvalidFen.Board));
  return Result.ok(board);
};

export const parseCastlingFen = (castlingPart: string): Result<ByColor<ByCastlingSide<boolean>>, FenError> => {
  const rights = {
    white: { a: false, h: false },
    black: { a: false, h: false },
  };
  if (castlingPart === '-') return Result.ok(rights);
  for (const c of castlingPart) {
    if (c === 'K') rights.white.h = true;
    else if (c === 'Q') rights.white.a = true;
    else if (c === 'k') rights.black.h = true;
    else if (c === 'q') rights.black.a = true;
    else return Result.err(new FenError(InvalidFen.Castling));
  }
  return Result.ok(rights);
};

const parseSmallUint = (str: string): number | undefined => (/^\d{1,4}$/.test(str) ? parseInt(str, 10) : undefined);

export const parseFen = (fen: string): Result<Setup, FenError> => {
  const parts = fen.trim().split(/[\s_]+/);
  const boardPart = parts.shift();
  if (!defined(boardPart)) return Result.err(new FenError(InvalidFen.Fen));

  return parseBoardFen(boardPart).chain((board): Result<Setup, FenError> => {
    let turn: Color;
    const turnPart = parts.shift();
    if (!defined(turnPart) || turnPart === 'w') turn = 'white';
    else if (turnPart === 'b') turn = 'black';
    else return Result.err(new FenError(InvalidFen.Turn));

    return parseCastlingFen(parts.shift() ?? '-').chain((castlingRights): Result<Setup, FenError> => {
      const epPart = parts.shift();
      let epSquare: Square | undefined;
      if (defined(epPart) && epPart !== '-') {
        epSquare = parseSquare(epPart);
        if (!defined(epSquare)) return Result.err(new FenError(InvalidFen.EpSquare));
      }

      const halfmovePart = parts.shift();
      const halfmoves = defined(halfmovePart) ? parseSmallUint(halfmovePart) : 0;
      if (!defined(halfmoves)) return Result.err(new FenError(InvalidFen.Halfmoves));

      const fullmovesPart = parts.shift();
      const fullmoves = defined(fullmovesPart) ? parseSmallUint(fullmovesPart) : 1;
      if (!defined(fullmoves)) return Result.err(new FenError(InvalidFen.Fullmoves));

      if (parts.length > 0) return Result.err(new FenError(InvalidFen.Fen));

      return Result.ok({
        board,
        turn,
        castlingRights,
        epSquare,
        halfmoves,
        fullmoves: Math.max(1, fullmoves),
      });
    });
  });
};

const makePiece = (piece: Piece): string => {
  const r = roleToChar(piece.role);
  return piece.color === 'white' ? r.toUpperCase() : r;
};

export const makeBoardFen = (board: Board): string => {
  let fen = '';
  let empty = 0;
  for (let rank = 7; rank >= 0; rank--) {
    for (let file = 0; file < 8; file++) {
      const piece = board.get(file + rank * 8);
      if (!piece) empty++;
      else {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        fen += makePiece(piece);
      }

      if (file === 7) {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        if (rank !== 0) fen += '/';
      }
    }
  }
  return fen;
};

export const makeCastlingFen = (rights: ByColor<ByCastlingSide<boolean>>): string => {
  let fen = '';
  if (rights.white.h) fen += 'K';
  if (rights.white.a) fen += 'Q';
  if (rights.black.h) fen += 'k';
  if (rights.black.a) fen += 'q';
  return fen || '-';
};

export const makeFen = (setup: Setup): string =>
  [
    makeBoardFen(setup.board),
    setup.turn[0],
    makeCastlingFen(setup.castlingRights),
    defined(setup.epSquare) ? makeSquare(setup.epSquare) : '-',
    Math.max(0, Math.min(setup.halfmoves, 9999)),
    Math.max(1, Math.min(setup.fullmoves, 9999)),
  ].join(' ');
