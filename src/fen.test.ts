import { describe, expect, it } from 'vitest';
import { Board } from './board.js';
import { EMPTY_BOARD_FEN, INITIAL_BOARD_FEN, INITIAL_FEN, InvalidFen, makeBoardFen, makeFen, parseCastlingFen, parseFen } from './fen.js';
import { defaultSetup } from './setup.js';
import { parseSquare } from './util.js';

const fenError = (fen: string): string | undefined => {
  const result = parseFen(fen);
  return result.isErr ? result.error.message : undefined;
};

describe('fen', () => {
  it('makes the initial fen', () => {
    expect(makeBoardFen(Board.default())).toBe(INITIAL_BOARD_FEN);
    expect(makeBoardFen(Board.empty())).toBe(EMPTY_BOARD_FEN);
    expect(makeFen(defaultSetup())).toBe(INITIAL_FEN);
  });

  it('parses the initial fen', () => {
    const setup = parseFen(INITIAL_FEN).unwrap();
    expect(makeBoardFen(setup.board)).toBe(INITIAL_BOARD_FEN);
    expect(setup.turn).toBe('white');
    expect(setup.castlingRights).toEqual({ white: { a: true, h: true }, black: { a: true, h: true } });
    expect(setup.epSquare).toBeUndefined();
    expect(setup.halfmoves).toBe(0);
    expect(setup.fullmoves).toBe(1);
  });

  it('parses all fields', () => {
    const setup = parseFen('rnbqkbnr/pp1ppppp/8/2p5/4P3/8/PPPP1PPP/RNBQKBNR b Kq e3 3 12').unwrap();
    expect(setup.turn).toBe('black');
    expect(setup.castlingRights).toEqual({ white: { a: false, h: true }, black: { a: true, h: false } });
    expect(setup.epSquare).toBe(parseSquare('e3'));
    expect(setup.halfmoves).toBe(3);
    expect(setup.fullmoves).toBe(12);
    expect(makeFen(setup)).toBe('rnbqkbnr/pp1ppppp/8/2p5/4P3/8/PPPP1PPP/RNBQKBNR b Kq e3 3 12');
  });

  it('fills in missing fields', () => {
    const setup = parseFen('8/8/8/8/8/8/8/4K2k').unwrap();
    expect(makeFen(setup)).toBe('8/8/8/8/8/8/8/4K2k w - - 0 1');
  });

  it('accepts underscores as separators', () => {
    expect(parseFen('4k3/8/8/8/8/8/8/4K3_b_-_-_5_40').unwrap().halfmoves).toBe(5);
  });

  it('rejects invalid fens', () => {
    expect(fenError('4k3/8/8/8/8/8/8')).toBe(InvalidFen.Board);
    expect(fenError('4k4/8/8/8/8/8/8/4K3')).toBe(InvalidFen.Board);
    expect(fenError('4x3/8/8/8/8/8/8/4K3')).toBe(InvalidFen.Board);
    expect(fenError('4k3/8/8/8/8/8/8/4K3 x')).toBe(InvalidFen.Turn);
    expect(fenError('4k3/8/8/8/8/8/8/4K3 w KX')).toBe(InvalidFen.Castling);
    expect(fenError('4k3/8/8/8/8/8/8/4K3 w - e9')).toBe(InvalidFen.EpSquare);
    expect(fenError('4k3/8/8/8/8/8/8/4K3 w - - x')).toBe(InvalidFen.Halfmoves);
    expect(fenError('4k3/8/8/8/8/8/8/4K3 w - - 0 -1')).toBe(InvalidFen.Fullmoves);
    expect(fenError('4k3/8/8/8/8/8/8/4K3 w - - 0 1 extra')).toBe(InvalidFen.Fen);
  });

  it('parses castling rights', () => {
    expect(parseCastlingFen('-').unwrap()).toEqual({ white: { a: false, h: false }, black: { a: false, h: false } });
    expect(parseCastlingFen('Qk').unwrap()).toEqual({ white: { a: true, h: false }, black: { a: false, h: true } });
  });
});
