import type { Result } from '@badrap/result';
import { describe, expect, it } from 'vitest';
import { IllegalAction } from './errors.js';
import { INITIAL_FEN, parseFen } from './fen.js';
import { Game, IllegalSetup } from './game.js';
import { Position } from './position.js';
import { parseSquare } from './util.js';

const errorOf = <T>(result: Result<T, Error>): string | undefined => (result.isErr ? result.error.message : undefined);

const play = (game: Game, ...moves: string[]): void => {
  for (const move of moves) game.makeMove(move.slice(0, 2), move.slice(2, 4)).unwrap();
};

const fromFen = (fen: string): Game => parseFen(fen).chain(setup => Game.fromSetup(setup)).unwrap();

const dests = (result: Result<Position[], Error>): string[] => result.unwrap().map(pos => pos.toString());

describe('new game', () => {
  it('starts in the standard position', () => {
    const game = Game.default();
    expect(game.getGameState()).toBe('inProgress');
    expect(game.getActiveColor()).toBe('white');
    expect(game.getGameOverReason()).toBeUndefined();
    expect(game.outcome()).toBeUndefined();
    expect(game.fen()).toBe(INITIAL_FEN);
    expect(game.getBoard()[parseSquare('e1')]).toEqual({ role: 'king', color: 'white' });
    expect(game.getHistory()).toEqual([]);
  });

  it('lists possible moves of the side to move only', () => {
    const game = Game.default();
    expect(dests(game.getPossibleMoves('e2'))).toEqual(['e3', 'e4']);
    expect(dests(game.getPossibleMoves(Position.parse('b1').unwrap()))).toEqual(['a3', 'c3']);
    expect(dests(game.getPossibleMoves('e5'))).toEqual([]);
    expect(dests(game.getPossibleMoves('e7'))).toEqual([]);
    expect(errorOf(game.getPossibleMoves('z9'))).toBe(IllegalAction.InvalidPosition);
  });
});

describe('makeMove', () => {
  it('alternates turns and counts moves', () => {
    const game = Game.default();
    expect(game.makeMove('e2', 'e4').unwrap()).toBe('inProgress');
    expect(game.getActiveColor()).toBe('black');
    play(game, 'e7e5', 'g1f3');
    expect(game.getHalfmoves()).toBe(1);
    expect(game.getFullmoves()).toBe(2);
    expect(game.fen()).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2');
  });

  it('accepts positions', () => {
    const game = Game.default();
    const from = Position.of(1, 3).unwrap();
    const to = Position.of(3, 3).unwrap();
    expect(game.makeMovePos(from, to).unwrap()).toBe('inProgress');
    expect(game.getBoard()[parseSquare('d4')]).toEqual({ role: 'pawn', color: 'white' });
  });

  it('rejects illegal requests without changing the game', () => {
    const game = Game.default();
    expect(errorOf(game.makeMove('e7', 'e5'))).toBe(IllegalAction.WrongTurn);
    expect(errorOf(game.makeMove('e4', 'e5'))).toBe(IllegalAction.WrongTurn);
    expect(errorOf(game.makeMove('e2', 'e5'))).toBe(IllegalAction.InvalidMove);
    expect(errorOf(game.makeMove('e2', 'e9'))).toBe(IllegalAction.InvalidPosition);
    expect(errorOf(game.makeMove('E2', 'e4'))).toBe(IllegalAction.InvalidPosition);
    expect(errorOf(game.setPromotion('queen'))).toBe(IllegalAction.NoPromotionPending);
    expect(game.fen()).toBe(INITIAL_FEN);
    expect(game.getActiveColor()).toBe('white');
    expect(game.getHistory()).toEqual([]);
  });

  it('records history', () => {
    const game = Game.default();
    play(game, 'e2e4', 'd7d5', 'e4d5');
    const history = game.getHistory();
    expect(history).toHaveLength(3);
    expect(history[0]).toEqual({
      fen: INITIAL_FEN,
      from: 'e2',
      to: 'e4',
      piece: { role: 'pawn', color: 'white' },
      captured: undefined,
      promotion: undefined,
    });
    expect(history[2].captured).toEqual({ role: 'pawn', color: 'black' });
  });

  it('splits captures from quiet moves', () => {
    const game = Game.default();
    play(game, 'e2e4', 'd7d5');
    expect(dests(game.getPossibleCaptureMoves('e4'))).toEqual(['d5']);
    expect(dests(game.getPossibleNonCaptureMoves('e4'))).toEqual(['e5']);
  });

  it('clones independently', () => {
    const game = Game.default();
    const copy = game.clone();
    play(copy, 'e2e4');
    expect(game.fen()).toBe(INITIAL_FEN);
    expect(copy.getActiveColor()).toBe('black');
  });
});

describe('checkmate', () => {
  it("ends the game with fool's mate", () => {
    const game = Game.default();
    play(game, 'f2f3', 'e7e5', 'g2g4');
    expect(game.makeMove('d8', 'h4').unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('checkmate');
    expect(game.outcome()).toEqual({ winner: 'black' });
    expect(game.isCheck()).toBe(true);
    expect(game.getFullmoves()).toBe(3);
    expect(errorOf(game.makeMove('e1', 'f2'))).toBe(IllegalAction.GameAlreadyOver);
    expect(dests(game.getPossibleMoves('e2'))).toEqual([]);
  });

  it('reports check while moves remain', () => {
    const game = Game.default();
    play(game, 'e2e4', 'f7f6');
    expect(game.makeMove('d1', 'h5').unwrap()).toBe('check');
    expect(game.isCheck()).toBe(true);
    expect(dests(game.getPossibleMoves('g7'))).toEqual(['g6']);
    expect(dests(game.getPossibleMoves('a7'))).toEqual([]);
  });

  it('takes precedence over the 75-move rule', () => {
    const game = fromFen('7k/8/6K1/8/8/8/8/R7 w - - 149 80');
    expect(game.makeMove('a1', 'a8').unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('checkmate');
  });
});

describe('stalemate', () => {
  it('ends the game without a winner', () => {
    const game = fromFen('7k/8/8/5Q2/8/8/8/6K1 w - - 0 1');
    expect(game.makeMove('f5', 'f7').unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('stalemate');
    expect(game.outcome()).toEqual({ winner: undefined });
  });
});

describe('en passant', () => {
  it('captures right after the double push', () => {
    const game = Game.default();
    play(game, 'e2e4', 'a7a6', 'e4e5', 'd7d5');
    expect(game.fen()).toBe('rnbqkbnr/1pp1pppp/p7/3pP3/8/8/PPPP1PPP/RNBQKBNR w KQkq d6 0 3');
    expect(dests(game.getPossibleMoves('e5'))).toEqual(['d6', 'e6']);
    play(game, 'e5d6');
    expect(game.getBoard()[parseSquare('d5')]).toBeUndefined();
    expect(game.getBoard()[parseSquare('d6')]).toEqual({ role: 'pawn', color: 'white' });
    expect(game.getHistory()[4].captured).toEqual({ role: 'pawn', color: 'black' });
  });

  it('expires after one move', () => {
    const game = Game.default();
    play(game, 'e2e4', 'a7a6', 'e4e5', 'd7d5', 'h2h3', 'h7h6');
    expect(dests(game.getPossibleMoves('e5'))).toEqual(['e6']);
    expect(errorOf(game.makeMove('e5', 'd6'))).toBe(IllegalAction.InvalidMove);
  });
});

describe('castling', () => {
  const castlingFen = 'r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1';

  it('castles on both sides', () => {
    const game = fromFen(castlingFen);
    expect(dests(game.getPossibleMoves('e1'))).toEqual(['c1', 'd1', 'f1', 'g1']);
    play(game, 'e1g1', 'e8c8');
    expect(game.fen()).toBe('2kr3r/pppppppp/8/8/8/8/PPPPPPPP/R4RK1 w - - 2 2');
  });

  it('loses the right once the rook has moved, even if it returns', () => {
    const game = fromFen(castlingFen);
    play(game, 'h1g1', 'a8b8', 'g1h1', 'b8a8');
    expect(dests(game.getPossibleMoves('e1'))).toEqual(['c1', 'd1', 'f1']);
    expect(game.fen().split(' ')[2]).toBe('Qk');
  });

  it('loses both rights once the king has moved', () => {
    const game = fromFen(castlingFen);
    play(game, 'e1f1', 'e8d8', 'f1e1', 'd8e8');
    expect(dests(game.getPossibleMoves('e1'))).toEqual(['d1', 'f1']);
    expect(errorOf(game.makeMove('e1', 'g1'))).toBe(IllegalAction.InvalidMove);
    expect(game.fen().split(' ')[2]).toBe('-');
  });

  it('loses the right when the rook is captured', () => {
    const game = fromFen('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1');
    expect(game.makeMove('a1', 'a8').unwrap()).toBe('check');
    expect(game.fen().split(' ')[2]).toBe('Kk');
  });

  it('does not castle through an attacked square', () => {
    const game = fromFen('r3k2r/8/8/5r2/8/8/8/R3K2R w KQkq - 0 1');
    expect(errorOf(game.makeMove('e1', 'g1'))).toBe(IllegalAction.InvalidMove);
    expect(game.makeMove('e1', 'c1').isOk).toBe(true);
  });
});

describe('promotion', () => {
  it('waits for the promotion choice', () => {
    const game = fromFen('4k3/P7/8/8/8/8/8/4K3 w - - 5 30');
    expect(game.makeMove('a7', 'a8').unwrap()).toBe('waitingOnPromotionChoice');
    expect(game.getActiveColor()).toBe('white');
    expect(game.getHalfmoves()).toBe(0);
    expect(errorOf(game.makeMove('e8', 'd8'))).toBe(IllegalAction.PromotionPending);
    expect(errorOf(game.makeMove('e1', 'e2'))).toBe(IllegalAction.PromotionPending);
    expect(errorOf(game.getPossibleMoves('e1'))).toBe(IllegalAction.PromotionPending);
    expect(errorOf(game.setPromotion('king'))).toBe(IllegalAction.InvalidPromotionChoice);
    expect(errorOf(game.setPromotion('pawn'))).toBe(IllegalAction.InvalidPromotionChoice);
    expect(game.getGameState()).toBe('waitingOnPromotionChoice');

    expect(game.setPromotion('queen').unwrap()).toBe('check');
    expect(game.getBoard()[parseSquare('a8')]).toEqual({ role: 'queen', color: 'white' });
    expect(game.getActiveColor()).toBe('black');
    expect(game.getFullmoves()).toBe(30);
    expect(game.getHistory()[0].promotion).toBe('queen');
    expect(errorOf(game.setPromotion('queen'))).toBe(IllegalAction.NoPromotionPending);
  });

  it('may end the game by insufficient material', () => {
    const game = fromFen('4k3/P7/8/8/8/8/8/4K3 w - - 0 1');
    play(game, 'a7a8');
    expect(game.setPromotion('knight').unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('deadPosition');
  });
});

describe('draws', () => {
  const shuffle = ['g1f3', 'g8f6', 'f3g1', 'f6g8'];

  it('allows claiming threefold repetition', () => {
    const game = Game.default();
    play(game, ...shuffle);
    expect(game.canEnactThreefoldRepetitionRule()).toBe(false);
    play(game, ...shuffle);
    expect(game.canEnactThreefoldRepetitionRule()).toBe(true);
    expect(game.getGameState()).toBe('inProgress');
  });

  it('ends the game on fivefold repetition', () => {
    const game = Game.default();
    play(game, ...shuffle, ...shuffle, ...shuffle);
    expect(game.getGameState()).toBe('inProgress');
    play(game, ...shuffle);
    expect(game.getGameState()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('fivefoldRepetition');
    expect(game.outcome()).toEqual({ winner: undefined });
  });

  it('allows claiming the 50-move rule', () => {
    const game = fromFen('7k/8/8/8/8/8/8/R3K3 w - - 99 60');
    expect(game.canEnact50MoveRule()).toBe(false);
    play(game, 'a1a2');
    expect(game.getHalfmoves()).toBe(100);
    expect(game.canEnact50MoveRule()).toBe(true);
    expect(game.getGameState()).toBe('inProgress');
  });

  it('ends the game by the 75-move rule', () => {
    const game = fromFen('7k/8/8/8/8/8/8/R3K3 w - - 149 60');
    expect(game.makeMove('a1', 'a2').unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('seventyFiveMoveRule');
  });

  it('ends the game when no mate is possible', () => {
    const game = fromFen('4k3/8/8/8/8/8/4r3/4K3 w - - 0 1');
    expect(game.getGameState()).toBe('check');
    expect(game.makeMove('e1', 'e2').unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('deadPosition');
  });

  it('ends the game by agreement', () => {
    const game = Game.default();
    expect(game.submitDraw().unwrap()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('mutualDraw');
    expect(errorOf(game.submitDraw())).toBe(IllegalAction.GameAlreadyOver);
    expect(errorOf(game.makeMove('e2', 'e4'))).toBe(IllegalAction.GameAlreadyOver);
    expect(errorOf(game.setPromotion('queen'))).toBe(IllegalAction.GameAlreadyOver);
  });
});

describe('fromSetup', () => {
  const setupError = (fen: string): string | undefined => {
    const result = parseFen(fen).chain(setup => Game.fromSetup(setup));
    return result.isErr ? result.error.message : undefined;
  };

  it('rejects impossible positions', () => {
    expect(setupError('8/8/8/8/8/8/8/8 w - - 0 1')).toBe(IllegalSetup.Empty);
    expect(setupError('4k3/8/8/8/8/8/8/8 w - - 0 1')).toBe(IllegalSetup.Kings);
    expect(setupError('4k3/4R3/8/8/8/8/8/4K3 w - - 0 1')).toBe(IllegalSetup.OppositeCheck);
    expect(setupError('P3k3/8/8/8/8/8/8/4K3 w - - 0 1')).toBe(IllegalSetup.PawnsOnBackrank);
  });

  it('drops castling rights without king and rook at home', () => {
    expect(fromFen('4k3/8/8/8/8/8/8/4K2R w KQkq - 0 1').fen()).toBe('4k3/8/8/8/8/8/8/4K2R w K - 0 1');
  });

  it('keeps only a possible en passant square', () => {
    expect(fromFen('4k3/8/8/8/8/8/8/4K2R w - e3 0 1').fen()).toBe('4k3/8/8/8/8/8/8/4K2R w - - 0 1');
    const fen = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1';
    expect(fromFen(fen).fen()).toBe(fen);
  });

  it('classifies the starting position', () => {
    const game = fromFen('R5k1/5ppp/8/8/8/8/8/6K1 b - - 0 1');
    expect(game.getGameState()).toBe('gameOver');
    expect(game.getGameOverReason()).toBe('checkmate');
    expect(game.outcome()).toEqual({ winner: 'white' });
  });
});
