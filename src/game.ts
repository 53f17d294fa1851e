import { Result } from '@badrap/result';
import { isAttacked } from './attacks.js';
import { Board, Castles } from './board.js';
import {
  AUTOMATIC_HALFMOVES,
  AUTOMATIC_REPETITIONS,
  CLAIMABLE_HALFMOVES,
  CLAIMABLE_REPETITIONS,
  countRepetitions,
  fingerprint,
  isDeadPosition,
} from './draw.js';
import { GameError, IllegalAction } from './errors.js';
import { makeFen } from './fen.js';
import { classify, isCheck, legalDests } from './legal.js';
import { movePiece } from './play.js';
import { Position } from './position.js';
import { defaultSetup, type Setup } from './setup.js';
import {
  type Color,
  COLORS,
  type GameOverReason,
  type GameState,
  type Outcome,
  type Piece,
  type PromotionRole,
  type Role,
  type Square,
  type SquareName,
} from './types.js';
import { defined, isPromotionRole, opposite, squareFile, squareRank } from './util.js';

export enum IllegalSetup {
  Empty = 'ERR_EMPTY',
  Kings = 'ERR_KINGS',
  OppositeCheck = 'ERR_OPPOSITE_CHECK',
  PawnsOnBackrank = 'ERR_PAWNS_ON_BACKRANK',
}

export class PositionError extends Error {}

export interface HistoryEntry {
  /** Position before the move. */
  fen: string;
  from: SquareName;
  to: SquareName;
  piece: Piece;
  captured: Piece | undefined;
  promotion: PromotionRole | undefined;
}

const validate = (board: Board, turn: Color): Result<undefined, PositionError> => {
  if (board.count() === 0) return Result.err(new PositionError(IllegalSetup.Empty));
  if (COLORS.some(color => board.pieces(color, 'king').length !== 1)) {
    return Result.err(new PositionError(IllegalSetup.Kings));
  }

  const otherKing = board.kingOf(opposite(turn));
  if (defined(otherKing) && isAttacked(otherKing, turn, board)) {
    return Result.err(new PositionError(IllegalSetup.OppositeCheck));
  }

  for (const [square, piece] of board) {
    if (piece.role === 'pawn' && (squareRank(square) === 0 || squareRank(square) === 7)) {
      return Result.err(new PositionError(IllegalSetup.PawnsOnBackrank));
    }
  }

  return Result.ok(undefined);
};

/**
 * Keeps an en passant square only if a pawn of the side that just moved
 * stands right in front of it and the square it came from is empty.
 */
const validEpSquare = (board: Board, turn: Color, square: Square | undefined): Square | undefined => {
  if (!defined(square)) return;
  const epRank = turn === 'white' ? 5 : 2;
  const forward = turn === 'white' ? 8 : -8;
  if (squareRank(square) !== epRank) return;
  if (board.has(square) || board.has(square + forward)) return;
  const pawn = board.get(square - forward);
  if (!pawn || pawn.role !== 'pawn' || pawn.color !== opposite(turn)) return;
  return square;
};

const toPosition = (square: Square): Position => Position.fromIndex(square).unwrap();

/**
 * A game of chess from a starting position to its end.
 *
 * The game owns its board: moves, promotion choices and draw agreement are
 * the only ways to change it, and every rejected request leaves the game
 * exactly as it was.
 *
 * ```ts
 * const game = Game.default();
 * game.makeMove('f2', 'f3');
 * game.makeMove('e7', 'e5');
 * game.makeMove('g2', 'g4');
 * game.makeMove('d8', 'h4');
 * game.getGameState(); // 'gameOver'
 * game.getGameOverReason(); // 'checkmate'
 * ```
 */
export class Game {
  private board: Board;
  private turn: Color;
  private state: GameState;
  private reason: GameOverReason | undefined;
  private halfmoves: number;
  private fullmoves: number;
  private fingerprints: string[];
  private moves: HistoryEntry[];
  private promotionSquare: Square | undefined;

  private constructor(board: Board, turn: Color, halfmoves: number, fullmoves: number) {
    this.board = board;
    this.turn = turn;
    this.state = 'inProgress';
    this.reason = undefined;
    this.halfmoves = halfmoves;
    this.fullmoves = fullmoves;
    this.fingerprints = [fingerprint(board, turn)];
    this.moves = [];
    this.promotionSquare = undefined;
  }

  static default(): Game {
    const setup = defaultSetup();
    const game = new Game(setup.board, setup.turn, setup.halfmoves, setup.fullmoves);
    game.updateState();
    return game;
  }

  /**
   * Starts a game from an arbitrary position. Castling rights are dropped
   * where king or rook are not on their original squares, and an impossible
   * en passant square is ignored. The position is classified right away, so
   * the game may already be over.
   */
  static fromSetup(setup: Setup): Result<Game, PositionError> {
    const board = setup.board.clone();
    board.castles = Castles.fromRights(board, setup.castlingRights);
    board.epSquare = validEpSquare(board, setup.turn, setup.epSquare);
    return validate(board, setup.turn).map(() => {
      const game = new Game(board, setup.turn, Math.max(0, setup.halfmoves), Math.max(1, setup.fullmoves));
      game.updateState();
      return game;
    });
  }

  clone(): Game {
    const game = new Game(this.board.clone(), this.turn, this.halfmoves, this.fullmoves);
    game.state = this.state;
    game.reason = this.reason;
    game.fingerprints = this.fingerprints.slice();
    game.moves = this.getHistory();
    game.promotionSquare = this.promotionSquare;
    return game;
  }

  getBoard(): (Piece | undefined)[] {
    return this.board.toArray();
  }

  getActiveColor(): Color {
    return this.turn;
  }

  getGameState(): GameState {
    return this.state;
  }

  /**
   * Why the game ended, or `undefined` while it is not over.
   */
  getGameOverReason(): GameOverReason | undefined {
    return this.reason;
  }

  getHalfmoves(): number {
    return this.halfmoves;
  }

  getFullmoves(): number {
    return this.fullmoves;
  }

  getHistory(): HistoryEntry[] {
    return this.moves.map(entry => ({ ...entry }));
  }

  isCheck(): boolean {
    return isCheck(this.board, this.turn);
  }

  outcome(): Outcome | undefined {
    if (this.state !== 'gameOver') return;
    return { winner: this.reason === 'checkmate' ? opposite(this.turn) : undefined };
  }

  toSetup(): Setup {
    return {
      board: this.board.clone(),
      turn: this.turn,
      castlingRights: this.board.castles.toRights(),
      epSquare: this.board.epSquare,
      halfmoves: this.halfmoves,
      fullmoves: this.fullmoves,
    };
  }

  fen(): string {
    return makeFen(this.toSetup());
  }

  /**
   * Legal destinations of the piece on `square`. Empty if the square is
   * empty, holds a piece of the side not to move, or the game is over.
   */
  getPossibleMoves(square: Position | string): Result<Position[], GameError> {
    return this.movesFrom(square).map(({ dests }) => dests.map(toPosition));
  }

  getPossibleCaptureMoves(square: Position | string): Result<Position[], GameError> {
    return this.movesFrom(square).map(({ from, dests }) =>
      dests.filter(to => this.isCapture(from, to)).map(toPosition),
    );
  }

  getPossibleNonCaptureMoves(square: Position | string): Result<Position[], GameError> {
    return this.movesFrom(square).map(({ from, dests }) =>
      dests.filter(to => !this.isCapture(from, to)).map(toPosition),
    );
  }

  /**
   * Plays a move given in algebraic notation, such as `makeMove('e2', 'e4')`.
   * Castling is given as the two-square king move.
   */
  makeMove(from: string, to: string): Result<GameState, GameError> {
    return Position.parse(from).chain(fromPos => Position.parse(to).chain(toPos => this.makeMovePos(fromPos, toPos)));
  }

  makeMovePos(from: Position, to: Position): Result<GameState, GameError> {
    if (this.state === 'gameOver') return Result.err(new GameError(IllegalAction.GameAlreadyOver));
    if (this.state === 'waitingOnPromotionChoice') return Result.err(new GameError(IllegalAction.PromotionPending));

    const piece = this.board.get(from.index);
    if (!piece || piece.color !== this.turn) return Result.err(new GameError(IllegalAction.WrongTurn));
    if (!legalDests(this.board, from.index).includes(to.index)) {
      return Result.err(new GameError(IllegalAction.InvalidMove));
    }

    const fen = this.fen();
    const effects = movePiece(this.board, piece, from.index, to.index);

    this.halfmoves = piece.role === 'pawn' || defined(effects.captured) ? 0 : this.halfmoves + 1;
    this.moves.push({
      fen,
      from: from.toString(),
      to: to.toString(),
      piece,
      captured: effects.captured,
      promotion: undefined,
    });

    if (effects.promotion) {
      this.promotionSquare = to.index;
      this.state = 'waitingOnPromotionChoice';
    } else {
      this.finishTurn();
    }
    return Result.ok(this.state);
  }

  /**
   * Replaces the pawn that just reached the last rank with a piece of the
   * given `role` and passes the turn.
   */
  setPromotion(role: Role): Result<GameState, GameError> {
    if (this.state === 'gameOver') return Result.err(new GameError(IllegalAction.GameAlreadyOver));
    const square = this.promotionSquare;
    if (this.state !== 'waitingOnPromotionChoice' || !defined(square)) {
      return Result.err(new GameError(IllegalAction.NoPromotionPending));
    }
    if (!isPromotionRole(role)) return Result.err(new GameError(IllegalAction.InvalidPromotionChoice));

    this.board.set(square, { role, color: this.turn });
    const last = this.moves[this.moves.length - 1];
    if (last) last.promotion = role;
    this.promotionSquare = undefined;
    this.finishTurn();
    return Result.ok(this.state);
  }

  /**
   * Whether a draw may be claimed under the 50-move rule.
   */
  canEnact50MoveRule(): boolean {
    return this.halfmoves >= CLAIMABLE_HALFMOVES;
  }

  /**
   * Whether the current position has occurred at least three times, so a
   * draw may be claimed.
   */
  canEnactThreefoldRepetitionRule(): boolean {
    return this.repetitions() >= CLAIMABLE_REPETITIONS;
  }

  /**
   * Ends the game as a draw agreed by both players.
   */
  submitDraw(): Result<GameState, GameError> {
    if (this.state === 'gameOver') return Result.err(new GameError(IllegalAction.GameAlreadyOver));
    this.promotionSquare = undefined;
    this.end('mutualDraw');
    return Result.ok(this.state);
  }

  private movesFrom(square: Position | string): Result<{ from: Square; dests: Square[] }, GameError> {
    const parsed = typeof square === 'string' ? Position.parse(square) : Result.ok<Position, GameError>(square);
    return parsed.chain((pos): Result<{ from: Square; dests: Square[] }, GameError> => {
      if (this.state === 'waitingOnPromotionChoice') return Result.err(new GameError(IllegalAction.PromotionPending));
      const piece = this.board.get(pos.index);
      const dests =
        this.state === 'gameOver' || !piece || piece.color !== this.turn ? [] : legalDests(this.board, pos.index);
      return Result.ok({ from: pos.index, dests });
    });
  }

  private isCapture(from: Square, to: Square): boolean {
    if (this.board.has(to)) return true;
    const piece = this.board.get(from);
    return piece?.role === 'pawn' && to === this.board.epSquare && squareFile(from) !== squareFile(to);
  }

  private repetitions(): number {
    return countRepetitions(this.fingerprints, this.fingerprints[this.fingerprints.length - 1]);
  }

  private finishTurn(): void {
    if (this.turn === 'black') this.fullmoves++;
    this.turn = opposite(this.turn);
    this.fingerprints.push(fingerprint(this.board, this.turn));
    this.updateState();
  }

  /**
   * Classifies the position for the side to move. Checkmate and stalemate
   * take precedence over a dead position, which takes precedence over
   * fivefold repetition and then the 75-move rule.
   */
  private updateState(): void {
    const classification = classify(this.board, this.turn);
    if (classification === 'checkmate' || classification === 'stalemate') this.end(classification);
    else if (isDeadPosition(this.board)) this.end('deadPosition');
    else if (this.repetitions() >= AUTOMATIC_REPETITIONS) this.end('fivefoldRepetition');
    else if (this.halfmoves >= AUTOMATIC_HALFMOVES) this.end('seventyFiveMoveRule');
    else this.state = classification;
  }

  private end(reason: GameOverReason): void {
    this.state = 'gameOver';
    this.reason = reason;
  }
}
