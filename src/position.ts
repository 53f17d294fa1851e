import { Result } from '@badrap/result';
import { GameError, IllegalAction } from './errors.js';
import type { Square, SquareName } from './types.js';
import { makeSquare, parseSquare, squareFile, squareFromCoords, squareRank } from './util.js';

const invalid = (): Result<never, GameError> => Result.err(new GameError(IllegalAction.InvalidPosition));

/**
 * A square of the board addressed by row (0 is the first rank) and column
 * (0 is the a-file). Row, column and index are always consistent.
 */
export class Position {
  private constructor(private square: Square) {}

  static of(row: number, col: number): Result<Position, GameError> {
    if (!Number.isInteger(row) || !Number.isInteger(col)) return invalid();
    const square = squareFromCoords(col, row);
    return square === undefined ? invalid() : Result.ok(new Position(square));
  }

  static fromIndex(index: number): Result<Position, GameError> {
    if (!Number.isInteger(index) || index < 0 || index > 63) return invalid();
    return Result.ok(new Position(index));
  }

  /**
   * Parses algebraic notation such as `e4`. The file letter must be
   * lowercase a-h and the rank digit 1-8.
   */
  static parse(str: string): Result<Position, GameError> {
    const square = parseSquare(str);
    return square === undefined ? invalid() : Result.ok(new Position(square));
  }

  get row(): number {
    return squareRank(this.square);
  }

  get col(): number {
    return squareFile(this.square);
  }

  get index(): Square {
    return this.square;
  }

  offset(dr: number, dc: number): Result<Position, GameError> {
    return Position.of(this.row + dr, this.col + dc);
  }

  /**
   * Moves this position by the given offset. Fails and leaves the position
   * untouched if the result would leave the board.
   */
  offsetSelf(dr: number, dc: number): Result<void, GameError> {
    return this.offset(dr, dc).map(moved => {
      this.square = moved.index;
    });
  }

  equals(other: Position): boolean {
    return this.square === other.square;
  }

  toString(): SquareName {
    return makeSquare(this.square);
  }
}
