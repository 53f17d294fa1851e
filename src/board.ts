import {
  type ByCastlingSide,
  type ByColor,
  CASTLING_SIDES,
  type CastlingSide,
  type Color,
  COLORS,
  type Piece,
  type Role,
  type Square,
} from './types.js';
import { defined, kingOrigin, rookOrigin } from './util.js';

/**
 * Castling rights per colour and side. A right only ever goes from `true`
 * to `false` during a game: it is lost when the king moves, when the rook
 * leaves its corner or when the rook is captured there.
 */
export class Castles {
  private rights: ByColor<ByCastlingSide<boolean>>;

  private constructor() {
    this.rights = {
      white: { a: false, h: false },
      black: { a: false, h: false },
    };
  }

  static default(): Castles {
    const castles = new Castles();
    castles.rights = {
      white: { a: true, h: true },
      black: { a: true, h: true },
    };
    return castles;
  }

  static empty(): Castles {
    return new Castles();
  }

  /**
   * Keeps only the rights in `rights` whose king and rook still stand on
   * their original squares of `board`.
   */
  static fromRights(board: Board, rights: ByColor<ByCastlingSide<boolean>>): Castles {
    const castles = Castles.empty();
    for (const color of COLORS) {
      const king = board.get(kingOrigin(color));
      if (!king || king.role !== 'king' || king.color !== color) continue;
      for (const side of CASTLING_SIDES) {
        const rook = board.get(rookOrigin(color, side));
        castles.rights[color][side] = rights[color][side] && !!rook && rook.role === 'rook' && rook.color === color;
      }
    }
    return castles;
  }

  clone(): Castles {
    const castles = new Castles();
    castles.rights = {
      white: { a: this.rights.white.a, h: this.rights.white.h },
      black: { a: this.rights.black.a, h: this.rights.black.h },
    };
    return castles;
  }

  has(color: Color, side: CastlingSide): boolean {
    return this.rights[color][side];
  }

  toRights(): ByColor<ByCastlingSide<boolean>> {
    return this.clone().rights;
  }

  /**
   * Drops the right tied to the rook on `square`, if `square` is one of the
   * four castling corners.
   */
  discardRook(square: Square): void {
    for (const color of COLORS) {
      for (const side of CASTLING_SIDES) {
        if (rookOrigin(color, side) === square) this.rights[color][side] = false;
      }
    }
  }

  discardColor(color: Color): void {
    this.rights[color].a = false;
    this.rights[color].h = false;
  }

  equals(other: Castles): boolean {
    return COLORS.every(color => CASTLING_SIDES.every(side => this.has(color, side) === other.has(color, side)));
  }
}

const BACKRANK: Role[] = ['rook', 'knight', 'bishop', 'queen', 'king', 'bishop', 'knight', 'rook'];

/**
 * Piece positions on a flat board of 64 slots, plus the castling rights and
 * the en passant target square that belong to the position.
 */
export class Board {
  private squares: (Piece | undefined)[];
  castles: Castles;

  /**
   * Square passed over by a pawn that advanced two squares on the previous
   * ply, if any.
   */
  epSquare: Square | undefined;

  private constructor() {
    this.squares = new Array<Piece | undefined>(64).fill(undefined);
    this.castles = Castles.empty();
    this.epSquare = undefined;
  }

  static default(): Board {
    const board = new Board();
    board.reset();
    return board;
  }

  static empty(): Board {
    return new Board();
  }

  /**
   * Resets all pieces to the default starting position for standard chess.
   */
  reset(): void {
    this.clear();
    for (let col = 0; col < 8; col++) {
      this.squares[col] = { role: BACKRANK[col], color: 'white' };
      this.squares[8 + col] = { role: 'pawn', color: 'white' };
      this.squares[48 + col] = { role: 'pawn', color: 'black' };
      this.squares[56 + col] = { role: BACKRANK[col], color: 'black' };
    }
    this.castles = Castles.default();
  }

  clear(): void {
    this.squares.fill(undefined);
    this.castles = Castles.empty();
    this.epSquare = undefined;
  }

  clone(): Board {
    const board = new Board();
    board.squares = this.squares.slice();
    board.castles = this.castles.clone();
    board.epSquare = this.epSquare;
    return board;
  }

  get(square: Square): Piece | undefined {
    return this.squares[square];
  }

  has(square: Square): boolean {
    return defined(this.squares[square]);
  }

  /**
   * Puts `piece` onto `square`, potentially replacing an existing piece.
   * Returns the existing piece, if any.
   */
  set(square: Square, piece: Piece): Piece | undefined {
    const old = this.squares[square];
    this.squares[square] = piece;
    return old;
  }

  /**
   * Removes and returns the piece from `square`, if any.
   */
  take(square: Square): Piece | undefined {
    const piece = this.squares[square];
    this.squares[square] = undefined;
    return piece;
  }

  /**
   * Finds the unique king of the given `color`, if any.
   */
  kingOf(color: Color): Square | undefined {
    for (const [square, piece] of this) {
      if (piece.role === 'king' && piece.color === color) return square;
    }
    return;
  }

  pieces(color: Color, role?: Role): Square[] {
    const squares: Square[] = [];
    for (const [square, piece] of this) {
      if (piece.color === color && (!role || piece.role === role)) squares.push(square);
    }
    return squares;
  }

  count(): number {
    let n = 0;
    for (const _ of this) n++;
    return n;
  }

  /**
   * Read-only copy of all 64 slots, indexed by square.
   */
  toArray(): (Piece | undefined)[] {
    return this.squares.map(piece => (piece ? { role: piece.role, color: piece.color } : undefined));
  }

  *[Symbol.iterator](): Iterator<[Square, Piece]> {
    for (let square = 0; square < 64; square++) {
      const piece = this.squares[square];
      if (piece) yield [square, piece];
    }
  }
}

export const boardEquals = (left: Board, right: Board): boolean => {
  for (let square = 0; square < 64; square++) {
    const l = left.get(square);
    const r = right.get(square);
    if (l?.role !== r?.role || l?.color !== r?.color) return false;
  }
  return left.castles.equals(right.castles) && left.epSquare === right.epSquare;
};
