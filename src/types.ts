export const FILE_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export type FileName = (typeof FILE_NAMES)[number];

export const RANK_NAMES = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

export type RankName = (typeof RANK_NAMES)[number];

/**
 * Index of a square on the board, from 0 (a1) to 63 (h8). Row-major, so
 * `square = row * 8 + col` with row 0 being the first rank.
 */
export type Square = number;

export type SquareName = `${FileName}${RankName}`;

/**
 * Indexable by square indices.
 */
export type BySquare<T> = T[];

export const COLORS = ['white', 'black'] as const;

export type Color = (typeof COLORS)[number];

/**
 * Indexable by `white` and `black`.
 */
export type ByColor<T> = {
  [color in Color]: T;
};

export const ROLES = ['pawn', 'knight', 'bishop', 'rook', 'queen', 'king'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Indexable by `pawn`, `knight`, `bishop`, `rook`, `queen`, and `king`.
 */
export type ByRole<T> = {
  [role in Role]: T;
};

/**
 * Roles a pawn may be promoted to.
 */
export const PROMOTION_ROLES = ['knight', 'bishop', 'rook', 'queen'] as const;

export type PromotionRole = (typeof PROMOTION_ROLES)[number];

/**
 * Castling sides are named after the file of the castling rook: `a` is the
 * queen side, `h` the king side.
 */
export const CASTLING_SIDES = ['a', 'h'] as const;

export type CastlingSide = (typeof CASTLING_SIDES)[number];

/**
 * Indexable by `a` and `h`.
 */
export type ByCastlingSide<T> = {
  [side in CastlingSide]: T;
};

export interface Piece {
  readonly role: Role;
  readonly color: Color;
}

export type GameState = 'inProgress' | 'check' | 'waitingOnPromotionChoice' | 'gameOver';

export type GameOverReason =
  | 'checkmate'
  | 'stalemate'
  | 'deadPosition'
  | 'fivefoldRepetition'
  | 'seventyFiveMoveRule'
  | 'mutualDraw';

export interface Outcome {
  winner: Color | undefined;
}
