import {
  type CastlingSide,
  type Color,
  FILE_NAMES,
  PROMOTION_ROLES,
  type PromotionRole,
  RANK_NAMES,
  type Role,
  type Square,
  type SquareName,
} from './types.js';

export const defined = <A>(v: A | undefined): v is A => v !== undefined;

export const opposite = (color: Color): Color => (color === 'white' ? 'black' : 'white');

export const squareRank = (square: Square): number => square >> 3;

export const squareFile = (square: Square): number => square & 0x7;

export const squareFromCoords = (file: number, rank: number): Square | undefined =>
  0 <= file && file < 8 && 0 <= rank && rank < 8 ? file + 8 * rank : undefined;

/**
 * Light squares have an odd sum of file and rank (a1 is dark).
 */
export const isLightSquare = (square: Square): boolean => ((squareFile(square) + squareRank(square)) & 1) === 1;

export type RoleChar = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export const roleToChar = (role: Role): RoleChar => {
  switch (role) {
    case 'pawn':
      return 'p';
    case 'knight':
      return 'n';
    case 'bishop':
      return 'b';
    case 'rook':
      return 'r';
    case 'queen':
      return 'q';
    case 'king':
      return 'k';
  }
};

export function charToRole(ch: RoleChar | Uppercase<RoleChar>): Role;
export function charToRole(ch: string): Role | undefined;
export function charToRole(ch: string): Role | undefined {
  switch (ch.toLowerCase()) {
    case 'p':
      return 'pawn';
    case 'n':
      return 'knight';
    case 'b':
      return 'bishop';
    case 'r':
      return 'rook';
    case 'q':
      return 'queen';
    case 'k':
      return 'king';
    default:
      return;
  }
}

const symbolToRole = (symbol: string): Role | undefined => {
  switch (symbol) {
    case '♔':
    case '♚':
      return 'king';
    case '♕':
    case '♛':
      return 'queen';
    case '♖':
    case '♜':
      return 'rook';
    case '♗':
    case '♝':
      return 'bishop';
    case '♘':
    case '♞':
      return 'knight';
    case '♙':
    case '♟':
      return 'pawn';
    default:
      return;
  }
};

const wordToRole = (word: string): Role | undefined => {
  switch (word.toLowerCase()) {
    case 'pawn':
      return 'pawn';
    case 'knight':
      return 'knight';
    case 'bishop':
      return 'bishop';
    case 'rook':
      return 'rook';
    case 'queen':
      return 'queen';
    case 'king':
      return 'king';
    default:
      return;
  }
};

/**
 * Parses a role from a letter in either case (`q`, `N`), an English word
 * in any case (`Queen`), or a chess symbol (`♕`, `♛`).
 */
export const parseRole = (str: string): Role | undefined => {
  const trimmed = str.trim();
  if (trimmed.length === 1) return charToRole(trimmed) ?? symbolToRole(trimmed);
  return wordToRole(trimmed);
};

export const isPromotionRole = (role: Role): role is PromotionRole => PROMOTION_ROLES.some(r => r === role);

export function parseSquare(str: SquareName): Square;
export function parseSquare(str: string): Square | undefined;
export function parseSquare(str: string): Square | undefined {
  if (str.length !== 2) return;
  return squareFromCoords(str.charCodeAt(0) - 'a'.charCodeAt(0), str.charCodeAt(1) - '1'.charCodeAt(0));
}

export const makeSquare = (square: Square): SquareName =>
  `${FILE_NAMES[squareFile(square)]}${RANK_NAMES[squareRank(square)]}`;

/**
 * Row of the pieces of `color` in the starting position.
 */
export const backrank = (color: Color): number => (color === 'white' ? 0 : 7);

/**
 * Square the king of `color` starts on, e1 or e8.
 */
export const kingOrigin = (color: Color): Square => (color === 'white' ? 4 : 60);

/**
 * Square the castling rook of `color` starts on, one of the four corners.
 */
export const rookOrigin = (color: Color, side: CastlingSide): Square =>
  color === 'white' ? (side === 'a' ? 0 : 7) : side === 'a' ? 56 : 63;

export const kingCastlesTo = (color: Color, side: CastlingSide): Square =>
  color === 'white' ? (side === 'a' ? 2 : 6) : side === 'a' ? 58 : 62;

export const rookCastlesTo = (color: Color, side: CastlingSide): Square =>
  color === 'white' ? (side === 'a' ? 3 : 5) : side === 'a' ? 59 : 61;
