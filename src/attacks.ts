/**
 * Compute attacks and rays.
 *
 * These are low-level functions that can be used to implement chess rules.
 * Attacks include squares occupied by pieces of either colour, so they
 * describe both attacked and defended squares.
 *
 * Implementation notes: Stepping pieces (king, knight, pawn captures) read
 * from tables computed once per square. Sliding pieces walk outwards along
 * each direction until the board edge or the first occupied square, which
 * is included.
 *
 * @packageDocumentation
 */

import type { Board } from './board.js';
import type { BySquare, ByColor, Color, Piece, Role, Square } from './types.js';
import { defined, opposite, squareFile, squareFromCoords, squareRank } from './util.js';

type Delta = readonly [dRank: number, dFile: number];

const computeRange = (square: Square, deltas: readonly Delta[]): readonly Square[] => {
  const range: Square[] = [];
  for (const [dRank, dFile] of deltas) {
    const to = squareFromCoords(squareFile(square) + dFile, squareRank(square) + dRank);
    if (defined(to)) range.push(to);
  }
  return range;
};

const tabulate = <T>(f: (square: Square) => T): BySquare<T> => {
  const table: BySquare<T> = [];
  for (let square = 0; square < 64; square++) table[square] = f(square);
  return table;
};

const KING_DELTAS: readonly Delta[] = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

const KNIGHT_DELTAS: readonly Delta[] = [
  [-2, -1],
  [-2, 1],
  [-1, -2],
  [-1, 2],
  [1, -2],
  [1, 2],
  [2, -1],
  [2, 1],
];

export const ROOK_DIRECTIONS: readonly Delta[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

export const BISHOP_DIRECTIONS: readonly Delta[] = [
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1],
];

const KING_ATTACKS = tabulate(sq => computeRange(sq, KING_DELTAS));
const KNIGHT_ATTACKS = tabulate(sq => computeRange(sq, KNIGHT_DELTAS));
const PAWN_ATTACKS: ByColor<BySquare<readonly Square[]>> = {
  white: tabulate(sq => computeRange(sq, [[1, -1], [1, 1]])),
  black: tabulate(sq => computeRange(sq, [[-1, -1], [-1, 1]])),
};

const slide = (square: Square, directions: readonly Delta[], board: Board): readonly Square[] => {
  const range: Square[] = [];
  for (const [dRank, dFile] of directions) {
    let to = squareFromCoords(squareFile(square) + dFile, squareRank(square) + dRank);
    while (defined(to)) {
      range.push(to);
      if (board.has(to)) break;
      to = squareFromCoords(squareFile(to) + dFile, squareRank(to) + dRank);
    }
  }
  return range;
};

/**
 * Gets squares attacked or defended by a king on `square`.
 */
export const kingAttacks = (square: Square): readonly Square[] => KING_ATTACKS[square];

/**
 * Gets squares attacked or defended by a knight on `square`.
 */
export const knightAttacks = (square: Square): readonly Square[] => KNIGHT_ATTACKS[square];

/**
 * Gets squares attacked or defended by a pawn of the given `color`
 * on `square`.
 */
export const pawnAttacks = (color: Color, square: Square): readonly Square[] => PAWN_ATTACKS[color][square];

/**
 * Gets squares attacked or defended by a bishop on `square`, given the
 * pieces on `board`.
 */
export const bishopAttacks = (square: Square, board: Board): readonly Square[] =>
  slide(square, BISHOP_DIRECTIONS, board);

/**
 * Gets squares attacked or defended by a rook on `square`, given the pieces
 * on `board`.
 */
export const rookAttacks = (square: Square, board: Board): readonly Square[] => slide(square, ROOK_DIRECTIONS, board);

/**
 * Gets squares attacked or defended by a queen on `square`, given the
 * pieces on `board`.
 */
export const queenAttacks = (square: Square, board: Board): readonly Square[] =>
  bishopAttacks(square, board).concat(rookAttacks(square, board));

/**
 * Gets squares attacked or defended by a `piece` on `square`, given the
 * pieces on `board`.
 */
export const attacks = (piece: Piece, square: Square, board: Board): readonly Square[] => {
  switch (piece.role) {
    case 'pawn':
      return pawnAttacks(piece.color, square);
    case 'knight':
      return knightAttacks(square);
    case 'bishop':
      return bishopAttacks(square, board);
    case 'rook':
      return rookAttacks(square, board);
    case 'queen':
      return queenAttacks(square, board);
    case 'king':
      return kingAttacks(square);
  }
};

const attackersAmong = (
  board: Board,
  squares: readonly Square[],
  attacker: Color,
  roles: readonly Role[],
): Square[] =>
  squares.filter(sq => {
    const piece = board.get(sq);
    return !!piece && piece.color === attacker && roles.includes(piece.role);
  });

/**
 * Gets the squares of all pieces of `attacker` that attack `square`.
 */
export const attacksTo = (square: Square, attacker: Color, board: Board): Square[] => [
  ...attackersAmong(board, rookAttacks(square, board), attacker, ['rook', 'queen']),
  ...attackersAmong(board, bishopAttacks(square, board), attacker, ['bishop', 'queen']),
  ...attackersAmong(board, knightAttacks(square), attacker, ['knight']),
  ...attackersAmong(board, kingAttacks(square), attacker, ['king']),
  ...attackersAmong(board, pawnAttacks(opposite(attacker), square), attacker, ['pawn']),
];

export const isAttacked = (square: Square, attacker: Color, board: Board): boolean =>
  attacksTo(square, attacker, board).length > 0;

/**
 * Gets all squares between `a` and `b` (bounds not included), or an empty
 * list if they are not on the same rank, file or diagonal.
 */
export const between = (a: Square, b: Square): Square[] => {
  const dRank = squareRank(b) - squareRank(a);
  const dFile = squareFile(b) - squareFile(a);
  if (a === b || (dRank !== 0 && dFile !== 0 && Math.abs(dRank) !== Math.abs(dFile))) return [];
  const stepRank = Math.sign(dRank);
  const stepFile = Math.sign(dFile);
  const squares: Square[] = [];
  let rank = squareRank(a) + stepRank;
  let file = squareFile(a) + stepFile;
  while (rank !== squareRank(b) || file !== squareFile(b)) {
    squares.push(file + 8 * rank);
    rank += stepRank;
    file += stepFile;
  }
  return squares;
};
