export {
  type FileName,
  type RankName,
  type Square,
  type SquareName,
  type BySquare,
  type Color,
  type ByColor,
  type Role,
  type ByRole,
  type PromotionRole,
  type CastlingSide,
  type ByCastlingSide,
  type Piece,
  type GameState,
  type GameOverReason,
  type Outcome,
  FILE_NAMES,
  RANK_NAMES,
  COLORS,
  ROLES,
  PROMOTION_ROLES,
  CASTLING_SIDES,
} from './types.js';

export {
  type RoleChar,
  defined,
  opposite,
  squareRank,
  squareFile,
  squareFromCoords,
  isLightSquare,
  roleToChar,
  charToRole,
  parseRole,
  isPromotionRole,
  parseSquare,
  makeSquare,
} from './util.js';

export { IllegalAction, GameError } from './errors.js';

export { Position } from './position.js';

export { Board, Castles, boardEquals } from './board.js';

export {
  kingAttacks,
  knightAttacks,
  pawnAttacks,
  bishopAttacks,
  rookAttacks,
  queenAttacks,
  attacks,
  attacksTo,
  isAttacked,
  between,
} from './attacks.js';

export { castlingDests, pseudoDests, attackCoverage } from './movegen.js';

export { type MoveEffects, movePiece, playMove } from './play.js';

export { type Classification, keepsKingSafe, legalDests, isCheck, hasLegalMoves, classify } from './legal.js';

export {
  CLAIMABLE_HALFMOVES,
  AUTOMATIC_HALFMOVES,
  CLAIMABLE_REPETITIONS,
  AUTOMATIC_REPETITIONS,
  fingerprint,
  countRepetitions,
  isDeadPosition,
} from './draw.js';

export { type Setup, defaultSetup } from './setup.js';

export {
  INITIAL_BOARD_FEN,
  INITIAL_FEN,
  EMPTY_BOARD_FEN,
  InvalidFen,
  FenError,
  parseBoardFen,
  parseCastlingFen,
  parseFen,
  makeBoardFen,
  makeCastlingFen,
  makeFen,
} from './fen.js';

export { IllegalSetup, PositionError, type HistoryEntry, Game } from './game.js';
