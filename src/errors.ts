export enum IllegalAction {
  InvalidPosition = 'ERR_INVALID_POSITION',
  WrongTurn = 'ERR_WRONG_TURN',
  InvalidMove = 'ERR_INVALID_MOVE',
  PromotionPending = 'ERR_PROMOTION_PENDING',
  NoPromotionPending = 'ERR_NO_PROMOTION_PENDING',
  InvalidPromotionChoice = 'ERR_INVALID_PROMOTION_CHOICE',
  GameAlreadyOver = 'ERR_GAME_ALREADY_OVER',
}

/**
 * Rejection of a caller request. The message is one of the
 * {@link IllegalAction} codes.
 */
export class GameError extends Error {}
