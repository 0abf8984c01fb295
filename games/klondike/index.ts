/**
 * Klondike solitaire: rules, move executor, cursor navigation and
 * the session controller that drives them.
 */

export type { DrawCount, HighlightedDestinations, KlondikeState, Selection, Zone } from './KlondikeState';
export {
  DECK_SIZE,
  FOUNDATION_COUNT,
  FOUNDATION_SUITS,
  TABLEAU_COUNT,
  ZONE_PILE_COUNT,
  allPiles,
  cloneState,
  destinationCount,
} from './KlondikeState';

export { STOCK_SIZE_AFTER_DEAL, deal } from './KlondikeDealer';

export {
  canDrawFromStock,
  canPickFromTableau,
  canPickFromWaste,
  canPlaceOnFoundation,
  canPlaceOnTableau,
  firstFaceUpIndex,
  foundationIndexOf,
  isValidTableauRun,
  isWon,
  runLength,
  validFoundationDestinations,
  validTableauDestinations,
} from './KlondikeRules';

export type { MoveResult } from './KlondikeMoves';
export {
  buryTopOfStock,
  drawFromStock,
  moveFoundationToTableau,
  moveTableauToFoundation,
  moveTableauToTableau,
  moveWasteToFoundation,
  moveWasteToTableau,
  recycleWasteToStock,
} from './KlondikeMoves';

export type { Cursor, Direction } from './CursorNavigator';
export { createCursor, isValidCursor, moveCursor, snapToSelectable } from './CursorNavigator';

export type { KlondikeConfig, KlondikeConfigOptions } from './KlondikeConfig';
export { createKlondikeConfig, isDrawCount } from './KlondikeConfig';

export type {
  CardBuriedPayload,
  CardMovedPayload,
  GameLostPayload,
  GameRestartedPayload,
  GameWonPayload,
  KlondikeEventEmitter,
  KlondikeEventMap,
  KlondikeEventName,
  PileRef,
  StockDrawnPayload,
  UndoPayload,
  WasteRecycledPayload,
} from './KlondikeEvents';
export { createKlondikeEventEmitter } from './KlondikeEvents';

export type { SessionRecord, StateRecord, StoredSessionRecord } from './SessionRecord';
export {
  SessionRecordError,
  findLayoutProblem,
  migrateSessionRecord,
  parseSessionRecord,
  restoreState,
  snapshotState,
} from './SessionRecord';

export type {
  ActionResult,
  BuryContext,
  BuryDecider,
  KlondikeAction,
  KlondikeSessionOptions,
  SessionStatus,
  SessionView,
} from './KlondikeSession';
export {
  GAME_OVER_MESSAGE,
  KlondikeSession,
  LOSS_MESSAGE,
  WELCOME_MESSAGE,
} from './KlondikeSession';
