/**
 * Events emitted by a Klondike session.
 */

import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { DrawCount, Zone } from './KlondikeState';

// ── Event Payloads ──────────────────────────────────────────

/** A pile on the board. */
export interface PileRef {
  readonly zone: Zone;
  readonly pileIndex: number;
}

/** Emitted after a card (or tableau run) is placed. */
export interface CardMovedPayload {
  readonly from: PileRef;
  readonly to: PileRef;
  /** Cards moved (more than one only for tableau runs). */
  readonly cardCount: number;
  /** Move count after this move. */
  readonly moveCount: number;
}

/** Emitted after cards are turned from the stock. */
export interface StockDrawnPayload {
  readonly cardCount: number;
  readonly moveCount: number;
}

/** Emitted after the waste is turned back into the stock. */
export interface WasteRecycledPayload {
  readonly stockSize: number;
}

/** Emitted after a stall-recovery burial. */
export interface CardBuriedPayload {
  readonly consecutiveBurials: number;
}

export interface UndoPayload {
  /** Move count after the undo. */
  readonly moveCount: number;
}

export interface GameWonPayload {
  readonly moveCount: number;
  readonly elapsedSeconds: number;
  readonly drawCount: DrawCount;
}

export interface GameLostPayload {
  readonly moveCount: number;
  readonly elapsedSeconds: number;
  readonly reason: string;
}

export interface GameRestartedPayload {
  readonly seed: number;
  readonly drawCount: DrawCount;
}

// ── Event Map ───────────────────────────────────────────────

export interface KlondikeEventMap {
  'card-moved': CardMovedPayload;
  'stock-drawn': StockDrawnPayload;
  'waste-recycled': WasteRecycledPayload;
  'card-buried': CardBuriedPayload;
  undo: UndoPayload;
  'game-won': GameWonPayload;
  'game-lost': GameLostPayload;
  'game-restarted': GameRestartedPayload;
}

export type KlondikeEventName = keyof KlondikeEventMap;

export type KlondikeEventEmitter = GameEventEmitter<KlondikeEventMap>;

export function createKlondikeEventEmitter(): KlondikeEventEmitter {
  return new GameEventEmitter<KlondikeEventMap>();
}
