/**
 * Klondike move executor.
 *
 * Each operation mutates the state passed in and reports a
 * MoveResult. Every check runs before the first mutation, so a
 * failed move leaves the state exactly as it was. Nothing here
 * throws for an illegal or malformed move; out-of-range indices are
 * reported as ordinary failures.
 */

import { faceDown, faceUp } from '../../src/card-system/Card';
import type { Pile } from '../../src/card-system/Pile';
import type { KlondikeState } from './KlondikeState';
import { FOUNDATION_SUITS } from './KlondikeState';
import {
  canDrawFromStock,
  canPickFromTableau,
  canPickFromWaste,
  canPlaceOnFoundation,
  canPlaceOnTableau,
  isFoundationIndex,
  isTableauIndex,
} from './KlondikeRules';

// ── Result type ─────────────────────────────────────────────

/** Outcome of a move attempt. `message` is empty on success. */
export interface MoveResult {
  readonly success: boolean;
  readonly message: string;
}

const OK: MoveResult = { success: true, message: '' };

function fail(message: string): MoveResult {
  return { success: false, message };
}

const NO_TABLEAU = 'No such tableau pile';
const NO_FOUNDATION = 'No such foundation';

// ── Helpers ─────────────────────────────────────────────────

/** Auto-reveal: turn a pile's new top card face-up. */
function revealTop(pile: Pile): void {
  const top = pile.peek();
  if (top && !top.faceUp) {
    pile.replaceTop(faceUp(top));
  }
}

// ── Tableau moves ───────────────────────────────────────────

/**
 * Move the run starting at `cardIndex` in `srcPile` onto `destPile`.
 * The newly exposed source card is turned face-up.
 */
export function moveTableauToTableau(
  state: KlondikeState,
  srcPile: number,
  cardIndex: number,
  destPile: number,
): MoveResult {
  if (!isTableauIndex(srcPile) || !isTableauIndex(destPile)) {
    return fail(NO_TABLEAU);
  }
  if (srcPile === destPile) return fail('Cannot place there');

  const src = state.tableau[srcPile];
  const dest = state.tableau[destPile];

  const base = src.at(cardIndex);
  if (!base || !canPickFromTableau(src, cardIndex)) {
    return fail('Cannot pick from that position');
  }
  if (!canPlaceOnTableau(base, dest)) return fail('Cannot place there');

  dest.push(...src.takeFrom(cardIndex));
  revealTop(src);
  return OK;
}

/** Move the top waste card onto a tableau pile. */
export function moveWasteToTableau(
  state: KlondikeState,
  destPile: number,
): MoveResult {
  if (!isTableauIndex(destPile)) return fail(NO_TABLEAU);

  const card = state.waste.peek();
  if (!card || !canPickFromWaste(state)) return fail('Waste is empty');
  if (!canPlaceOnTableau(card, state.tableau[destPile])) {
    return fail('Cannot place there');
  }

  state.tableau[destPile].push(state.waste.popOrThrow());
  return OK;
}

/** Move the top waste card onto a foundation. */
export function moveWasteToFoundation(
  state: KlondikeState,
  destFoundation: number,
): MoveResult {
  if (!isFoundationIndex(destFoundation)) return fail(NO_FOUNDATION);

  const card = state.waste.peek();
  if (!card || !canPickFromWaste(state)) return fail('Waste is empty');

  const dest = state.foundations[destFoundation];
  if (!canPlaceOnFoundation(card, dest, FOUNDATION_SUITS[destFoundation])) {
    return fail('Cannot place on foundation');
  }

  dest.push(state.waste.popOrThrow());
  return OK;
}

/**
 * Move the single top card of a tableau pile onto a foundation.
 * The newly exposed source card is turned face-up.
 */
export function moveTableauToFoundation(
  state: KlondikeState,
  srcPile: number,
  destFoundation: number,
): MoveResult {
  if (!isTableauIndex(srcPile)) return fail(NO_TABLEAU);
  if (!isFoundationIndex(destFoundation)) return fail(NO_FOUNDATION);

  const src = state.tableau[srcPile];
  const card = src.peek();
  if (!card) return fail('Tableau pile is empty');
  if (!card.faceUp) return fail('Cannot move face-down card');

  const dest = state.foundations[destFoundation];
  if (!canPlaceOnFoundation(card, dest, FOUNDATION_SUITS[destFoundation])) {
    return fail('Cannot place on foundation');
  }

  dest.push(src.popOrThrow());
  revealTop(src);
  return OK;
}

/** Move the top foundation card back onto a tableau pile. */
export function moveFoundationToTableau(
  state: KlondikeState,
  srcFoundation: number,
  destPile: number,
): MoveResult {
  if (!isFoundationIndex(srcFoundation)) return fail(NO_FOUNDATION);
  if (!isTableauIndex(destPile)) return fail(NO_TABLEAU);

  const src = state.foundations[srcFoundation];
  const card = src.peek();
  if (!card) return fail('Foundation is empty');
  if (!canPlaceOnTableau(card, state.tableau[destPile])) {
    return fail('Cannot place on tableau');
  }

  state.tableau[destPile].push(src.popOrThrow());
  return OK;
}

// ── Stock moves ─────────────────────────────────────────────

/**
 * Turn up to `drawCount` cards from the stock onto the waste,
 * face-up, in the order they leave the stock.
 */
export function drawFromStock(
  state: KlondikeState,
  drawCount: number,
): MoveResult {
  if (!canDrawFromStock(state)) return fail('Stock is empty');

  const count = Math.min(Math.max(1, Math.trunc(drawCount)), state.stock.size());
  for (let i = 0; i < count; i++) {
    state.waste.push(faceUp(state.stock.popOrThrow()));
  }
  return OK;
}

/**
 * Return the whole waste to the empty stock, face-down. Taking
 * from the waste top and pushing onto the stock reverses the order,
 * so the next pass draws the cards in the same sequence as before.
 */
export function recycleWasteToStock(state: KlondikeState): MoveResult {
  if (!state.stock.isEmpty()) return fail('Stock is not empty');
  if (state.waste.isEmpty()) return fail('Waste is empty');

  let card = state.waste.pop();
  while (card !== undefined) {
    state.stock.push(faceDown(card));
    card = state.waste.pop();
  }
  return OK;
}

/**
 * Move the stock's top card beneath the rest of the stock. A
 * one-card stock is unchanged.
 */
export function buryTopOfStock(state: KlondikeState): MoveResult {
  const top = state.stock.pop();
  if (top === undefined) return fail('Stock is empty');
  state.stock.insertBottom(top);
  return OK;
}
