/**
 * Klondike game rules.
 *
 * All functions are pure predicates over the state; nothing here
 * mutates. The move executor and the session consult these before
 * changing anything.
 *
 * Klondike rules:
 * - Tableau piles build down in alternating colours. Only a King
 *   may start an empty pile.
 * - Foundations build up by suit from Ace to King; each foundation
 *   holds one fixed suit.
 * - Any face-up tableau card may be picked up together with the
 *   cards above it.
 * - Win: all 52 cards on the foundations.
 */

import type { Card, Suit } from '../../src/card-system/Card';
import { ACE, KING, isOppositeColor } from '../../src/card-system/Card';
import type { Pile } from '../../src/card-system/Pile';
import type { KlondikeState } from './KlondikeState';
import {
  DECK_SIZE,
  FOUNDATION_COUNT,
  FOUNDATION_SUITS,
  TABLEAU_COUNT,
} from './KlondikeState';

// ── Index helpers ───────────────────────────────────────────

export function isTableauIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < TABLEAU_COUNT;
}

export function isFoundationIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < FOUNDATION_COUNT;
}

/** Foundation index that accepts the given suit. */
export function foundationIndexOf(suit: Suit): number {
  return FOUNDATION_SUITS.indexOf(suit);
}

// ── Placement ───────────────────────────────────────────────

/**
 * Whether `card` may be placed on a tableau pile.
 *
 * Legal when the pile is empty and the card is a King, or the
 * pile's top card is face-up, of the opposite colour, and exactly
 * one rank higher.
 */
export function canPlaceOnTableau(card: Card, pile: Pile): boolean {
  const top = pile.peek();
  if (!top) return card.rank === KING;
  if (!top.faceUp) return false;
  if (!isOppositeColor(card, top)) return false;
  return card.rank === top.rank - 1;
}

/**
 * Whether `card` may be placed on a foundation pile that builds
 * `expectedSuit`.
 *
 * Legal when the suit matches and the card is an Ace on an empty
 * pile, or exactly one rank above the pile's top card.
 */
export function canPlaceOnFoundation(
  card: Card,
  pile: Pile,
  expectedSuit: Suit,
): boolean {
  if (card.suit !== expectedSuit) return false;
  const top = pile.peek();
  if (!top) return card.rank === ACE;
  return card.rank === top.rank + 1;
}

// ── Picking ─────────────────────────────────────────────────

/** Whether the run starting at `index` can be picked up. */
export function canPickFromTableau(pile: Pile, index: number): boolean {
  const card = pile.at(index);
  return card !== undefined && card.faceUp;
}

export function canPickFromWaste(state: KlondikeState): boolean {
  return !state.waste.isEmpty();
}

export function canDrawFromStock(state: KlondikeState): boolean {
  return !state.stock.isEmpty();
}

// ── Destinations ────────────────────────────────────────────

/** Tableau piles (ascending) that accept `card`. */
export function validTableauDestinations(
  card: Card,
  state: KlondikeState,
): number[] {
  const valid: number[] = [];
  state.tableau.forEach((pile, index) => {
    if (canPlaceOnTableau(card, pile)) valid.push(index);
  });
  return valid;
}

/** Foundations (ascending) that accept `card`. */
export function validFoundationDestinations(
  card: Card,
  state: KlondikeState,
): number[] {
  const valid: number[] = [];
  state.foundations.forEach((pile, index) => {
    if (canPlaceOnFoundation(card, pile, FOUNDATION_SUITS[index])) {
      valid.push(index);
    }
  });
  return valid;
}

// ── Layout checks ───────────────────────────────────────────

/**
 * Whether `cards` (bottom to top) form a movable run: all face-up,
 * strictly descending by one, alternating colours.
 */
export function isValidTableauRun(cards: readonly Card[]): boolean {
  for (let i = 0; i < cards.length; i++) {
    if (!cards[i].faceUp) return false;
    if (i === 0) continue;
    const below = cards[i - 1];
    if (cards[i].rank !== below.rank - 1) return false;
    if (!isOppositeColor(cards[i], below)) return false;
  }
  return true;
}

/** Index of the first face-up card in a pile, or 0 when there is none. */
export function firstFaceUpIndex(pile: Pile): number {
  const index = pile.toArray().findIndex((card) => card.faceUp);
  return index === -1 ? 0 : index;
}

/** Number of cards moved when picking from `cardIndex` to the top. */
export function runLength(pile: Pile, cardIndex: number): number {
  return Math.max(0, pile.size() - cardIndex);
}

/**
 * Check if the game is won (all 52 cards on foundations).
 */
export function isWon(state: KlondikeState): boolean {
  const total = state.foundations.reduce((sum, pile) => sum + pile.size(), 0);
  return total === DECK_SIZE;
}
