/**
 * Klondike state types.
 *
 * Defines the game-specific state for Klondike solitaire, kept
 * separate from the rules, the move executor, and the session so
 * each layer can be tested on its own.
 */

import type { Suit } from '../../src/card-system/Card';
import { Pile } from '../../src/card-system/Pile';

// ── Constants ───────────────────────────────────────────────

/** Number of foundation piles (one per suit). */
export const FOUNDATION_COUNT = 4;

/** Number of tableau piles. */
export const TABLEAU_COUNT = 7;

/** Total cards in play. */
export const DECK_SIZE = 52;

/** Foundation suit order: foundation `i` only accepts `FOUNDATION_SUITS[i]`. */
export const FOUNDATION_SUITS: readonly Suit[] = [
  'hearts',
  'diamonds',
  'clubs',
  'spades',
] as const;

// ── Zones ───────────────────────────────────────────────────

/** The four board regions a cursor or selection can refer to. */
export type Zone = 'stock' | 'waste' | 'foundation' | 'tableau';

/** Number of piles in each zone. */
export const ZONE_PILE_COUNT: Record<Zone, number> = {
  stock: 1,
  waste: 1,
  foundation: FOUNDATION_COUNT,
  tableau: TABLEAU_COUNT,
};

// ── Draw mode ───────────────────────────────────────────────

/** Cards turned per stock action. */
export type DrawCount = 1 | 3;

// ── Game state ──────────────────────────────────────────────

/**
 * Complete Klondike card layout.
 *
 * The 52 distinct cards appear exactly once across all piles.
 */
export interface KlondikeState {
  /** Face-down reserve. Top of pile = next card drawn. */
  readonly stock: Pile;
  /** Face-up draw target. Top of pile = most recently drawn card. */
  readonly waste: Pile;
  /**
   * Four foundation piles in FOUNDATION_SUITS order
   * (0=hearts, 1=diamonds, 2=clubs, 3=spades), built Ace to King.
   */
  readonly foundations: readonly [Pile, Pile, Pile, Pile];
  /**
   * Seven tableau piles. A face-down prefix may sit beneath
   * a face-up run.
   */
  readonly tableau: readonly Pile[];
}

/**
 * Independent deep copy of a state. Cards are immutable, so
 * copying every pile is sufficient.
 */
export function cloneState(state: KlondikeState): KlondikeState {
  return {
    stock: state.stock.clone(),
    waste: state.waste.clone(),
    foundations: [
      state.foundations[0].clone(),
      state.foundations[1].clone(),
      state.foundations[2].clone(),
      state.foundations[3].clone(),
    ],
    tableau: state.tableau.map((pile) => pile.clone()),
  };
}

/** Every pile in a fixed order: stock, waste, foundations, tableau. */
export function allPiles(state: KlondikeState): Pile[] {
  return [state.stock, state.waste, ...state.foundations, ...state.tableau];
}

// ── Selection and highlights ────────────────────────────────

/** A pending move source chosen by the player. */
export interface Selection {
  readonly zone: Zone;
  /** 0-3 for foundations, 0-6 for tableau, 0 otherwise. */
  readonly pileIndex: number;
  /** For tableau selections, the base card of the run. */
  readonly cardIndex: number;
}

/** Legal destinations for the active card, ascending. */
export interface HighlightedDestinations {
  readonly tableauPiles: readonly number[];
  readonly foundationPiles: readonly number[];
}

/** Total destinations across both categories. */
export function destinationCount(highlights: HighlightedDestinations): number {
  return highlights.tableauPiles.length + highlights.foundationPiles.length;
}
