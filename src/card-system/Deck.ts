/**
 * Deck operations for the Klondike engine.
 *
 * A Deck is represented as a plain Card array. This module provides
 * factory functions and a shuffle that work on plain Card arrays.
 */

import type { Card, Rank, Suit } from './Card';
import { RANKS, SUITS, createCard } from './Card';

/**
 * Create a standard 52-card deck (no jokers), all cards face-down.
 *
 * Cards are ordered by suit (foundation order) then rank (A through K).
 */
export function createStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Create a deck from a specific list of rank/suit pairs.
 * All cards are created face-down by default.
 */
export function createDeckFrom(
  cards: ReadonlyArray<{ rank: Rank; suit: Suit; faceUp?: boolean }>,
): Card[] {
  return cards.map((c) => createCard(c.rank, c.suit, c.faceUp ?? false));
}

/**
 * Shuffle a deck in place using the Fisher-Yates algorithm.
 *
 * An optional random number generator can be supplied for
 * deterministic dealing. The generator must return a value
 * in [0, 1) (same contract as Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle(
  deck: Card[],
  rng: () => number = Math.random,
): Card[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}
