/**
 * Klondike deal.
 *
 * Shuffles a standard deck with a seeded RNG and lays out the
 * opening position:
 * - 7 tableau piles holding 1, 2, ..., 7 cards.
 * - Only the last card dealt to each pile starts face-up.
 * - The remaining 24 cards form the face-down stock.
 *
 * The same seed always yields the same layout.
 */

import { faceUp } from '../../src/card-system/Card';
import { createStandardDeck, shuffle } from '../../src/card-system/Deck';
import { Pile } from '../../src/card-system/Pile';
import { createSeededRng } from '../../src/core-engine/SeededRng';
import type { KlondikeState } from './KlondikeState';
import { DECK_SIZE, TABLEAU_COUNT } from './KlondikeState';

/** Cards left in the stock after the tableau is dealt. */
export const STOCK_SIZE_AFTER_DEAL = DECK_SIZE - (TABLEAU_COUNT * (TABLEAU_COUNT + 1)) / 2;

/**
 * Deal a new Klondike game.
 *
 * Cards are dealt pile by pile from the front of the shuffled deck;
 * whatever remains becomes the stock, whose last element is its top.
 *
 * @param seed  Numeric seed for deterministic shuffling.
 */
export function deal(seed: number): KlondikeState {
  const deck = shuffle(createStandardDeck(), createSeededRng(seed));

  let next = 0;
  const tableau: Pile[] = [];
  for (let pileIndex = 0; pileIndex < TABLEAU_COUNT; pileIndex++) {
    const pileSize = pileIndex + 1;
    const cards = deck.slice(next, next + pileSize);
    next += pileSize;
    cards[cards.length - 1] = faceUp(cards[cards.length - 1]);
    tableau.push(new Pile(cards));
  }

  return {
    stock: new Pile(deck.slice(next)),
    waste: new Pile(),
    foundations: [new Pile(), new Pile(), new Pile(), new Pile()],
    tableau,
  };
}
