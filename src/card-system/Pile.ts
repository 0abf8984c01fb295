/**
 * Pile abstraction for the Klondike engine.
 *
 * A Pile is a stack of cards (LIFO). It wraps a Card array and
 * exposes push, pop, peek, isEmpty, and size operations, plus the
 * handful of positional operations solitaire needs (taking a run
 * from the middle, burying a card at the bottom).
 *
 * Piles are used for the stock, the waste, foundations, and
 * tableau columns.
 */

import type { Card } from './Card';

export class Pile {
  private readonly cards: Card[];

  /**
   * Create a Pile, optionally pre-populated with cards.
   * The last element of the array is treated as the top of the pile.
   */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  /** Push one or more cards onto the top of the pile. */
  push(...newCards: Card[]): void {
    this.cards.push(...newCards);
  }

  /**
   * Remove and return the top card.
   * @returns The top card, or `undefined` if the pile is empty.
   */
  pop(): Card | undefined {
    return this.cards.pop();
  }

  /**
   * Remove and return the top card, throwing if the pile is empty.
   */
  popOrThrow(): Card {
    const card = this.cards.pop();
    if (card === undefined) {
      throw new Error('Cannot pop from an empty pile');
    }
    return card;
  }

  /**
   * Look at the top card without removing it.
   * @returns The top card, or `undefined` if the pile is empty.
   */
  peek(): Card | undefined {
    return this.cards.length > 0
      ? this.cards[this.cards.length - 1]
      : undefined;
  }

  /**
   * Card at a position counted from the bottom (0).
   * @returns The card, or `undefined` if the index is out of range.
   */
  at(index: number): Card | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.cards.length) {
      return undefined;
    }
    return this.cards[index];
  }

  /**
   * Remove and return every card from `index` to the top, bottom first.
   * Returns an empty array when the index is out of range.
   */
  takeFrom(index: number): Card[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.cards.length) {
      return [];
    }
    return this.cards.splice(index);
  }

  /** Insert a card beneath every other card. */
  insertBottom(card: Card): void {
    this.cards.unshift(card);
  }

  /**
   * Replace the top card (used for flips, since cards are immutable).
   * @throws If the pile is empty.
   */
  replaceTop(card: Card): void {
    if (this.cards.length === 0) {
      throw new Error('Cannot replace the top of an empty pile');
    }
    this.cards[this.cards.length - 1] = card;
  }

  /** Whether the pile contains no cards. */
  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  /** The number of cards in the pile. */
  size(): number {
    return this.cards.length;
  }

  /**
   * Return a shallow copy of all cards in the pile (bottom to top).
   * Useful for inspection and serialization.
   */
  toArray(): Card[] {
    return [...this.cards];
  }

  /**
   * Independent copy of this pile. Cards are immutable values, so
   * copying the array is a deep copy.
   */
  clone(): Pile {
    return new Pile(this.cards);
  }
}
