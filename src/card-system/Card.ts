/**
 * Card types and factory functions for the Klondike engine.
 *
 * Defines Rank, Suit, and Card as the foundational data model
 * consumed by every other module. Cards are immutable values:
 * flipping a card produces a new card.
 */

/** Card ranks, Ace low (1) through King (13). */
export type Rank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13;

/** All ranks in order (Ace low). */
export const RANKS: readonly Rank[] = [
  1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13,
] as const;

export const ACE: Rank = 1;
export const KING: Rank = 13;

/** Standard playing card suits. */
export type Suit = 'hearts' | 'diamonds' | 'clubs' | 'spades';

/** All suits, in foundation order. */
export const SUITS: readonly Suit[] = [
  'hearts',
  'diamonds',
  'clubs',
  'spades',
] as const;

export type SuitColor = 'red' | 'black';

const RANK_LABELS: Record<Rank, string> = {
  1: 'A',
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: '10',
  11: 'J',
  12: 'Q',
  13: 'K',
};

const SUIT_SYMBOLS: Record<Suit, string> = {
  hearts: '♥',
  diamonds: '♦',
  clubs: '♣',
  spades: '♠',
};

/**
 * A playing card with rank, suit, and face-up/face-down state.
 *
 * Two cards are equal only when all three fields match, so a
 * face-down Five differs from a face-up Five.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
  readonly faceUp: boolean;
}

/**
 * Create a single card, face-down by default.
 */
export function createCard(
  rank: Rank,
  suit: Suit,
  faceUp: boolean = false,
): Card {
  return { rank, suit, faceUp };
}

/** Return a copy of the card with its face-up flag inverted. */
export function flipCard(card: Card): Card {
  return createCard(card.rank, card.suit, !card.faceUp);
}

/** Return the card face-up, flipping only if needed. */
export function faceUp(card: Card): Card {
  return card.faceUp ? card : flipCard(card);
}

/** Return the card face-down, flipping only if needed. */
export function faceDown(card: Card): Card {
  return card.faceUp ? flipCard(card) : card;
}

export function suitColor(suit: Suit): SuitColor {
  switch (suit) {
    case 'hearts':
    case 'diamonds':
      return 'red';
    case 'clubs':
    case 'spades':
      return 'black';
  }
}

export function isOppositeColor(a: Card, b: Card): boolean {
  return suitColor(a.suit) !== suitColor(b.suit);
}

export function isRank(value: number): value is Rank {
  return Number.isInteger(value) && value >= ACE && value <= KING;
}

export function isSuit(value: string): value is Suit {
  return (SUITS as readonly string[]).includes(value);
}

/** Short label for a rank: A, 2..10, J, Q, K. */
export function rankLabel(rank: Rank): string {
  return RANK_LABELS[rank];
}

/**
 * Human-readable card label such as `10♥`. Face-down cards
 * render as `##`.
 */
export function cardLabel(card: Card): string {
  if (!card.faceUp) return '##';
  return `${RANK_LABELS[card.rank]}${SUIT_SYMBOLS[card.suit]}`;
}

/** Identity key ignoring face-up state, e.g. `13:spades`. */
export function cardKey(card: Card): string {
  return `${card.rank}:${card.suit}`;
}
