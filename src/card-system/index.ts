/**
 * Card System Module
 *
 * Immutable card values, the Pile container, and deck helpers
 * shared by the Klondike rules and session modules.
 */
// Card types and helpers
export type { Card, Rank, Suit, SuitColor } from './Card';
export {
  ACE,
  KING,
  RANKS,
  SUITS,
  createCard,
  flipCard,
  faceUp,
  faceDown,
  suitColor,
  isOppositeColor,
  isRank,
  isSuit,
  rankLabel,
  cardLabel,
  cardKey,
} from './Card';

// Deck factory and operations
export { createStandardDeck, createDeckFrom, shuffle } from './Deck';

// Pile abstraction
export { Pile } from './Pile';
