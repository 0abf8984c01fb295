/**
 * Shared snapshot types for the Klondike engine.
 *
 * Provides the canonical CardSnapshot interface and the snapshotCard()
 * helper used to move cards across the persistence boundary. Game-specific record
 * layouts live beside each game's session module.
 */

import type { Card, Rank, Suit } from '../card-system/Card';

// ── Snapshot types ──────────────────────────────────────────

/**
 * Serializable card snapshot (no methods, plain JSON).
 */
export interface CardSnapshot {
  rank: Rank;
  suit: Suit;
  faceUp: boolean;
}

// ── Helpers ─────────────────────────────────────────────────

/**
 * Create a serializable snapshot of a card.
 *
 * Always includes `faceUp` so that a restored game has complete
 * visibility information.
 */
export function snapshotCard(card: Card): CardSnapshot {
  return {
    rank: card.rank,
    suit: card.suit,
    faceUp: card.faceUp,
  };
}
