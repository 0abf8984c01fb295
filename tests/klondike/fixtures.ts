/**
 * Shared builders for Klondike tests.
 */

import type { Card, Rank, Suit } from '../../src/card-system/Card';
import { createCard } from '../../src/card-system/Card';
import { Pile } from '../../src/card-system/Pile';
import type { DrawCount, KlondikeState } from '../../games/klondike/KlondikeState';
import { FOUNDATION_SUITS } from '../../games/klondike/KlondikeState';
import type { SessionRecord } from '../../games/klondike/SessionRecord';
import { snapshotState } from '../../games/klondike/SessionRecord';

export const up = (rank: Rank, suit: Suit): Card => createCard(rank, suit, true);
export const down = (rank: Rank, suit: Suit): Card => createCard(rank, suit, false);

export interface Layout {
  stock?: Card[];
  waste?: Card[];
  /** Foundation heights (0-13) in hearts, diamonds, clubs, spades order. */
  foundationHeights?: [number, number, number, number];
  tableau?: Card[][];
}

function foundationRun(suit: Suit, height: number): Pile {
  const pile = new Pile();
  for (let rank = 1; rank <= height; rank++) {
    pile.push(createCard(rankOf(rank), suit, true));
  }
  return pile;
}

function rankOf(value: number): Rank {
  const ranks: Rank[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13];
  const rank = ranks[value - 1];
  if (rank === undefined) throw new Error(`Bad rank ${value}`);
  return rank;
}

/** Build a state from a partial layout. Missing tableau piles are empty. */
export function makeState(layout: Layout = {}): KlondikeState {
  const heights = layout.foundationHeights ?? [0, 0, 0, 0];
  const tableau: Pile[] = [];
  for (let i = 0; i < 7; i++) {
    tableau.push(new Pile(layout.tableau?.[i] ?? []));
  }
  return {
    stock: new Pile(layout.stock ?? []),
    waste: new Pile(layout.waste ?? []),
    foundations: [
      foundationRun(FOUNDATION_SUITS[0], heights[0]),
      foundationRun(FOUNDATION_SUITS[1], heights[1]),
      foundationRun(FOUNDATION_SUITS[2], heights[2]),
      foundationRun(FOUNDATION_SUITS[3], heights[3]),
    ],
    tableau,
  };
}

/** Session record around a hand-built state. */
export function recordFor(
  state: KlondikeState,
  overrides: Partial<Omit<SessionRecord, 'state'>> = {},
): SessionRecord {
  const drawCount: DrawCount = overrides.drawCount ?? 1;
  return {
    state: snapshotState(state),
    moveCount: 0,
    elapsedSeconds: 0,
    madeProgressSinceLastRecycle: true,
    consecutiveBurials: 0,
    ...overrides,
    drawCount,
  };
}
