/**
 * Cursor navigation for keyboard-driven play.
 *
 * The board is two rows: STOCK, WASTE and FOUNDATION 0-3 on top,
 * TABLEAU 0-6 beneath. Movement is an explicit transition table
 * (zone x direction), so adding a zone or a direction fails to
 * compile until every entry is supplied.
 *
 * Navigation never fails: a move off the edge of the board leaves
 * the cursor where it is. The state is read only to find where a
 * tableau focus should rest.
 */

import type { Pile } from '../../src/card-system/Pile';
import type { KlondikeState, Zone } from './KlondikeState';
import { TABLEAU_COUNT, ZONE_PILE_COUNT } from './KlondikeState';
import { firstFaceUpIndex } from './KlondikeRules';

// ── Types ───────────────────────────────────────────────────

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface Cursor {
  readonly zone: Zone;
  /** 0-3 for foundations, 0-6 for tableau, 0 otherwise. */
  readonly pileIndex: number;
  /** Position within a tableau pile; 0 in every other zone. */
  readonly cardIndex: number;
}

type Transition = (cursor: Cursor, state: KlondikeState) => Cursor;

const LAST_FOUNDATION = ZONE_PILE_COUNT.foundation - 1;
const LAST_TABLEAU = TABLEAU_COUNT - 1;

// ── Building blocks ─────────────────────────────────────────

export function createCursor(): Cursor {
  return { zone: 'stock', pileIndex: 0, cardIndex: 0 };
}

const stay: Transition = (cursor) => cursor;

function focus(zone: Zone, pileIndex: number): Cursor {
  return { zone, pileIndex, cardIndex: 0 };
}

/** Enter a tableau pile, resting on its first face-up card. */
function enterTableau(pileIndex: number, state: KlondikeState): Cursor {
  return {
    zone: 'tableau',
    pileIndex,
    cardIndex: firstFaceUpIndex(state.tableau[pileIndex]),
  };
}

/** Foundation reached by moving up from a tableau pile (2-6). */
function foundationAbove(tableauPile: number): number {
  if (tableauPile <= 4) return 0;
  return Math.min(tableauPile - 5, LAST_FOUNDATION);
}

/** Tableau pile reached by moving down from a foundation. */
function tableauBelow(foundation: number): number {
  return Math.min(5 + Math.floor(foundation / 2), LAST_TABLEAU);
}

function leaveTableauUpward(pileIndex: number): Cursor {
  if (pileIndex === 0) return focus('stock', 0);
  if (pileIndex === 1) return focus('waste', 0);
  return focus('foundation', foundationAbove(pileIndex));
}

// ── Transition table ────────────────────────────────────────

const TRANSITIONS: Record<Zone, Record<Direction, Transition>> = {
  stock: {
    left: stay,
    right: () => focus('waste', 0),
    up: stay,
    down: (_, state) => enterTableau(0, state),
  },
  waste: {
    left: () => focus('stock', 0),
    right: () => focus('foundation', 0),
    up: stay,
    down: (_, state) => enterTableau(1, state),
  },
  foundation: {
    left: (c) =>
      c.pileIndex > 0 ? focus('foundation', c.pileIndex - 1) : focus('waste', 0),
    right: (c) =>
      c.pileIndex < LAST_FOUNDATION ? focus('foundation', c.pileIndex + 1) : c,
    up: stay,
    down: (c, state) => enterTableau(tableauBelow(c.pileIndex), state),
  },
  tableau: {
    left: (c, state) => (c.pileIndex > 0 ? enterTableau(c.pileIndex - 1, state) : c),
    right: (c, state) =>
      c.pileIndex < LAST_TABLEAU ? enterTableau(c.pileIndex + 1, state) : c,
    up: (c, state) => {
      const first = firstFaceUpIndex(state.tableau[c.pileIndex]);
      if (c.cardIndex > first) return { ...c, cardIndex: c.cardIndex - 1 };
      return leaveTableauUpward(c.pileIndex);
    },
    down: (c, state) => {
      const pile = state.tableau[c.pileIndex];
      if (c.cardIndex < pile.size() - 1) return { ...c, cardIndex: c.cardIndex + 1 };
      return c;
    },
  },
};

// ── Public API ──────────────────────────────────────────────

/** Cursor after moving one step in `direction`. */
export function moveCursor(
  cursor: Cursor,
  direction: Direction,
  state: KlondikeState,
): Cursor {
  return TRANSITIONS[cursor.zone][direction](cursor, state);
}

/**
 * Re-seat a tableau cursor after the pile under it changed: the
 * card index rises to the first face-up card and falls to the last
 * card. Other zones are returned unchanged.
 */
export function snapToSelectable(cursor: Cursor, state: KlondikeState): Cursor {
  if (cursor.zone !== 'tableau') return cursor;
  const pile: Pile = state.tableau[cursor.pileIndex];
  if (pile.isEmpty()) return { ...cursor, cardIndex: 0 };
  const cardIndex = Math.min(
    Math.max(cursor.cardIndex, firstFaceUpIndex(pile)),
    pile.size() - 1,
  );
  return cardIndex === cursor.cardIndex ? cursor : { ...cursor, cardIndex };
}

/** Whether a cursor names an existing pile (card index is not checked). */
export function isValidCursor(cursor: Cursor): boolean {
  return (
    Number.isInteger(cursor.pileIndex) &&
    cursor.pileIndex >= 0 &&
    cursor.pileIndex < ZONE_PILE_COUNT[cursor.zone] &&
    Number.isInteger(cursor.cardIndex) &&
    cursor.cardIndex >= 0
  );
}
