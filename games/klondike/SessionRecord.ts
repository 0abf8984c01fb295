/**
 * Plain-record form of a Klondike session for external persistence.
 *
 * The engine never touches storage. A front end asks the session for
 * a SessionRecord, writes it wherever it likes (JSON file, save slot,
 * browser storage), and later hands the parsed JSON back to
 * `parseSessionRecord` before resuming.
 *
 * Loading happens in two steps:
 *   1. Validation -- the JSON schema checks the record's shape, then
 *      the layout is checked for a complete, legal set of 52 cards.
 *   2. Migration -- records written before stall tracking existed
 *      omit its two fields; they are filled in once here
 *      (`madeProgressSinceLastRecycle = true`, `consecutiveBurials = 0`),
 *      so a resumed game starts with no stall history.
 */

import Ajv from 'ajv';
import type { Card } from '../../src/card-system/Card';
import { cardKey, cardLabel } from '../../src/card-system/Card';
import { createDeckFrom } from '../../src/card-system/Deck';
import { Pile } from '../../src/card-system/Pile';
import type { CardSnapshot } from '../../src/core-engine/CardSnapshot';
import { snapshotCard } from '../../src/core-engine/CardSnapshot';
import type { DrawCount, KlondikeState } from './KlondikeState';
import { DECK_SIZE, FOUNDATION_SUITS, allPiles } from './KlondikeState';
import schema from './schemas/session-record.schema.json';

// ── Record types ────────────────────────────────────────────

/** Card layout, every pile listed bottom to top. */
export interface StateRecord {
  stock: CardSnapshot[];
  waste: CardSnapshot[];
  foundations: CardSnapshot[][];
  tableau: CardSnapshot[][];
}

/** A complete, current-format session record. */
export interface SessionRecord {
  state: StateRecord;
  moveCount: number;
  elapsedSeconds: number;
  drawCount: DrawCount;
  madeProgressSinceLastRecycle: boolean;
  consecutiveBurials: number;
}

/** A record as found in storage: stall tracking may be absent. */
export type StoredSessionRecord = Omit<
  SessionRecord,
  'madeProgressSinceLastRecycle' | 'consecutiveBurials'
> &
  Partial<Pick<SessionRecord, 'madeProgressSinceLastRecycle' | 'consecutiveBurials'>>;

/** Thrown when a stored record cannot be resumed. */
export class SessionRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionRecordError';
  }
}

// ── Validation ──────────────────────────────────────────────

const ajv = new Ajv({ allErrors: true });
const validateStoredRecord = ajv.compile<StoredSessionRecord>(schema);

// ── State conversion ────────────────────────────────────────

function snapshotPile(pile: Pile): CardSnapshot[] {
  return pile.toArray().map(snapshotCard);
}

function restorePile(cards: readonly CardSnapshot[]): Pile {
  return new Pile(createDeckFrom(cards));
}

/** Serializable copy of a card layout. */
export function snapshotState(state: KlondikeState): StateRecord {
  return {
    stock: snapshotPile(state.stock),
    waste: snapshotPile(state.waste),
    foundations: state.foundations.map(snapshotPile),
    tableau: state.tableau.map(snapshotPile),
  };
}

/**
 * Rebuild a card layout from its record.
 *
 * @throws SessionRecordError if the record does not hold exactly
 *         four foundations and seven tableau piles.
 */
export function restoreState(record: StateRecord): KlondikeState {
  const [f0, f1, f2, f3] = record.foundations;
  if (record.foundations.length !== 4 || !f0 || !f1 || !f2 || !f3) {
    throw new SessionRecordError('Expected 4 foundations');
  }
  if (record.tableau.length !== 7) {
    throw new SessionRecordError(
      `Expected 7 tableau piles, got ${record.tableau.length}`,
    );
  }
  return {
    stock: restorePile(record.stock),
    waste: restorePile(record.waste),
    foundations: [restorePile(f0), restorePile(f1), restorePile(f2), restorePile(f3)],
    tableau: record.tableau.map(restorePile),
  };
}

/**
 * Describe the first layout problem found, or return null when
 * every card appears once and each foundation is an in-suit run
 * from the Ace.
 */
export function findLayoutProblem(state: KlondikeState): string | null {
  const seen = new Set<string>();
  let total = 0;
  for (const pile of allPiles(state)) {
    for (const card of pile.toArray()) {
      const key = cardKey(card);
      if (seen.has(key)) return `Duplicate card ${key}`;
      seen.add(key);
      total++;
    }
  }
  if (total !== DECK_SIZE) {
    return `Expected ${DECK_SIZE} cards, found ${total}`;
  }

  for (let fi = 0; fi < state.foundations.length; fi++) {
    const cards: Card[] = state.foundations[fi].toArray();
    for (let i = 0; i < cards.length; i++) {
      const card = cards[i];
      if (card.suit !== FOUNDATION_SUITS[fi] || card.rank !== i + 1) {
        return `Foundation ${fi} is out of order at ${cardLabel(card)}`;
      }
    }
  }
  return null;
}

// ── Migration ───────────────────────────────────────────────

/**
 * Fill in fields that older records omit. Missing stall tracking
 * defaults to "progress made, no burials".
 */
export function migrateSessionRecord(stored: StoredSessionRecord): SessionRecord {
  const missing =
    stored.madeProgressSinceLastRecycle === undefined ||
    stored.consecutiveBurials === undefined;
  if (missing) {
    console.warn(
      '[SessionRecord] Stall-tracking fields missing; resuming with no stall history.',
    );
  }
  return {
    ...stored,
    madeProgressSinceLastRecycle: stored.madeProgressSinceLastRecycle ?? true,
    consecutiveBurials: stored.consecutiveBurials ?? 0,
  };
}

/**
 * Validate and migrate a parsed JSON value into a SessionRecord.
 *
 * @throws SessionRecordError if the value does not match the record
 *         schema or its cards do not form a legal layout.
 */
export function parseSessionRecord(raw: unknown): SessionRecord {
  if (!validateStoredRecord(raw)) {
    throw new SessionRecordError(
      `Invalid session record: ${ajv.errorsText(validateStoredRecord.errors)}`,
    );
  }

  const problem = findLayoutProblem(restoreState(raw.state));
  if (problem !== null) {
    throw new SessionRecordError(`Invalid session record: ${problem}`);
  }

  return migrateSessionRecord(raw);
}
