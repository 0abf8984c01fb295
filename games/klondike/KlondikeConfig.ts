/**
 * Klondike session configuration.
 *
 * Callers pass a partial options object; `createKlondikeConfig`
 * fills defaults and rejects values the engine cannot play.
 */

import { randomSeed } from '../../src/core-engine/SeededRng';
import { DEFAULT_UNDO_CAPACITY } from '../../src/core-engine/UndoManager';
import type { DrawCount } from './KlondikeState';

/** Options for configuring a Klondike session. */
export interface KlondikeConfigOptions {
  /** Cards turned per stock action: 1 or 3. Defaults to 1. */
  drawCount?: number;
  /** Deal seed. Defaults to a random seed. */
  seed?: number;
  /** Undo snapshots retained. Defaults to 100. */
  undoCapacity?: number;
}

/** Fully resolved configuration. */
export interface KlondikeConfig {
  readonly drawCount: DrawCount;
  readonly seed: number;
  readonly undoCapacity: number;
}

export function isDrawCount(value: number): value is DrawCount {
  return value === 1 || value === 3;
}

/**
 * Resolve options into a config.
 *
 * @throws If `drawCount` is not 1 or 3.
 * @throws If `seed` is not a finite number.
 * @throws If `undoCapacity` is not a positive integer.
 */
export function createKlondikeConfig(
  options: KlondikeConfigOptions = {},
): KlondikeConfig {
  const {
    drawCount = 1,
    seed = randomSeed(),
    undoCapacity = DEFAULT_UNDO_CAPACITY,
  } = options;

  if (!isDrawCount(drawCount)) {
    throw new Error(`drawCount must be 1 or 3, got ${drawCount}`);
  }
  if (!Number.isFinite(seed)) {
    throw new Error(`seed must be a finite number, got ${seed}`);
  }
  if (!Number.isInteger(undoCapacity) || undoCapacity < 1) {
    throw new Error(
      `undoCapacity must be a positive integer, got ${undoCapacity}`,
    );
  }

  return { drawCount, seed, undoCapacity };
}
