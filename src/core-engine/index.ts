/**
 * Core Engine Module
 *
 * Game-agnostic building blocks: deterministic seeding, bounded
 * snapshot undo, an elapsed-time clock, a typed event emitter, and
 * plain card snapshots for persistence.
 */
// Deterministic seeding
export { createSeededRng, randomSeed } from './SeededRng';

// Snapshot undo
export type { UndoManagerOptions } from './UndoManager';
export { DEFAULT_UNDO_CAPACITY, UndoManager } from './UndoManager';

// Game timer
export type { Clock, TimerState } from './GameTimer';
export { GameTimer } from './GameTimer';

// Game event system
export type { GameEventListener } from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Card snapshots
export type { CardSnapshot } from './CardSnapshot';
export { snapshotCard } from './CardSnapshot';
