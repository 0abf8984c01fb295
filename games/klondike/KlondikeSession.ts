/**
 * Klondike session controller -- ties together the dealer, rules,
 * move executor, cursor, undo history, and timer into a playable game.
 *
 * The session receives one abstract action at a time (see
 * KlondikeAction), so it knows nothing about keys, mice or terminals.
 * Every action reports an ActionResult and leaves a status message
 * for the front end to display verbatim.
 *
 * Selection protocol:
 *   idle --select--> selected --place (success) / cancel--> idle
 *   A failed place keeps the selection.
 *
 * Stall tracking (stock action with an empty stock and a non-empty
 * waste, i.e. a pass just finished):
 *   - Progress since the last recycle: recycle, then clear the flag.
 *   - No progress, draw-1: the game is lost.
 *   - No progress, draw-3: lost after two burials without progress;
 *     otherwise the BuryDecider chooses between burying one card
 *     (then recycling) and conceding.
 *   Any successful placement sets the progress flag and clears the
 *   burial count.
 *
 * Win and loss are terminal until `restart()`.
 */

import type { Card } from '../../src/card-system/Card';
import { cardLabel } from '../../src/card-system/Card';
import type { Clock } from '../../src/core-engine/GameTimer';
import { GameTimer } from '../../src/core-engine/GameTimer';
import { randomSeed } from '../../src/core-engine/SeededRng';
import { UndoManager } from '../../src/core-engine/UndoManager';
import type { Cursor, Direction } from './CursorNavigator';
import {
  createCursor,
  isValidCursor,
  moveCursor,
  snapToSelectable,
} from './CursorNavigator';
import type { KlondikeConfig, KlondikeConfigOptions } from './KlondikeConfig';
import { createKlondikeConfig } from './KlondikeConfig';
import { deal } from './KlondikeDealer';
import type { KlondikeEventEmitter, PileRef } from './KlondikeEvents';
import { createKlondikeEventEmitter } from './KlondikeEvents';
import type { MoveResult } from './KlondikeMoves';
import {
  buryTopOfStock,
  drawFromStock,
  moveFoundationToTableau,
  moveTableauToFoundation,
  moveTableauToTableau,
  moveWasteToFoundation,
  moveWasteToTableau,
  recycleWasteToStock,
} from './KlondikeMoves';
import {
  canPickFromTableau,
  canPickFromWaste,
  isWon,
  runLength,
  validFoundationDestinations,
  validTableauDestinations,
} from './KlondikeRules';
import type {
  DrawCount,
  HighlightedDestinations,
  KlondikeState,
  Selection,
} from './KlondikeState';
import { cloneState, destinationCount } from './KlondikeState';
import type { SessionRecord } from './SessionRecord';
import { restoreState, snapshotState } from './SessionRecord';

// ── Public types ────────────────────────────────────────────

export type SessionStatus = 'playing' | 'won' | 'lost';

/** Outcome of a session action; `message` is also left on the session. */
export interface ActionResult {
  readonly success: boolean;
  readonly message: string;
}

/** What the front end knows when asked whether to bury a card. */
export interface BuryContext {
  /** Burials already made without intervening progress (0 or 1). */
  readonly consecutiveBurials: number;
  /** Cards about to be recycled from the waste. */
  readonly wasteSize: number;
}

/**
 * Synchronous draw-3 stall decision: `true` buries the next stock
 * card and keeps playing, `false` concedes the game.
 */
export type BuryDecider = (context: BuryContext) => boolean;

/** Abstract player actions, decoded from input by the front end. */
export type KlondikeAction =
  | { readonly kind: 'move-cursor'; readonly direction: Direction }
  | { readonly kind: 'focus'; readonly cursor: Cursor }
  | { readonly kind: 'select' }
  | { readonly kind: 'place' }
  | { readonly kind: 'confirm' }
  | { readonly kind: 'cancel' }
  | { readonly kind: 'stock' }
  | { readonly kind: 'show-destinations' }
  | { readonly kind: 'undo' }
  | { readonly kind: 'restart'; readonly seed?: number };

export interface KlondikeSessionOptions extends KlondikeConfigOptions {
  /** Draw-3 stall decision. Defaults to always conceding. */
  buryDecider?: BuryDecider;
  /** Time source for the game timer (milliseconds). */
  clock?: Clock;
  /** Receives session events. A fresh emitter is created if omitted. */
  events?: KlondikeEventEmitter;
}

/** Read-only snapshot handed to a renderer. */
export interface SessionView {
  readonly state: KlondikeState;
  readonly cursor: Cursor;
  readonly selection: Selection | null;
  readonly highlighted: HighlightedDestinations | null;
  readonly message: string;
  readonly moveCount: number;
  readonly elapsedSeconds: number;
  readonly status: SessionStatus;
  readonly drawCount: DrawCount;
}

// ── Messages ────────────────────────────────────────────────

export const WELCOME_MESSAGE =
  'Welcome to Solitaire! Move the cursor and select a card.';
export const GAME_OVER_MESSAGE = 'Game over. Restart to play again.';
export const LOSS_MESSAGE = 'No legal moves remain. Game over.';

// ── Undo entry ──────────────────────────────────────────────

/**
 * One undo step: the card layout plus the counters that travel
 * with it.
 */
interface UndoEntry {
  readonly state: KlondikeState;
  readonly moveCount: number;
  readonly madeProgressSinceLastRecycle: boolean;
  readonly consecutiveBurials: number;
}

function cloneEntry(entry: UndoEntry): UndoEntry {
  return { ...entry, state: cloneState(entry.state) };
}

const declineBury: BuryDecider = () => false;

// ── Session ─────────────────────────────────────────────────

export class KlondikeSession {
  readonly events: KlondikeEventEmitter;

  private config: KlondikeConfig;
  private readonly buryDecider: BuryDecider;
  private readonly timer: GameTimer;
  private readonly history: UndoManager<UndoEntry>;

  private _state: KlondikeState;
  private _cursor: Cursor = createCursor();
  private _selection: Selection | null = null;
  private _highlighted: HighlightedDestinations | null = null;
  private _moveCount = 0;
  private _message = WELCOME_MESSAGE;
  private _status: SessionStatus = 'playing';
  private _madeProgressSinceLastRecycle = true;
  private _consecutiveBurials = 0;

  /**
   * @throws If the options fail configuration checks (see
   *         createKlondikeConfig).
   */
  constructor(options: KlondikeSessionOptions = {}) {
    this.config = createKlondikeConfig(options);
    this.buryDecider = options.buryDecider ?? declineBury;
    this.timer = new GameTimer(options.clock);
    this.events = options.events ?? createKlondikeEventEmitter();
    this.history = new UndoManager<UndoEntry>({
      clone: cloneEntry,
      capacity: this.config.undoCapacity,
    });
    this._state = deal(this.config.seed);
  }

  /**
   * Resume a session from a validated record (see parseSessionRecord).
   * The draw count comes from the record; other options apply as usual.
   */
  static fromRecord(
    record: SessionRecord,
    options: Omit<KlondikeSessionOptions, 'drawCount'> = {},
  ): KlondikeSession {
    const session = new KlondikeSession({ ...options, drawCount: record.drawCount });
    session._state = restoreState(record.state);
    session._moveCount = record.moveCount;
    session._madeProgressSinceLastRecycle = record.madeProgressSinceLastRecycle;
    session._consecutiveBurials = record.consecutiveBurials;
    session._status = isWon(session._state) ? 'won' : 'playing';
    session._message = 'Game restored.';
    session.timer.setElapsedSeconds(record.elapsedSeconds);
    return session;
  }

  // ── Read-only accessors ─────────────────────────────────

  get state(): KlondikeState {
    return this._state;
  }

  get cursor(): Cursor {
    return this._cursor;
  }

  get selection(): Selection | null {
    return this._selection;
  }

  get highlighted(): HighlightedDestinations | null {
    return this._highlighted;
  }

  get moveCount(): number {
    return this._moveCount;
  }

  get message(): string {
    return this._message;
  }

  get status(): SessionStatus {
    return this._status;
  }

  get drawCount(): DrawCount {
    return this.config.drawCount;
  }

  get seed(): number {
    return this.config.seed;
  }

  get madeProgressSinceLastRecycle(): boolean {
    return this._madeProgressSinceLastRecycle;
  }

  get consecutiveBurials(): number {
    return this._consecutiveBurials;
  }

  get elapsedSeconds(): number {
    return this.timer.getElapsedSeconds();
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  view(): SessionView {
    return {
      state: this._state,
      cursor: this._cursor,
      selection: this._selection,
      highlighted: this._highlighted,
      message: this._message,
      moveCount: this._moveCount,
      elapsedSeconds: this.elapsedSeconds,
      status: this._status,
      drawCount: this.config.drawCount,
    };
  }

  // ── Timer ───────────────────────────────────────────────

  /** Start the game clock (call once the board is shown). */
  start(): void {
    this.timer.start();
  }

  pauseTimer(): void {
    this.timer.pause();
  }

  resumeTimer(): void {
    this.timer.resume();
  }

  // ── Dispatch ────────────────────────────────────────────

  /** Route an abstract action to the matching operation. */
  dispatch(action: KlondikeAction): ActionResult {
    switch (action.kind) {
      case 'move-cursor':
        return this.moveCursor(action.direction);
      case 'focus':
        return this.focus(action.cursor);
      case 'select':
        return this.select();
      case 'place':
        return this.place();
      case 'confirm':
        return this._selection === null ? this.select() : this.place();
      case 'cancel':
        return this.cancel();
      case 'stock':
        return this.stockAction();
      case 'show-destinations': {
        const highlights = this.computeValidDestinations();
        return { success: highlights !== null, message: this._message };
      }
      case 'undo':
        return this.undo();
      case 'restart':
        return this.restart(action.seed);
    }
  }

  // ── Cursor ──────────────────────────────────────────────

  moveCursor(direction: Direction): ActionResult {
    this._highlighted = null;
    this._cursor = moveCursor(this._cursor, direction, this._state);
    return this.succeed('');
  }

  /**
   * Put the cursor on a specific pile and card, e.g. from a mouse
   * hit test. Rejects positions that do not exist on the board.
   */
  focus(cursor: Cursor): ActionResult {
    this._highlighted = null;
    if (!isValidCursor(cursor)) return this.fail('No such pile!');

    const limit =
      cursor.zone === 'tableau'
        ? Math.max(0, this._state.tableau[cursor.pileIndex].size() - 1)
        : 0;
    if (cursor.cardIndex > limit) return this.fail('No such card!');

    this._cursor = cursor;
    return this.succeed('');
  }

  // ── Selection protocol ──────────────────────────────────

  /**
   * Select the card(s) under the cursor. On the stock this performs
   * the stock action instead.
   */
  select(): ActionResult {
    if (this._status !== 'playing') return this.fail(GAME_OVER_MESSAGE);
    this._highlighted = null;

    const { zone, pileIndex, cardIndex } = this._cursor;
    switch (zone) {
      case 'stock':
        return this.stockAction();
      case 'waste':
        if (!canPickFromWaste(this._state)) return this.fail('Waste is empty!');
        this._selection = { zone, pileIndex: 0, cardIndex: 0 };
        return this.succeed('Card selected.');
      case 'foundation':
        if (this._state.foundations[pileIndex].isEmpty()) {
          return this.fail('Foundation is empty!');
        }
        this._selection = { zone, pileIndex, cardIndex: 0 };
        return this.succeed('Foundation card selected.');
      case 'tableau': {
        const pile = this._state.tableau[pileIndex];
        if (pile.isEmpty()) return this.fail('Tableau pile is empty!');
        if (!canPickFromTableau(pile, cardIndex)) {
          return this.fail('Cannot select face-down card!');
        }
        this._selection = { zone, pileIndex, cardIndex };
        const count = runLength(pile, cardIndex);
        return this.succeed(
          count > 1 ? `${count} cards selected.` : 'Card selected.',
        );
      }
    }
  }

  /**
   * Place the selection on the pile under the cursor. Placing on the
   * selection's own pile cancels the selection instead.
   */
  place(): ActionResult {
    if (this._status !== 'playing') return this.fail(GAME_OVER_MESSAGE);
    this._highlighted = null;

    const selection = this._selection;
    if (selection === null) return this.fail('Nothing selected!');

    const { zone, pileIndex } = this._cursor;
    if (zone === selection.zone && pileIndex === selection.pileIndex) {
      this.cancel();
      return { success: false, message: this._message };
    }

    switch (zone) {
      case 'stock':
        return this.fail('Cannot place cards on stock!');
      case 'waste':
        return this.fail('Cannot place cards on waste!');
      case 'foundation':
        return this.placeOnFoundation(selection, pileIndex);
      case 'tableau':
        return this.placeOnTableau(selection, pileIndex);
    }
  }

  /** Drop any selection and highlights. Safe to call at any time. */
  cancel(): ActionResult {
    const hadSelection = this._selection !== null;
    this._selection = null;
    this._highlighted = null;
    return this.succeed(hadSelection ? 'Selection cancelled.' : '');
  }

  private placeOnFoundation(selection: Selection, dest: number): ActionResult {
    const to: PileRef = { zone: 'foundation', pileIndex: dest };
    switch (selection.zone) {
      case 'waste':
        return this.applyMove(
          () => moveWasteToFoundation(this._state, dest),
          { zone: 'waste', pileIndex: 0 },
          to,
          1,
          'Moved to foundation!',
        );
      case 'tableau': {
        const pile = this._state.tableau[selection.pileIndex];
        if (runLength(pile, selection.cardIndex) > 1) {
          return this.fail('Can only move single card to foundation!');
        }
        return this.applyMove(
          () => moveTableauToFoundation(this._state, selection.pileIndex, dest),
          { zone: 'tableau', pileIndex: selection.pileIndex },
          to,
          1,
          'Moved to foundation!',
        );
      }
      case 'foundation':
        return this.fail('Cannot move foundation to foundation!');
      case 'stock':
        return this.fail('Invalid move: Invalid source');
    }
  }

  private placeOnTableau(selection: Selection, dest: number): ActionResult {
    const to: PileRef = { zone: 'tableau', pileIndex: dest };
    switch (selection.zone) {
      case 'waste':
        return this.applyMove(
          () => moveWasteToTableau(this._state, dest),
          { zone: 'waste', pileIndex: 0 },
          to,
          1,
          'Moved!',
        );
      case 'tableau': {
        const count = runLength(
          this._state.tableau[selection.pileIndex],
          selection.cardIndex,
        );
        return this.applyMove(
          () =>
            moveTableauToTableau(
              this._state,
              selection.pileIndex,
              selection.cardIndex,
              dest,
            ),
          { zone: 'tableau', pileIndex: selection.pileIndex },
          to,
          count,
          'Moved!',
        );
      }
      case 'foundation':
        return this.applyMove(
          () => moveFoundationToTableau(this._state, selection.pileIndex, dest),
          { zone: 'foundation', pileIndex: selection.pileIndex },
          to,
          1,
          'Moved!',
        );
      case 'stock':
        return this.fail('Invalid move: Invalid source');
    }
  }

  /**
   * Snapshot, attempt, and either commit or discard the snapshot.
   */
  private applyMove(
    execute: () => MoveResult,
    from: PileRef,
    to: PileRef,
    cardCount: number,
    successMessage: string,
  ): ActionResult {
    this.saveForUndo();
    const result = execute();
    if (!result.success) {
      this.history.discard();
      return this.fail(`Invalid move: ${result.message}`);
    }

    this._selection = null;
    this._moveCount++;
    this._madeProgressSinceLastRecycle = true;
    this._consecutiveBurials = 0;
    this._cursor = snapToSelectable(this._cursor, this._state);
    this._message = successMessage;

    this.events.emit('card-moved', {
      from,
      to,
      cardCount,
      moveCount: this._moveCount,
    });

    if (this.checkWin()) {
      this.win();
    }
    return { success: true, message: this._message };
  }

  // ── Stock action and stall recovery ─────────────────────

  /**
   * Draw from the stock, or at the end of a pass recycle the waste,
   * applying stall detection (see the module comment).
   */
  stockAction(): ActionResult {
    if (this._status !== 'playing') return this.fail(GAME_OVER_MESSAGE);
    this._highlighted = null;
    this._selection = null;

    if (!this._state.stock.isEmpty()) return this.draw();

    if (this._state.waste.isEmpty()) {
      return this.fail('Both stock and waste are empty!');
    }

    if (this._madeProgressSinceLastRecycle) {
      return this.recycle('Recycled waste to stock.');
    }

    if (this.config.drawCount === 1 || this._consecutiveBurials >= 2) {
      return this.lose(LOSS_MESSAGE);
    }

    this.timer.pause();
    const bury = this.buryDecider({
      consecutiveBurials: this._consecutiveBurials,
      wasteSize: this._state.waste.size(),
    });
    this.timer.resume();

    if (!bury) return this.lose(LOSS_MESSAGE);
    return this.recycleAndBury();
  }

  private draw(): ActionResult {
    const cardCount = Math.min(this.config.drawCount, this._state.stock.size());
    this.saveForUndo();
    const result = drawFromStock(this._state, this.config.drawCount);
    if (!result.success) {
      this.history.discard();
      return this.fail(result.message);
    }
    this._moveCount++;
    this.events.emit('stock-drawn', { cardCount, moveCount: this._moveCount });
    return this.succeed(`Drew ${cardCount} card(s) from stock.`);
  }

  private recycle(message: string): ActionResult {
    this.saveForUndo();
    const result = recycleWasteToStock(this._state);
    if (!result.success) {
      this.history.discard();
      return this.fail(result.message);
    }
    this._madeProgressSinceLastRecycle = false;
    this.events.emit('waste-recycled', { stockSize: this._state.stock.size() });
    return this.succeed(message);
  }

  /**
   * Draw-3 recovery: recycle, then bury. The stock is always empty
   * when the decision is made, and burying from an empty stock does
   * nothing, so the waste is recycled first and the card that would
   * open the next pass is then buried beneath the rest. Both steps
   * form one undo entry.
   */
  private recycleAndBury(): ActionResult {
    this.saveForUndo();
    const recycled = recycleWasteToStock(this._state);
    if (!recycled.success) {
      this.history.discard();
      return this.fail(recycled.message);
    }
    buryTopOfStock(this._state);
    this._consecutiveBurials++;
    this._madeProgressSinceLastRecycle = false;

    this.events.emit('card-buried', {
      consecutiveBurials: this._consecutiveBurials,
    });
    this.events.emit('waste-recycled', { stockSize: this._state.stock.size() });
    return this.succeed('Top card buried. Recycled waste to stock.');
  }

  // ── Undo ────────────────────────────────────────────────

  /** Restore the layout and counters from before the last change. */
  undo(): ActionResult {
    if (this._status !== 'playing') return this.fail(GAME_OVER_MESSAGE);

    const entry = this.history.pop();
    if (entry === undefined) return this.fail('Nothing to undo!');

    this._state = entry.state;
    this._moveCount = entry.moveCount;
    this._madeProgressSinceLastRecycle = entry.madeProgressSinceLastRecycle;
    this._consecutiveBurials = entry.consecutiveBurials;
    this._selection = null;
    this._highlighted = null;
    this._cursor = snapToSelectable(this._cursor, this._state);

    this.events.emit('undo', { moveCount: this._moveCount });
    return this.succeed('Undone!');
  }

  private saveForUndo(): void {
    this.history.push({
      state: this._state,
      moveCount: this._moveCount,
      madeProgressSinceLastRecycle: this._madeProgressSinceLastRecycle,
      consecutiveBurials: this._consecutiveBurials,
    });
  }

  // ── Restart ─────────────────────────────────────────────

  /**
   * Deal a fresh game, discarding history and counters. A new random
   * seed is used unless one is given. The timer restarts.
   */
  restart(seed: number = randomSeed()): ActionResult {
    this.config = createKlondikeConfig({ ...this.config, seed });
    this._state = deal(this.config.seed);
    this._cursor = createCursor();
    this._selection = null;
    this._highlighted = null;
    this._moveCount = 0;
    this._status = 'playing';
    this._madeProgressSinceLastRecycle = true;
    this._consecutiveBurials = 0;
    this.history.clear();
    this.timer.reset();
    this.timer.start();

    this.events.emit('game-restarted', {
      seed: this.config.seed,
      drawCount: this.config.drawCount,
    });
    return this.succeed('New game started!');
  }

  // ── Win / loss ──────────────────────────────────────────

  /** True iff all 52 cards are on the foundations. */
  checkWin(): boolean {
    return isWon(this._state);
  }

  private win(): void {
    this._status = 'won';
    this.timer.pause();
    this._message = `You won in ${this._moveCount} moves!`;
    this.events.emit('game-won', {
      moveCount: this._moveCount,
      elapsedSeconds: this.elapsedSeconds,
      drawCount: this.config.drawCount,
    });
  }

  private lose(reason: string): ActionResult {
    this._status = 'lost';
    this._selection = null;
    this._highlighted = null;
    this.timer.pause();
    this.events.emit('game-lost', {
      moveCount: this._moveCount,
      elapsedSeconds: this.elapsedSeconds,
      reason,
    });
    return this.fail(reason);
  }

  // ── Destinations and inspection ─────────────────────────

  /**
   * Legal destinations for the selected card, or for the card under
   * the cursor when nothing is selected. Foundations are left out for
   * a multi-card tableau selection. Returns null (with a message)
   * when there is no card or nowhere to put it.
   */
  computeValidDestinations(): HighlightedDestinations | null {
    const card =
      this._selection !== null ? this.getSelectedCard() : this.getCardUnderCursor();

    if (card === null) {
      this._highlighted = null;
      this._message = 'No card to show placements for!';
      return null;
    }

    const tableauPiles = validTableauDestinations(card, this._state);
    let foundationPiles = validFoundationDestinations(card, this._state);

    const selection = this._selection;
    if (
      selection !== null &&
      selection.zone === 'tableau' &&
      runLength(this._state.tableau[selection.pileIndex], selection.cardIndex) > 1
    ) {
      foundationPiles = [];
    }

    const highlights: HighlightedDestinations = { tableauPiles, foundationPiles };
    if (destinationCount(highlights) === 0) {
      this._highlighted = null;
      this._message = 'No valid placements for this card!';
      return null;
    }

    this._highlighted = highlights;
    this._message = `${destinationCount(highlights)} valid placement(s) highlighted.`;
    return highlights;
  }

  /** The face-up card under the cursor, if any. */
  getCardUnderCursor(): Card | null {
    const { zone, pileIndex, cardIndex } = this._cursor;
    switch (zone) {
      case 'stock':
        return null;
      case 'waste':
        return this._state.waste.peek() ?? null;
      case 'foundation':
        return this._state.foundations[pileIndex].peek() ?? null;
      case 'tableau': {
        const card = this._state.tableau[pileIndex].at(cardIndex);
        return card !== undefined && card.faceUp ? card : null;
      }
    }
  }

  /** The base card of the current selection, if any. */
  getSelectedCard(): Card | null {
    const selection = this._selection;
    if (selection === null) return null;
    switch (selection.zone) {
      case 'stock':
        return null;
      case 'waste':
        return this._state.waste.peek() ?? null;
      case 'foundation':
        return this._state.foundations[selection.pileIndex].peek() ?? null;
      case 'tableau':
        return this._state.tableau[selection.pileIndex].at(selection.cardIndex) ?? null;
    }
  }

  /** Short description of the selection, e.g. `5♥ + 2 more`. */
  describeSelection(): string {
    const selection = this._selection;
    if (selection === null) return '';

    const card = this.getSelectedCard();
    if (card === null) return '?';

    if (selection.zone === 'tableau') {
      const count = runLength(
        this._state.tableau[selection.pileIndex],
        selection.cardIndex,
      );
      if (count > 1) return `${cardLabel(card)} + ${count - 1} more`;
    }
    return cardLabel(card);
  }

  // ── Persistence ─────────────────────────────────────────

  /** Plain record of everything needed to resume this game. */
  toRecord(): SessionRecord {
    return {
      state: snapshotState(this._state),
      moveCount: this._moveCount,
      elapsedSeconds: this.elapsedSeconds,
      drawCount: this.config.drawCount,
      madeProgressSinceLastRecycle: this._madeProgressSinceLastRecycle,
      consecutiveBurials: this._consecutiveBurials,
    };
  }

  // ── Helpers ─────────────────────────────────────────────

  private succeed(message: string): ActionResult {
    this._message = message;
    return { success: true, message };
  }

  private fail(message: string): ActionResult {
    this._message = message;
    return { success: false, message };
  }
}
