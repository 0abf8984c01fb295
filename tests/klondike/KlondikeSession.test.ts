import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  GAME_OVER_MESSAGE,
  KlondikeSession,
  LOSS_MESSAGE,
  WELCOME_MESSAGE,
} from '../../games/klondike/KlondikeSession';
import type { KlondikeSessionOptions } from '../../games/klondike/KlondikeSession';
import type { Cursor } from '../../games/klondike/CursorNavigator';
import { deal } from '../../games/klondike/KlondikeDealer';
import { cloneState } from '../../games/klondike/KlondikeState';
import type { KlondikeState } from '../../games/klondike/KlondikeState';
import type { SessionRecord } from '../../games/klondike/SessionRecord';
import { down, makeState, recordFor, up } from './fixtures';

const at = (zone: Cursor['zone'], pileIndex: number, cardIndex = 0): Cursor => ({
  zone,
  pileIndex,
  cardIndex,
});

function sessionWith(
  state: KlondikeState,
  overrides: Partial<Omit<SessionRecord, 'state'>> = {},
  options: Omit<KlondikeSessionOptions, 'drawCount'> = {},
): KlondikeSession {
  return KlondikeSession.fromRecord(recordFor(state, overrides), { seed: 1, ...options });
}

/** A small board with one legal tableau move and an Ace on the waste. */
function playableState(): KlondikeState {
  return makeState({
    stock: [down(4, 'diamonds')],
    waste: [up(1, 'hearts')],
    tableau: [
      [down(5, 'clubs'), up(9, 'spades')],
      [up(10, 'hearts')],
      [],
      [up(2, 'clubs'), up(1, 'diamonds')],
    ],
  });
}

/** End of a pass: the stock is empty and three cards sit on the waste. */
function passEndState(): KlondikeState {
  return makeState({
    waste: [up(1, 'clubs'), up(2, 'clubs'), up(3, 'clubs')],
    tableau: [[up(9, 'spades')], [up(10, 'hearts')]],
  });
}

describe('KlondikeSession', () => {
  // ── Construction ────────────────────────────────────────

  describe('construction', () => {
    it('should deal from the seed with default settings', () => {
      const session = new KlondikeSession({ seed: 1 });
      expect(session.state).toEqual(deal(1));
      expect(session.cursor).toEqual(at('stock', 0));
      expect(session.selection).toBeNull();
      expect(session.moveCount).toBe(0);
      expect(session.drawCount).toBe(1);
      expect(session.seed).toBe(1);
      expect(session.status).toBe('playing');
      expect(session.message).toBe(WELCOME_MESSAGE);
      expect(session.madeProgressSinceLastRecycle).toBe(true);
      expect(session.consecutiveBurials).toBe(0);
      expect(session.canUndo()).toBe(false);
    });

    it('should reject an invalid draw count', () => {
      expect(() => new KlondikeSession({ drawCount: 2 })).toThrow('drawCount must be 1 or 3, got 2');
    });
  });

  // ── Selection protocol ──────────────────────────────────

  describe('select', () => {
    it('should draw instead of selecting on the stock', () => {
      const session = new KlondikeSession({ seed: 1 });
      const result = session.select();
      expect(result).toEqual({ success: true, message: 'Drew 1 card(s) from stock.' });
      expect(session.selection).toBeNull();
      expect(session.state.waste.toArray()).toEqual([up(13, 'hearts')]);
      expect(session.moveCount).toBe(1);
    });

    it('should select a single tableau card', () => {
      const session = sessionWith(playableState());
      session.focus(at('tableau', 0, 1));
      expect(session.select()).toEqual({ success: true, message: 'Card selected.' });
      expect(session.selection).toEqual({ zone: 'tableau', pileIndex: 0, cardIndex: 1 });
    });

    it('should count a multi-card run', () => {
      const session = sessionWith(playableState());
      session.focus(at('tableau', 3, 0));
      expect(session.select().message).toBe('2 cards selected.');
      expect(session.describeSelection()).toBe('2♣ + 1 more');
    });

    it('should select the waste and a foundation', () => {
      const session = sessionWith(makeState({ waste: [up(7, 'hearts')], foundationHeights: [0, 0, 2, 0] }));
      session.focus(at('waste', 0));
      expect(session.select().message).toBe('Card selected.');
      expect(session.describeSelection()).toBe('7♥');
      session.focus(at('foundation', 2));
      expect(session.select().message).toBe('Foundation card selected.');
      expect(session.getSelectedCard()).toEqual(up(2, 'clubs'));
    });

    it('should report empty and face-down sources', () => {
      const session = sessionWith(playableState());
      session.focus(at('tableau', 0, 0));
      expect(session.select()).toEqual({ success: false, message: 'Cannot select face-down card!' });
      session.focus(at('tableau', 2, 0));
      expect(session.select().message).toBe('Tableau pile is empty!');
      session.focus(at('foundation', 0));
      expect(session.select().message).toBe('Foundation is empty!');
      expect(session.selection).toBeNull();

      const bare = sessionWith(makeState());
      bare.focus(at('waste', 0));
      expect(bare.select().message).toBe('Waste is empty!');
    });
  });

  describe('place', () => {
    let session: KlondikeSession;

    beforeEach(() => {
      session = sessionWith(playableState());
    });

    it('should move a tableau card and reveal the card beneath', () => {
      const moved = vi.fn();
      session.events.on('card-moved', moved);
      session.focus(at('tableau', 0, 1));
      session.select();
      session.focus(at('tableau', 1, 0));

      expect(session.place()).toEqual({ success: true, message: 'Moved!' });
      expect(session.state.tableau[0].toArray()).toEqual([up(5, 'clubs')]);
      expect(session.state.tableau[1].toArray()).toEqual([up(10, 'hearts'), up(9, 'spades')]);
      expect(session.selection).toBeNull();
      expect(session.moveCount).toBe(1);
      expect(moved).toHaveBeenCalledWith({
        from: { zone: 'tableau', pileIndex: 0 },
        to: { zone: 'tableau', pileIndex: 1 },
        cardCount: 1,
        moveCount: 1,
      });
    });

    it('should move the waste card to its foundation', () => {
      session.focus(at('waste', 0));
      session.select();
      session.focus(at('foundation', 0));
      expect(session.place()).toEqual({ success: true, message: 'Moved to foundation!' });
      expect(session.state.foundations[0].toArray()).toEqual([up(1, 'hearts')]);
      expect(session.state.waste.isEmpty()).toBe(true);
    });

    it('should keep the selection and discard the undo entry on an illegal move', () => {
      session.focus(at('waste', 0));
      session.select();
      session.focus(at('foundation', 1));
      expect(session.place()).toEqual({
        success: false,
        message: 'Invalid move: Cannot place on foundation',
      });
      expect(session.selection).toEqual({ zone: 'waste', pileIndex: 0, cardIndex: 0 });
      expect(session.canUndo()).toBe(false);
      expect(session.moveCount).toBe(0);
    });

    it('should cancel when placing on the source pile', () => {
      session.focus(at('waste', 0));
      session.select();
      expect(session.place()).toEqual({ success: false, message: 'Selection cancelled.' });
      expect(session.selection).toBeNull();
    });

    it('should refuse the stock and waste as destinations', () => {
      session.focus(at('tableau', 0, 1));
      session.select();
      session.focus(at('stock', 0));
      expect(session.place().message).toBe('Cannot place cards on stock!');
      session.focus(at('waste', 0));
      expect(session.place().message).toBe('Cannot place cards on waste!');
      expect(session.selection).not.toBeNull();
    });

    it('should refuse a multi-card run on a foundation', () => {
      session.focus(at('tableau', 3, 0));
      session.select();
      session.focus(at('foundation', 2));
      expect(session.place().message).toBe('Can only move single card to foundation!');
      expect(session.canUndo()).toBe(false);
    });

    it('should refuse foundation to foundation', () => {
      const withAce = sessionWith(makeState({ foundationHeights: [1, 0, 0, 0] }));
      withAce.focus(at('foundation', 0));
      withAce.select();
      withAce.focus(at('foundation', 1));
      expect(withAce.place().message).toBe('Cannot move foundation to foundation!');
    });

    it('should move a foundation card back to the tableau', () => {
      const state = makeState({ foundationHeights: [0, 0, 0, 9], tableau: [[up(10, 'hearts')]] });
      const back = sessionWith(state);
      back.focus(at('foundation', 3));
      back.select();
      back.focus(at('tableau', 0, 0));
      expect(back.place().message).toBe('Moved!');
      expect(back.state.tableau[0].peek()).toEqual(up(9, 'spades'));
    });

    it('should report when nothing is selected', () => {
      expect(session.place()).toEqual({ success: false, message: 'Nothing selected!' });
    });
  });

  describe('cancel', () => {
    it('should be idempotent', () => {
      const session = sessionWith(playableState());
      session.focus(at('waste', 0));
      session.select();
      expect(session.cancel()).toEqual({ success: true, message: 'Selection cancelled.' });
      expect(session.cancel()).toEqual({ success: true, message: '' });
      expect(session.selection).toBeNull();
    });
  });

  // ── Destinations ────────────────────────────────────────

  describe('computeValidDestinations', () => {
    it('should use the card under the cursor when nothing is selected', () => {
      const session = sessionWith(playableState());
      session.focus(at('waste', 0));
      expect(session.computeValidDestinations()).toEqual({ tableauPiles: [], foundationPiles: [0] });
      expect(session.message).toBe('1 valid placement(s) highlighted.');
    });

    it('should drop foundations for a multi-card selection', () => {
      const state = makeState({
        tableau: [[up(2, 'hearts'), up(1, 'spades')], [up(3, 'clubs')], [up(3, 'spades')]],
      });
      const session = sessionWith(state);
      session.focus(at('tableau', 0, 0));
      session.select();
      expect(session.computeValidDestinations()).toEqual({ tableauPiles: [1, 2], foundationPiles: [] });
      expect(session.highlighted).toEqual({ tableauPiles: [1, 2], foundationPiles: [] });
      session.moveCursor('right');
      expect(session.highlighted).toBeNull();
    });

    it('should report when there is no card or no destination', () => {
      const session = sessionWith(playableState());
      expect(session.computeValidDestinations()).toBeNull();
      expect(session.message).toBe('No card to show placements for!');
      session.focus(at('tableau', 1, 0));
      expect(session.computeValidDestinations()).toBeNull();
      expect(session.message).toBe('No valid placements for this card!');
    });
  });

  // ── Stock and stall recovery ────────────────────────────

  describe('stockAction', () => {
    it('should draw three in draw-3 mode', () => {
      const drawn = vi.fn();
      const session = new KlondikeSession({ seed: 1, drawCount: 3 });
      session.events.on('stock-drawn', drawn);
      expect(session.stockAction().message).toBe('Drew 3 card(s) from stock.');
      expect(session.state.waste.size()).toBe(3);
      expect(drawn).toHaveBeenCalledWith({ cardCount: 3, moveCount: 1 });
    });

    it('should clear any selection', () => {
      const session = sessionWith(playableState());
      session.focus(at('waste', 0));
      session.select();
      session.stockAction();
      expect(session.selection).toBeNull();
    });

    it('should recycle after progress without counting a move', () => {
      const session = sessionWith(passEndState(), { moveCount: 4 });
      expect(session.stockAction()).toEqual({ success: true, message: 'Recycled waste to stock.' });
      expect(session.state.stock.toArray()).toEqual([down(3, 'clubs'), down(2, 'clubs'), down(1, 'clubs')]);
      expect(session.madeProgressSinceLastRecycle).toBe(false);
      expect(session.moveCount).toBe(4);
      expect(session.canUndo()).toBe(true);
    });

    it('should fail when stock and waste are both empty', () => {
      const session = sessionWith(makeState());
      expect(session.stockAction()).toEqual({ success: false, message: 'Both stock and waste are empty!' });
      expect(session.status).toBe('playing');
    });

    it('should lose in draw-1 after a pass without progress', () => {
      const lost = vi.fn();
      const state = passEndState();
      const session = sessionWith(state, { madeProgressSinceLastRecycle: false, moveCount: 7 });
      session.events.on('game-lost', lost);

      expect(session.stockAction()).toEqual({ success: false, message: LOSS_MESSAGE });
      expect(session.status).toBe('lost');
      expect(session.state).toEqual(state);
      expect(lost).toHaveBeenCalledWith({ moveCount: 7, elapsedSeconds: 0, reason: LOSS_MESSAGE });
    });

    it('should bury then continue in draw-3 when the player accepts', () => {
      const buryDecider = vi.fn(() => true);
      const buried = vi.fn();
      const session = sessionWith(
        passEndState(),
        { drawCount: 3, madeProgressSinceLastRecycle: false },
        { buryDecider },
      );
      session.events.on('card-buried', buried);

      expect(session.stockAction()).toEqual({
        success: true,
        message: 'Top card buried. Recycled waste to stock.',
      });
      expect(buryDecider).toHaveBeenCalledWith({ consecutiveBurials: 0, wasteSize: 3 });
      expect(session.state.stock.toArray()).toEqual([down(1, 'clubs'), down(3, 'clubs'), down(2, 'clubs')]);
      expect(session.state.waste.isEmpty()).toBe(true);
      expect(session.consecutiveBurials).toBe(1);
      expect(session.madeProgressSinceLastRecycle).toBe(false);
      expect(session.status).toBe('playing');
      expect(buried).toHaveBeenCalledWith({ consecutiveBurials: 1 });
    });

    it('should lose in draw-3 when the player declines', () => {
      const session = sessionWith(
        passEndState(),
        { drawCount: 3, madeProgressSinceLastRecycle: false },
        { buryDecider: () => false },
      );
      expect(session.stockAction().message).toBe(LOSS_MESSAGE);
      expect(session.status).toBe('lost');
    });

    it('should concede by default when no decider is supplied', () => {
      const session = sessionWith(passEndState(), { drawCount: 3, madeProgressSinceLastRecycle: false });
      session.stockAction();
      expect(session.status).toBe('lost');
    });

    it('should lose after two burials without asking again', () => {
      const buryDecider = vi.fn(() => true);
      const session = sessionWith(
        passEndState(),
        { drawCount: 3, madeProgressSinceLastRecycle: false, consecutiveBurials: 2 },
        { buryDecider },
      );
      expect(session.stockAction().message).toBe(LOSS_MESSAGE);
      expect(buryDecider).not.toHaveBeenCalled();
      expect(session.status).toBe('lost');
    });

    it('should clear stall tracking after any successful placement', () => {
      const session = sessionWith(passEndState(), {
        drawCount: 3,
        madeProgressSinceLastRecycle: false,
        consecutiveBurials: 1,
      });
      session.focus(at('tableau', 0, 0));
      session.select();
      session.focus(at('tableau', 1, 0));
      expect(session.place().success).toBe(true);
      expect(session.madeProgressSinceLastRecycle).toBe(true);
      expect(session.consecutiveBurials).toBe(0);
    });

    it('should pause the clock while the bury decision is pending', () => {
      let now = 0;
      const session = sessionWith(
        passEndState(),
        { drawCount: 3, madeProgressSinceLastRecycle: false },
        {
          clock: () => now,
          buryDecider: () => {
            now += 30_000;
            return true;
          },
        },
      );
      session.start();
      now += 5_000;
      session.stockAction();
      now += 1_000;
      expect(session.elapsedSeconds).toBe(6);
    });
  });

  // ── Undo ────────────────────────────────────────────────

  describe('undo', () => {
    it('should report an empty history', () => {
      const session = new KlondikeSession({ seed: 1 });
      const before = cloneState(session.state);
      expect(session.undo()).toEqual({ success: false, message: 'Nothing to undo!' });
      expect(session.state).toEqual(before);
    });

    it('should restore the exact state and move count', () => {
      const undone = vi.fn();
      const session = sessionWith(playableState());
      session.events.on('undo', undone);
      const before = cloneState(session.state);
      session.focus(at('tableau', 0, 1));
      session.select();
      session.focus(at('tableau', 1, 0));
      session.place();

      expect(session.undo()).toEqual({ success: true, message: 'Undone!' });
      expect(session.state).toEqual(before);
      expect(session.moveCount).toBe(0);
      expect(undone).toHaveBeenCalledWith({ moveCount: 0 });
    });

    it('should restore stall tracking with the layout', () => {
      const session = sessionWith(passEndState(), { drawCount: 3, madeProgressSinceLastRecycle: false }, {
        buryDecider: () => true,
      });
      session.stockAction();
      session.undo();
      expect(session.consecutiveBurials).toBe(0);
      expect(session.madeProgressSinceLastRecycle).toBe(false);
      expect(session.state.waste.size()).toBe(3);
      expect(session.state.stock.isEmpty()).toBe(true);
    });

    it('should undo a recycle back to a full waste with progress still recorded', () => {
      const session = sessionWith(passEndState());
      session.stockAction();
      session.undo();
      expect(session.madeProgressSinceLastRecycle).toBe(true);
      expect(session.state.waste.size()).toBe(3);
    });

    it('should re-seat the cursor on the restored pile', () => {
      const session = sessionWith(playableState());
      session.focus(at('tableau', 0, 1));
      session.select();
      session.focus(at('tableau', 1, 0));
      session.place();
      session.focus(at('tableau', 1, 1));
      session.undo();
      expect(session.cursor).toEqual(at('tableau', 1, 0));
    });

    it('should respect the configured capacity', () => {
      const session = new KlondikeSession({ seed: 1, undoCapacity: 2 });
      session.stockAction();
      session.stockAction();
      session.stockAction();
      expect(session.undo().success).toBe(true);
      expect(session.undo().success).toBe(true);
      expect(session.undo().message).toBe('Nothing to undo!');
      expect(session.moveCount).toBe(1);
    });

    it('should keep every undo level through failed moves at full capacity', () => {
      const session = new KlondikeSession({ seed: 1, undoCapacity: 2 });
      session.stockAction();
      session.stockAction();
      session.focus(at('waste', 0));
      session.select();
      for (let f = 0; f < 4; f++) {
        session.focus(at('foundation', f));
        expect(session.place().success).toBe(false);
      }
      expect(session.undo().message).toBe('Undone!');
      expect(session.undo().message).toBe('Undone!');
      expect(session.moveCount).toBe(0);
      expect(session.undo().message).toBe('Nothing to undo!');
    });
  });

  // ── Win and terminal states ─────────────────────────────

  describe('win', () => {
    function nearlyWon(): KlondikeSession {
      return sessionWith(makeState({ foundationHeights: [13, 13, 13, 12], waste: [up(13, 'spades')] }), {
        moveCount: 120,
      });
    }

    it('should detect the win on the last foundation card', () => {
      const won = vi.fn();
      const session = nearlyWon();
      session.events.on('game-won', won);
      expect(session.checkWin()).toBe(false);

      session.focus(at('waste', 0));
      session.select();
      session.focus(at('foundation', 3));

      expect(session.place()).toEqual({ success: true, message: 'You won in 121 moves!' });
      expect(session.checkWin()).toBe(true);
      expect(session.status).toBe('won');
      expect(won).toHaveBeenCalledWith({ moveCount: 121, elapsedSeconds: 0, drawCount: 1 });
    });

    it('should reject play after a win but allow restart', () => {
      const session = nearlyWon();
      session.focus(at('waste', 0));
      session.select();
      session.focus(at('foundation', 3));
      session.place();

      expect(session.stockAction()).toEqual({ success: false, message: GAME_OVER_MESSAGE });
      expect(session.undo()).toEqual({ success: false, message: GAME_OVER_MESSAGE });
      expect(session.select()).toEqual({ success: false, message: GAME_OVER_MESSAGE });
      expect(session.moveCursor('down').success).toBe(true);
      expect(session.restart(3).success).toBe(true);
      expect(session.status).toBe('playing');
    });

    it('should freeze the clock at the win', () => {
      let now = 0;
      const session = sessionWith(
        makeState({ foundationHeights: [13, 13, 13, 12], waste: [up(13, 'spades')] }),
        {},
        { clock: () => now },
      );
      session.start();
      now = 42_000;
      session.focus(at('waste', 0));
      session.select();
      session.focus(at('foundation', 3));
      session.place();
      now = 90_000;
      expect(session.elapsedSeconds).toBe(42);
    });

    it('should mark a restored finished layout as won', () => {
      const session = sessionWith(makeState({ foundationHeights: [13, 13, 13, 13] }));
      expect(session.status).toBe('won');
    });
  });

  describe('after a loss', () => {
    it('should reject moves but keep cursor movement and cancel', () => {
      const session = sessionWith(passEndState(), { madeProgressSinceLastRecycle: false });
      session.stockAction();
      expect(session.place().message).toBe(GAME_OVER_MESSAGE);
      expect(session.stockAction().message).toBe(GAME_OVER_MESSAGE);
      expect(session.moveCursor('right').success).toBe(true);
      expect(session.cursor).toEqual(at('waste', 0));
      expect(session.cancel().success).toBe(true);
    });
  });

  // ── Restart ─────────────────────────────────────────────

  describe('restart', () => {
    it('should deal afresh and reset every counter', () => {
      const restarted = vi.fn();
      const session = new KlondikeSession({ seed: 1, drawCount: 3 });
      session.events.on('game-restarted', restarted);
      session.stockAction();
      session.focus(at('tableau', 2, 2));

      expect(session.restart(99)).toEqual({ success: true, message: 'New game started!' });
      expect(session.state).toEqual(deal(99));
      expect(session.seed).toBe(99);
      expect(session.drawCount).toBe(3);
      expect(session.moveCount).toBe(0);
      expect(session.cursor).toEqual(at('stock', 0));
      expect(session.canUndo()).toBe(false);
      expect(restarted).toHaveBeenCalledWith({ seed: 99, drawCount: 3 });
    });

    it('should pick a random seed when none is given', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      const session = new KlondikeSession({ seed: 1 });
      session.restart();
      expect(session.seed).toBe(2147483648);
      vi.restoreAllMocks();
    });

    it('should not count time while paused', () => {
      let now = 0;
      const session = new KlondikeSession({ seed: 1, clock: () => now });
      session.start();
      now = 5_000;
      session.pauseTimer();
      now = 20_000;
      expect(session.elapsedSeconds).toBe(5);
      session.resumeTimer();
      now = 23_000;
      expect(session.elapsedSeconds).toBe(8);
    });

    it('should restart the clock from zero', () => {
      let now = 0;
      const session = new KlondikeSession({ seed: 1, clock: () => now });
      session.start();
      now = 10_000;
      session.restart(2);
      now = 13_000;
      expect(session.elapsedSeconds).toBe(3);
    });
  });

  // ── Cursor ──────────────────────────────────────────────

  describe('cursor', () => {
    it('should move through the navigator', () => {
      const session = new KlondikeSession({ seed: 1 });
      session.moveCursor('down');
      expect(session.cursor).toEqual(at('tableau', 0, 0));
      expect(session.getCardUnderCursor()).toEqual(up(10, 'diamonds'));
    });

    it('should reject focus outside the board', () => {
      const session = new KlondikeSession({ seed: 1 });
      expect(session.focus(at('foundation', 4))).toEqual({ success: false, message: 'No such pile!' });
      expect(session.focus(at('tableau', 1, 2))).toEqual({ success: false, message: 'No such card!' });
      expect(session.focus(at('waste', 0, 1)).message).toBe('No such card!');
      expect(session.cursor).toEqual(at('stock', 0));
    });

    it('should show no card under the cursor on the stock or a face-down card', () => {
      const session = new KlondikeSession({ seed: 1 });
      expect(session.getCardUnderCursor()).toBeNull();
      session.focus(at('tableau', 1, 0));
      expect(session.getCardUnderCursor()).toBeNull();
    });
  });

  // ── Dispatch and view ───────────────────────────────────

  describe('dispatch', () => {
    it('should route abstract actions', () => {
      const session = sessionWith(playableState());
      session.dispatch({ kind: 'focus', cursor: at('tableau', 0, 1) });
      expect(session.dispatch({ kind: 'confirm' }).message).toBe('Card selected.');
      session.dispatch({ kind: 'move-cursor', direction: 'right' });
      expect(session.cursor).toEqual(at('tableau', 1, 0));
      expect(session.dispatch({ kind: 'confirm' }).message).toBe('Moved!');
      expect(session.dispatch({ kind: 'undo' }).message).toBe('Undone!');
      expect(session.dispatch({ kind: 'stock' }).message).toBe('Drew 1 card(s) from stock.');
      expect(session.dispatch({ kind: 'restart', seed: 4 }).message).toBe('New game started!');
      expect(session.seed).toBe(4);
    });

    it('should report highlights through show-destinations', () => {
      const session = sessionWith(playableState());
      session.focus(at('tableau', 0, 1));
      expect(session.dispatch({ kind: 'show-destinations' })).toEqual({
        success: true,
        message: '1 valid placement(s) highlighted.',
      });
    });
  });

  describe('view', () => {
    it('should expose what a renderer needs', () => {
      const session = new KlondikeSession({ seed: 1, drawCount: 3 });
      const view = session.view();
      expect(view.state).toBe(session.state);
      expect(view.cursor).toEqual(at('stock', 0));
      expect(view.selection).toBeNull();
      expect(view.highlighted).toBeNull();
      expect(view.message).toBe(WELCOME_MESSAGE);
      expect(view.moveCount).toBe(0);
      expect(view.elapsedSeconds).toBe(0);
      expect(view.status).toBe('playing');
      expect(view.drawCount).toBe(3);
    });
  });

  // ── Persistence ─────────────────────────────────────────

  describe('toRecord / fromRecord', () => {
    it('should resume where the game left off', () => {
      const session = sessionWith(passEndState(), {
        drawCount: 3,
        moveCount: 9,
        elapsedSeconds: 61,
        madeProgressSinceLastRecycle: false,
        consecutiveBurials: 1,
      });
      expect(session.message).toBe('Game restored.');
      const resumed = KlondikeSession.fromRecord(session.toRecord());
      expect(resumed.state).toEqual(passEndState());
      expect(resumed.drawCount).toBe(3);
      expect(resumed.moveCount).toBe(9);
      expect(resumed.elapsedSeconds).toBe(61);
      expect(resumed.madeProgressSinceLastRecycle).toBe(false);
      expect(resumed.consecutiveBurials).toBe(1);
    });
  });
});
