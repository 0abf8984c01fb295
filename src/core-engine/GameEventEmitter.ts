/**
 * Typed Event Emitter for the Klondike engine.
 *
 * Provides a type-safe, zero-dependency event emitter. The emitter
 * is generic over an event map (event name -> payload type), so each
 * game declares its own events and subscribing to an unknown event
 * name is a compile-time error.
 *
 * The session emits events at key points (moves, draws, recycles,
 * undo, win/loss). Front ends and tests subscribe to them.
 */

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<M, K extends keyof M> = (payload: M[K]) => void;

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter.
 *
 * Usage:
 * ```ts
 * interface Events { 'card-moved': { moveCount: number } }
 * const emitter = new GameEventEmitter<Events>();
 * emitter.on('card-moved', (payload) => {
 *   console.log(`Move ${payload.moveCount}`);
 * });
 * emitter.emit('card-moved', { moveCount: 1 });
 * ```
 */
export class GameEventEmitter<M> {
  private listeners: {
    [K in keyof M]?: Array<GameEventListener<M, K>>;
  } = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof M>(event: K, listener: GameEventListener<M, K>): () => void {
    let list = this.listeners[event] as
      | Array<GameEventListener<M, K>>
      | undefined;
    if (!list) {
      list = [];
      this.listeners[event] = list;
    }
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends keyof M>(event: K, listener: GameEventListener<M, K>): () => void {
    const wrapper: GameEventListener<M, K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends keyof M>(event: K, listener: GameEventListener<M, K>): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<M, K>>
      | undefined;
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<M, K>>
      | undefined;
    if (!list || list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: keyof M): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}
