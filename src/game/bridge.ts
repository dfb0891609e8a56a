/**
 * Phaser ↔ React state bridge.
 *
 * A lightweight typed event emitter that the game loop writes to and React
 * overlays subscribe to.  Exported as a singleton so both sides import
 * the same instance.
 */
import type { CollisionKind } from "./systems/GameState";

// ── Bridge state shape ──────────────────────────────────────────
export interface BridgeState {
  /** Current snake length. */
  length: number;
  /** Longest snake seen this session (kept in memory only). */
  bestLength: number;
  /** Simulation ticks since the page loaded. */
  ticks: number;
  /** Number of runs started, the first one included. */
  runs: number;
}

export interface GameOverEvent {
  cause: CollisionKind;
  length: number;
}

// ── Event map: event name → payload ─────────────────────────────
export interface GameBridgeEvents {
  tick: number;
  lengthChange: number;
  bestLengthChange: number;
  gameOver: GameOverEvent;
  reset: number;
}

export type GameBridgeEventName = keyof GameBridgeEvents;

type Listener<T> = (value: T) => void;

type ListenerRegistry = {
  [K in GameBridgeEventName]: Set<Listener<GameBridgeEvents[K]>>;
};

function createListenerRegistry(): ListenerRegistry {
  return {
    tick: new Set(),
    lengthChange: new Set(),
    bestLengthChange: new Set(),
    gameOver: new Set(),
    reset: new Set(),
  };
}

/**
 * Typed event emitter that also holds the latest snapshot of game state
 * so late-subscribing React components can read the current value
 * without waiting for the next event.
 */
export class GameBridge {
  private state: BridgeState = {
    length: 0,
    bestLength: 0,
    ticks: 0,
    runs: 0,
  };

  private listeners: ListenerRegistry = createListenerRegistry();

  // ── Getters ─────────────────────────────────────────────────
  getState(): Readonly<BridgeState> {
    return this.state;
  }

  // ── Mutations (called by the game loop) ─────────────────────
  setLength(length: number): void {
    if (this.state.length !== length) {
      this.state.length = length;
      this.emit("lengthChange", length);
    }
    if (length > this.state.bestLength) {
      this.state.bestLength = length;
      this.emit("bestLengthChange", length);
    }
  }

  recordTick(): void {
    this.state.ticks += 1;
    this.emit("tick", this.state.ticks);
  }

  recordGameOver(event: GameOverEvent): void {
    this.emit("gameOver", { ...event });
  }

  /** Start a new run with a snake of `length` cells. */
  startRun(length: number): void {
    this.state.runs += 1;
    this.setLength(length);
    this.emit("reset", this.state.runs);
  }

  // ── Pub / Sub ───────────────────────────────────────────────
  on<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event].add(listener);
  }

  off<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event].delete(listener);
  }

  private emit<K extends GameBridgeEventName>(
    event: K,
    value: GameBridgeEvents[K],
  ): void {
    const set: Set<Listener<GameBridgeEvents[K]>> = this.listeners[event];
    set.forEach((fn) => fn(value));
  }
}

/** Singleton bridge instance shared by Phaser and React. */
export const gameBridge = new GameBridge();
