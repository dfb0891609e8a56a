import { MOVE_INTERVAL_SECONDS } from "../config";
import { type GameBridge, gameBridge } from "../bridge";
import type { Direction, GridBounds } from "../utils/grid";
import { type Logger, silentLogger } from "../utils/logger";
import type { Rng } from "../utils/random";
import {
  type GameState,
  type TickOutcome,
  createGameState,
  queueDirection,
  resetGame,
  stepGame,
} from "./GameState";

export interface GameLoopOptions {
  bounds?: GridBounds;
  rng?: Rng;
  direction?: Direction;
  /** Seconds between ticks. Non-positive or non-finite values use the default. */
  moveIntervalSeconds?: number;
  logger?: Logger;
  /** Bridge to publish to; pass null to run detached. */
  bridge?: GameBridge | null;
}

export interface FrameResult {
  /** Outcome of the tick that fired this frame, or null when none did. */
  tick: TickOutcome | null;
  /** Whether the run ended and the state was reset this frame. */
  reset: boolean;
}

const sanitizeDelta = (deltaSeconds: number): number => {
  if (!Number.isFinite(deltaSeconds)) {
    return 0;
  }

  return Math.max(0, deltaSeconds);
};

const sanitizeInterval = (seconds: number | undefined): number => {
  if (seconds === undefined || !Number.isFinite(seconds) || seconds <= 0) {
    return MOVE_INTERVAL_SECONDS;
  }

  return seconds;
};

/**
 * Fixed-cadence driver around a single `GameState`.
 *
 * Input is queued at frame rate; the simulation advances once the move
 * timer reaches the interval. The timer then restarts from zero, so
 * leftover time is not carried into the next tick. A collision resets the
 * game in the same frame.
 */
export class GameLoop {
  private readonly state: GameState;

  private readonly moveIntervalSeconds: number;

  private readonly logger: Logger;

  private bridge: GameBridge | null;

  constructor(options: GameLoopOptions = {}) {
    this.moveIntervalSeconds = sanitizeInterval(options.moveIntervalSeconds);
    this.logger = options.logger ?? silentLogger;
    this.bridge = options.bridge === undefined ? gameBridge : options.bridge;
    this.state = createGameState({
      bounds: options.bounds,
      rng: options.rng,
      direction: options.direction,
    });
    this.bridge?.startRun(this.state.snake.getLength());
    this.logger.info(
      `started on a ${this.state.bounds.cols}x${this.state.bounds.rows} grid`,
    );
  }

  /** Translate a key-down edge into a buffered turn. */
  handleDirection(direction: Direction): boolean {
    const accepted = queueDirection(this.state, direction);
    if (!accepted) {
      this.logger.debug(`ignored turn ${direction}`);
    }
    return accepted;
  }

  /** Advance wall time by `deltaSeconds`; ticks at most once. */
  frame(deltaSeconds: number): FrameResult {
    this.state.moveTimer += sanitizeDelta(deltaSeconds);

    if (this.state.moveTimer < this.moveIntervalSeconds) {
      return { tick: null, reset: false };
    }

    this.state.moveTimer = 0;
    const outcome = stepGame(this.state);
    this.bridge?.recordTick();

    if (outcome.kind !== "collided") {
      this.bridge?.setLength(this.state.snake.getLength());
      return { tick: outcome, reset: false };
    }

    const length = this.state.snake.getLength();
    this.logger.debug(`game over (${outcome.cause}) at length ${length}`);
    this.bridge?.recordGameOver({ cause: outcome.cause, length });

    resetGame(this.state);
    this.bridge?.startRun(this.state.snake.getLength());
    return { tick: outcome, reset: true };
  }

  getState(): Readonly<GameState> {
    return this.state;
  }

  getMoveInterval(): number {
    return this.moveIntervalSeconds;
  }

  /** Stop publishing to the bridge. */
  dispose(): void {
    this.bridge = null;
  }
}
