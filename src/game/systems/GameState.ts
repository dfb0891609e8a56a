import {
  DEFAULT_DIRECTION,
  GRID_COLS,
  GRID_ROWS,
  INITIAL_SNAKE_LENGTH,
  MAX_PENDING_DIRECTIONS,
} from "../config";
import { Snake } from "../entities/Snake";
import { placeFood } from "../entities/Food";
import {
  type Direction,
  type GridBounds,
  type GridPos,
  gridCenter,
  gridEquals,
  isDirection,
  isInBounds,
  stepInDirection,
} from "../utils/grid";
import type { Rng } from "../utils/random";
import { DirectionQueue } from "./DirectionQueue";

export type CollisionKind = "wall" | "self";

/**
 * Mutable simulation state. One owner (the loop driver) mutates it through
 * `tickGame`, `queueDirection` and `resetGame` only.
 */
export interface GameState {
  readonly bounds: GridBounds;
  readonly snake: Snake;
  food: GridPos;
  /** Heading applied on the next tick unless a queued turn replaces it. */
  direction: Direction;
  readonly pendingDirections: DirectionQueue;
  /** Seconds accumulated since the last tick. */
  moveTimer: number;
  readonly rng: Rng;
}

export interface CreateGameStateOptions {
  bounds?: GridBounds;
  rng?: Rng;
  /** Starting heading; anything that is not a direction falls back to right. */
  direction?: unknown;
}

/** Smallest side that fits a centered snake trailing two cells in any direction. */
export const MIN_GRID_SIZE = 2 * (INITIAL_SNAKE_LENGTH - 1) + 1;

const normalizeSide = (value: number, fallback: number): number =>
  Number.isFinite(value) ? Math.max(MIN_GRID_SIZE, Math.floor(value)) : fallback;

/**
 * Whole-cell bounds no smaller than `MIN_GRID_SIZE` on either side. A side
 * that is not a finite number takes the default grid size.
 */
export const normalizeBounds = (bounds: GridBounds): GridBounds => ({
  cols: normalizeSide(bounds.cols, GRID_COLS),
  rows: normalizeSide(bounds.rows, GRID_ROWS),
});

/** Build the session state and lay out the first snake. */
export function createGameState(options: CreateGameStateOptions = {}): GameState {
  const bounds = normalizeBounds(
    options.bounds ?? { cols: GRID_COLS, rows: GRID_ROWS },
  );
  const direction = isDirection(options.direction)
    ? options.direction
    : DEFAULT_DIRECTION;

  const state: GameState = {
    bounds,
    snake: new Snake(gridCenter(bounds), direction, INITIAL_SNAKE_LENGTH),
    food: { x: 0, y: 0 },
    direction,
    pendingDirections: new DirectionQueue(MAX_PENDING_DIRECTIONS),
    moveTimer: 0,
    rng: options.rng ?? Math.random,
  };

  resetGame(state);
  return state;
}

// ── Lifecycle ───────────────────────────────────────────────────

/**
 * Put a fresh 3-cell snake at the grid center, facing the committed
 * direction, and place food against it. Grid bounds and the random
 * generator are kept.
 */
export function resetGame(state: GameState): void {
  if (!isDirection(state.direction)) {
    state.direction = DEFAULT_DIRECTION;
  }

  state.snake.reset(gridCenter(state.bounds), state.direction, INITIAL_SNAKE_LENGTH);
  state.pendingDirections.clear();
  state.moveTimer = 0;
  state.food = placeFood(state.snake.getSegments(), state.bounds, state.rng);
}

// ── Input ───────────────────────────────────────────────────────

/** Buffer a turn for a later tick. Returns whether it was accepted. */
export function queueDirection(state: GameState, direction: Direction): boolean {
  return state.pendingDirections.enqueue(state.direction, direction);
}

// ── Simulation step ─────────────────────────────────────────────

/**
 * Collision for a head moving to `newHead`. The tail cell only counts when
 * the snake grows this tick, since a plain move vacates it.
 */
export function detectCollision(
  state: GameState,
  newHead: GridPos,
): CollisionKind | null {
  if (!isInBounds(newHead, state.bounds)) return "wall";

  const grows = gridEquals(newHead, state.food);
  const hitsBody = grows
    ? state.snake.isOnSnake(newHead)
    : state.snake.isOnSnakeExceptTail(newHead);

  return hitsBody ? "self" : null;
}

export type TickOutcome =
  | { kind: "moved" }
  | { kind: "ate" }
  | { kind: "collided"; cause: CollisionKind };

/**
 * Advance the simulation by one tick and report what happened. On a
 * collision the body is left as it was for the caller to reset.
 */
export function stepGame(state: GameState): TickOutcome {
  const queued = state.pendingDirections.shift();
  if (queued !== null) {
    state.direction = queued;
  }

  const newHead = stepInDirection(state.snake.getHeadPosition(), state.direction);

  const cause = detectCollision(state, newHead);
  if (cause !== null) {
    return { kind: "collided", cause };
  }

  const ate = gridEquals(newHead, state.food);
  state.snake.advance(newHead, ate);

  if (!ate) {
    return { kind: "moved" };
  }

  state.food = placeFood(state.snake.getSegments(), state.bounds, state.rng);
  return { kind: "ate" };
}

/** Advance one tick. Returns true on game over. */
export function tickGame(state: GameState): boolean {
  return stepGame(state).kind === "collided";
}
