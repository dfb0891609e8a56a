import { describe, it, expect } from "vitest";
import {
  MIN_GRID_SIZE,
  createGameState,
  detectCollision,
  normalizeBounds,
  queueDirection,
  resetGame,
  stepGame,
  tickGame,
  type GameState,
} from "@/game/systems/GameState";
import type { Direction, GridPos } from "@/game/utils/grid";
import { isInBounds } from "@/game/utils/grid";
import { mulberry32 } from "@/game/utils/random";

// ── Helpers ──────────────────────────────────────────────────────

function createState(
  segments: GridPos[],
  direction: Direction,
  food: GridPos,
  rng: () => number = () => 0,
): GameState {
  const state = createGameState({ bounds: { cols: 5, rows: 5 }, rng, direction });
  state.snake.setSegments(segments);
  state.direction = direction;
  state.food = food;
  return state;
}

function onSnake(state: GameState, pos: GridPos): boolean {
  return state.snake.isOnSnake(pos);
}

// ── Creation & reset ─────────────────────────────────────────────

describe("createGameState", () => {
  it("defaults to a 25x25 grid heading right", () => {
    const state = createGameState({ rng: () => 0 });
    expect(state.bounds).toEqual({ cols: 25, rows: 25 });
    expect(state.direction).toBe("right");
    expect(state.snake.getSegments()).toEqual([
      { x: 12, y: 12 },
      { x: 11, y: 12 },
      { x: 10, y: 12 },
    ]);
  });

  it("falls back to right for an invalid starting direction", () => {
    const state = createGameState({ rng: () => 0, direction: "sideways" });
    expect(state.direction).toBe("right");
  });

  it("raises grids smaller than a centered starting snake to 5x5", () => {
    const state = createGameState({ bounds: { cols: 4, rows: 2 }, rng: () => 0 });
    expect(state.bounds).toEqual({ cols: 5, rows: 5 });
  });

  it("places food on the first free cell for a zero generator", () => {
    const state = createGameState({ bounds: { cols: 5, rows: 5 }, rng: () => 0 });
    expect(state.food).toEqual({ x: 0, y: 0 });
  });
});

describe("resetGame", () => {
  it("lays the body behind the head along the committed direction", () => {
    const state = createGameState({ bounds: { cols: 5, rows: 5 }, rng: () => 0 });
    state.direction = "up";
    resetGame(state);
    expect(state.snake.getSegments()).toEqual([
      { x: 2, y: 2 },
      { x: 2, y: 3 },
      { x: 2, y: 4 },
    ]);
    expect(state.direction).toBe("up");
  });

  it("clears pending turns and the move timer", () => {
    const state = createGameState({ bounds: { cols: 5, rows: 5 }, rng: () => 0 });
    queueDirection(state, "up");
    state.moveTimer = 0.07;
    resetGame(state);
    expect(state.pendingDirections.size).toBe(0);
    expect(state.moveTimer).toBe(0);
  });

  it("keeps the grid bounds", () => {
    const state = createGameState({ bounds: { cols: 7, rows: 9 }, rng: () => 0 });
    resetGame(state);
    expect(state.bounds).toEqual({ cols: 7, rows: 9 });
  });

  it("always yields length 3 inside bounds with food off the body", () => {
    const rng = mulberry32(7);
    const state = createGameState({ bounds: { cols: 6, rows: 6 }, rng });
    const directions: Direction[] = ["up", "down", "left", "right"];
    for (let i = 0; i < 40; i++) {
      state.direction = directions[i % 4];
      resetGame(state);
      expect(state.snake.getLength()).toBe(3);
      for (const segment of state.snake.getSegments()) {
        expect(isInBounds(segment, state.bounds)).toBe(true);
      }
      expect(onSnake(state, state.food)).toBe(false);
    }
  });
});

describe("normalizeBounds", () => {
  it("floors fractional sides", () => {
    expect(normalizeBounds({ cols: 7.9, rows: 12.2 })).toEqual({ cols: 7, rows: 12 });
  });

  it("clamps each side to the minimum", () => {
    expect(normalizeBounds({ cols: 0, rows: -3 })).toEqual({ cols: 5, rows: 5 });
    expect(normalizeBounds({ cols: 4, rows: 30 })).toEqual({ cols: 5, rows: 30 });
  });

  it("falls back to the default grid for non-finite sides", () => {
    expect(normalizeBounds({ cols: Number.NaN, rows: Infinity })).toEqual({
      cols: 25,
      rows: 25,
    });
  });
});

describe("reset on the smallest grid", () => {
  const directions: Direction[] = ["up", "down", "left", "right"];

  it.each(directions)("keeps a %s-facing snake inside a grid requested as 4x4", (direction) => {
    const state = createGameState({
      bounds: { cols: 4, rows: 4 },
      rng: () => 0,
      direction,
    });
    resetGame(state);
    expect(state.bounds).toEqual({ cols: MIN_GRID_SIZE, rows: MIN_GRID_SIZE });
    expect(state.snake.getLength()).toBe(3);
    for (const segment of state.snake.getSegments()) {
      expect(isInBounds(segment, state.bounds)).toBe(true);
    }
  });
});

// ── Input ───────────────────────────────────────────────────────

describe("queueDirection", () => {
  it("rejects left and accepts up while heading right", () => {
    const state = createGameState({ rng: () => 0 });
    expect(queueDirection(state, "left")).toBe(false);
    expect(queueDirection(state, "up")).toBe(true);
    expect(state.pendingDirections.toArray()).toEqual(["up"]);
  });
});

// ── Tick ────────────────────────────────────────────────────────

describe("tickGame", () => {
  it("eats food in front of the head and grows by one", () => {
    const state = createState(
      [
        { x: 2, y: 2 },
        { x: 1, y: 2 },
        { x: 0, y: 2 },
      ],
      "right",
      { x: 3, y: 2 },
    );

    expect(tickGame(state)).toBe(false);
    expect(state.snake.getSegments()).toEqual([
      { x: 3, y: 2 },
      { x: 2, y: 2 },
      { x: 1, y: 2 },
      { x: 0, y: 2 },
    ]);
    // 21 free cells remain; a zero generator picks the first one.
    expect(state.food).toEqual({ x: 0, y: 0 });
    expect(onSnake(state, state.food)).toBe(false);
  });

  it("reports game over when leaving through the left wall", () => {
    const state = createState(
      [
        { x: 0, y: 2 },
        { x: 1, y: 2 },
        { x: 2, y: 2 },
      ],
      "left",
      { x: 4, y: 4 },
    );

    expect(tickGame(state)).toBe(true);
    // Body is left as it was.
    expect(state.snake.getSegments()).toEqual([
      { x: 0, y: 2 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
    ]);
  });

  it("shifts every cell by one step without food", () => {
    const state = createState(
      [
        { x: 2, y: 2 },
        { x: 2, y: 3 },
        { x: 2, y: 4 },
      ],
      "up",
      { x: 4, y: 4 },
    );

    expect(tickGame(state)).toBe(false);
    expect(state.snake.getSegments()).toEqual([
      { x: 2, y: 1 },
      { x: 2, y: 2 },
      { x: 2, y: 3 },
    ]);
    expect(state.food).toEqual({ x: 4, y: 4 });
  });

  it("applies the oldest queued turn first", () => {
    const state = createState(
      [
        { x: 2, y: 2 },
        { x: 1, y: 2 },
        { x: 0, y: 2 },
      ],
      "right",
      { x: 4, y: 4 },
    );
    queueDirection(state, "down");
    queueDirection(state, "left");

    tickGame(state);
    expect(state.direction).toBe("down");
    expect(state.snake.getHeadPosition()).toEqual({ x: 2, y: 3 });

    tickGame(state);
    expect(state.direction).toBe("left");
    expect(state.snake.getHeadPosition()).toEqual({ x: 1, y: 3 });
  });

  it("keeps the committed direction once the queue is empty", () => {
    const state = createState([{ x: 0, y: 0 }], "down", { x: 4, y: 4 });
    queueDirection(state, "right");
    tickGame(state);
    tickGame(state);
    expect(state.direction).toBe("right");
    expect(state.snake.getHeadPosition()).toEqual({ x: 2, y: 0 });
  });

  it("detects running into the body", () => {
    // Head at (1,1) heading down into (1,2), which is mid-body.
    const state = createState(
      [
        { x: 1, y: 1 },
        { x: 0, y: 1 },
        { x: 0, y: 2 },
        { x: 1, y: 2 },
        { x: 2, y: 2 },
      ],
      "down",
      { x: 4, y: 4 },
    );
    expect(stepGame(state)).toEqual({ kind: "collided", cause: "self" });
  });

  it("lets the head follow into the cell the tail is leaving", () => {
    // 2x2 loop: head (1,0) heading down to (1,1), the current tail.
    const state = createState(
      [
        { x: 1, y: 0 },
        { x: 0, y: 0 },
        { x: 0, y: 1 },
        { x: 1, y: 1 },
      ],
      "down",
      { x: 4, y: 4 },
    );

    expect(tickGame(state)).toBe(false);
    expect(state.snake.getSegments()).toEqual([
      { x: 1, y: 1 },
      { x: 1, y: 0 },
      { x: 0, y: 0 },
      { x: 0, y: 1 },
    ]);
  });

  it("counts the tail as a collision when the snake grows onto it", () => {
    const state = createState(
      [
        { x: 1, y: 0 },
        { x: 0, y: 0 },
        { x: 0, y: 1 },
        { x: 1, y: 1 },
      ],
      "down",
      { x: 1, y: 1 },
    );
    expect(detectCollision(state, { x: 1, y: 1 })).toBe("self");
  });

  it("reports each wall", () => {
    const cases: Array<[GridPos, Direction]> = [
      [{ x: 2, y: 0 }, "up"],
      [{ x: 2, y: 4 }, "down"],
      [{ x: 0, y: 2 }, "left"],
      [{ x: 4, y: 2 }, "right"],
    ];
    for (const [head, direction] of cases) {
      const state = createState([head], direction, { x: 2, y: 2 });
      expect(stepGame(state)).toEqual({ kind: "collided", cause: "wall" });
    }
  });

  it("returns ate / moved outcomes", () => {
    const state = createState([{ x: 0, y: 0 }], "right", { x: 1, y: 0 });
    expect(stepGame(state)).toEqual({ kind: "ate" });
    expect(stepGame(state).kind).toBe("moved");
  });

  it("relocates food outside the new body after eating", () => {
    const rng = mulberry32(31);
    const state = createState(
      [
        { x: 2, y: 2 },
        { x: 1, y: 2 },
        { x: 0, y: 2 },
      ],
      "right",
      { x: 3, y: 2 },
      rng,
    );
    tickGame(state);
    expect(state.snake.getLength()).toBe(4);
    expect(onSnake(state, state.food)).toBe(false);
    expect(isInBounds(state.food, state.bounds)).toBe(true);
  });
});
