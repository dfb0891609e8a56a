import { INITIAL_SNAKE_LENGTH } from "../config";
import {
  type GridPos,
  type Direction,
  oppositeDirection,
  stepInDirection,
  gridEquals,
} from "../utils/grid";

// ── Snake body ───────────────────────────────────────────────────

/**
 * Ordered snake body: index 0 is the head, the last index is the tail.
 * Movement pushes a new head and pops the tail unless the snake grows.
 */
export class Snake {
  /** Ordered list of grid positions: index 0 = head, rest = body. */
  private segments: GridPos[] = [];

  constructor(
    headPos: GridPos,
    direction: Direction,
    length: number = INITIAL_SNAKE_LENGTH,
  ) {
    this.reset(headPos, direction, length);
  }

  /**
   * Lay the body out from `headPos`, trailing opposite to `direction` so the
   * snake faces its heading.
   */
  reset(
    headPos: GridPos,
    direction: Direction,
    length: number = INITIAL_SNAKE_LENGTH,
  ): void {
    const count = Math.max(1, Math.floor(length));
    const trailDir = oppositeDirection(direction);

    this.segments = [{ ...headPos }];
    for (let i = 1; i < count; i++) {
      this.segments.push(stepInDirection(this.segments[i - 1], trailDir));
    }
  }

  /** Replace the body wholesale (head first). */
  setSegments(segments: readonly GridPos[]): void {
    if (segments.length === 0) {
      throw new RangeError("A snake needs at least one segment");
    }
    this.segments = segments.map((s) => ({ ...s }));
  }

  // ── Movement ───────────────────────────────────────────────────

  /**
   * Push `newHead` to the front. The tail is dropped unless `grow` is set.
   */
  advance(newHead: GridPos, grow: boolean): void {
    this.segments.unshift({ ...newHead });
    if (!grow) {
      this.segments.pop();
    }
  }

  // ── State queries ──────────────────────────────────────────────

  getHeadPosition(): GridPos {
    return this.segments[0];
  }

  /** All segment grid positions (head first). */
  getSegments(): readonly GridPos[] {
    return this.segments;
  }

  getLength(): number {
    return this.segments.length;
  }

  /** Check if the given grid position overlaps any segment (including head). */
  isOnSnake(pos: GridPos): boolean {
    return this.segments.some((segment) => gridEquals(segment, pos));
  }

  /**
   * Like `isOnSnake`, but ignores the tail cell. Used for a plain move where
   * the tail is vacated in the same tick.
   */
  isOnSnakeExceptTail(pos: GridPos): boolean {
    for (let i = 0; i < this.segments.length - 1; i++) {
      if (gridEquals(this.segments[i], pos)) return true;
    }
    return false;
  }
}
