import { MAX_PENDING_DIRECTIONS } from "../config";
import { type Direction, isOppositeDirection } from "../utils/grid";

/**
 * Bounded FIFO of buffered direction changes, so rapid key presses can queue
 * ahead of the fixed-cadence tick.
 *
 * Each entry must be a legal turn relative to the direction that will be
 * active when it is consumed: the committed heading for the first entry,
 * the previous entry for every later one.
 */
export class DirectionQueue {
  private entries: Direction[] = [];

  constructor(private readonly capacity: number = MAX_PENDING_DIRECTIONS) {}

  /**
   * Buffer a direction change. The direction is rejected if:
   * - The buffer is full
   * - It's the same as the last buffered direction
   * - It's the opposite of the last buffered direction (or the committed
   *   direction if the buffer is empty)
   *
   * Rejections are silent; the return value reports whether it was queued.
   */
  enqueue(committed: Direction, next: Direction): boolean {
    if (this.entries.length >= this.capacity) return false;

    const last = this.peekLast();
    if (last !== null && last === next) return false;

    const reference = last ?? committed;
    if (isOppositeDirection(reference, next)) return false;

    this.entries.push(next);
    return true;
  }

  /** Remove and return the oldest entry, or null when empty. */
  shift(): Direction | null {
    return this.entries.shift() ?? null;
  }

  peekLast(): Direction | null {
    return this.entries.length > 0
      ? this.entries[this.entries.length - 1]
      : null;
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  toArray(): Direction[] {
    return [...this.entries];
  }
}
