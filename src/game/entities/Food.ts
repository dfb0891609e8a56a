import { type GridBounds, type GridPos, toGridKey } from "../utils/grid";
import { type Rng, randomIndex } from "../utils/random";

/** Placement returned when the snake covers the whole grid. */
export const FULL_GRID_SENTINEL: GridPos = Object.freeze({ x: 0, y: 0 });

/**
 * Every cell of the grid that no snake segment occupies, in column-major
 * order (x outer, y inner).
 */
export function collectFreeCells(
  snakeCells: Iterable<GridPos>,
  bounds: GridBounds,
): GridPos[] {
  const occupied = new Set<string>();
  for (const cell of snakeCells) {
    occupied.add(toGridKey(cell));
  }

  const freeCells: GridPos[] = [];
  for (let x = 0; x < bounds.cols; x++) {
    for (let y = 0; y < bounds.rows; y++) {
      const pos: GridPos = { x, y };
      if (!occupied.has(toGridKey(pos))) {
        freeCells.push(pos);
      }
    }
  }
  return freeCells;
}

/**
 * Pick a free cell uniformly at random.
 *
 * If the grid is completely full (snake fills every cell), falls back to
 * (0, 0). No legal placement exists then, and play keeps going.
 */
export function placeFood(
  snakeCells: Iterable<GridPos>,
  bounds: GridBounds,
  rng: Rng,
): GridPos {
  const freeCells = collectFreeCells(snakeCells, bounds);

  if (freeCells.length === 0) {
    return FULL_GRID_SENTINEL;
  }

  return freeCells[randomIndex(rng, freeCells.length)];
}
