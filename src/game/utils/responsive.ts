import type { GridBounds, GridPos } from "./grid";

// ── Types ─────────────────────────────────────────────────────────

/** Pixel dimensions of the drawable area. */
export interface ViewportSize {
  width: number;
  height: number;
}

/** Axis-aligned pixel rectangle. */
export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface BoardLayout {
  /** Side of one square cell in pixels, at least 1. */
  cellSize: number;
  /** Top-left pixel of cell (0, 0). */
  offset: GridPos;
  /** Pixel rectangle covered by the cells. */
  grid: PixelRect;
  /** Grid rectangle grown by the border thickness on every side. */
  frame: PixelRect;
}

// ── Sizing logic ──────────────────────────────────────────────────

/**
 * Largest square cell size that fits the grid into the viewport on both
 * axes once the border is taken off each side.
 *
 * The raw value is returned: it is 0 or negative when the viewport is
 * smaller than the grid, and callers that draw must clamp it.
 */
export function computeCellSize(
  gridCols: number,
  gridRows: number,
  viewportWidth: number,
  viewportHeight: number,
  borderThickness: number,
): number {
  const cellWidth = Math.floor((viewportWidth - borderThickness * 2) / gridCols);
  const cellHeight = Math.floor((viewportHeight - borderThickness * 2) / gridRows);
  return Math.min(cellWidth, cellHeight);
}

/**
 * Pixel offset that centers the grid rectangle inside the viewport.
 */
export function computeGridOffset(
  gridCols: number,
  gridRows: number,
  cellSize: number,
  viewportWidth: number,
  viewportHeight: number,
): GridPos {
  return {
    x: Math.floor((viewportWidth - cellSize * gridCols) / 2),
    y: Math.floor((viewportHeight - cellSize * gridRows) / 2),
  };
}

/**
 * Full layout used for drawing: clamped cell size, offset, and the grid and
 * bordered frame rectangles.
 */
export function computeBoardLayout(
  bounds: GridBounds,
  viewport: ViewportSize,
  borderThickness: number,
): BoardLayout {
  const cellSize = Math.max(
    1,
    computeCellSize(
      bounds.cols,
      bounds.rows,
      viewport.width,
      viewport.height,
      borderThickness,
    ),
  );
  const offset = computeGridOffset(
    bounds.cols,
    bounds.rows,
    cellSize,
    viewport.width,
    viewport.height,
  );
  const grid: PixelRect = {
    x: offset.x,
    y: offset.y,
    width: cellSize * bounds.cols,
    height: cellSize * bounds.rows,
  };

  return {
    cellSize,
    offset,
    grid,
    frame: {
      x: grid.x - borderThickness,
      y: grid.y - borderThickness,
      width: grid.width + borderThickness * 2,
      height: grid.height + borderThickness * 2,
    },
  };
}

/** Pixel rectangle of one cell under the given layout. */
export function cellRect(layout: BoardLayout, cell: GridPos): PixelRect {
  return {
    x: layout.offset.x + cell.x * layout.cellSize,
    y: layout.offset.y + cell.y * layout.cellSize,
    width: layout.cellSize,
    height: layout.cellSize,
  };
}
