export type GridPos = Readonly<{
  x: number;
  y: number;
}>;

export type GridBounds = Readonly<{
  cols: number;
  rows: number;
}>;

export type Direction = "up" | "right" | "down" | "left";

export const CARDINAL_DIRECTIONS = [
  "up",
  "right",
  "down",
  "left",
] as const satisfies ReadonlyArray<Direction>;

export const isDirection = (value: unknown): value is Direction =>
  value === "up" || value === "right" || value === "down" || value === "left";

export const directionVector = (direction: Direction): GridPos => {
  switch (direction) {
    case "up":
      return { x: 0, y: -1 };
    case "down":
      return { x: 0, y: 1 };
    case "left":
      return { x: -1, y: 0 };
    case "right":
      return { x: 1, y: 0 };
  }
};

export const oppositeDirection = (direction: Direction): Direction => {
  switch (direction) {
    case "up":
      return "down";
    case "down":
      return "up";
    case "left":
      return "right";
    case "right":
      return "left";
  }
};

export const isOppositeDirection = (
  currentDirection: Direction,
  nextDirection: Direction,
): boolean => oppositeDirection(currentDirection) === nextDirection;

export const gridEquals = (first: GridPos, second: GridPos): boolean =>
  first.x === second.x && first.y === second.y;

export const toGridKey = (position: GridPos): string =>
  `${position.x},${position.y}`;

export const stepInDirection = (
  position: GridPos,
  direction: Direction,
): GridPos => {
  const vector = directionVector(direction);

  return {
    x: position.x + vector.x,
    y: position.y + vector.y,
  };
};

export const isInBounds = (position: GridPos, bounds: GridBounds): boolean =>
  position.x >= 0 &&
  position.y >= 0 &&
  position.x < bounds.cols &&
  position.y < bounds.rows;

/** Center cell of the grid, rounding down on even dimensions. */
export const gridCenter = (bounds: GridBounds): GridPos => ({
  x: Math.floor(bounds.cols / 2),
  y: Math.floor(bounds.rows / 2),
});
