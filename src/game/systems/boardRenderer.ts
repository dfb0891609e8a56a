import {
  BORDER_THICKNESS,
  DEFAULT_THEME,
  type BoardTheme,
  type RgbaColor,
} from "../config";
import {
  type PixelRect,
  type ViewportSize,
  cellRect,
  computeBoardLayout,
} from "../utils/responsive";
import type { GameState } from "./GameState";

export type DrawCommand =
  | { kind: "fill"; rect: PixelRect; color: RgbaColor }
  | { kind: "outline"; rect: PixelRect; color: RgbaColor; thickness: number };

/** Minimal drawing surface; Phaser's Graphics is adapted to this by the scene. */
export interface DrawSurface {
  fillRect(rect: PixelRect, color: RgbaColor): void;
  strokeRect(rect: PixelRect, color: RgbaColor, thickness: number): void;
}

/**
 * Snake shade for segment `index` of `length`: the head keeps the full
 * color and every later segment gets darker.
 */
export function segmentColor(
  head: RgbaColor,
  index: number,
  length: number,
): RgbaColor {
  const factor = Math.floor(((length - index) * 255) / length);
  return {
    r: Math.floor((head.r * factor) / 255),
    g: Math.floor((head.g * factor) / 255),
    b: Math.floor((head.b * factor) / 255),
    a: 255,
  };
}

/**
 * Ordered draw commands for one frame: background, board, border, food,
 * then the snake from head to tail.
 */
export function buildDrawCommands(
  state: Pick<GameState, "bounds" | "snake" | "food">,
  viewport: ViewportSize,
  theme: BoardTheme = DEFAULT_THEME,
  borderThickness: number = BORDER_THICKNESS,
): DrawCommand[] {
  const layout = computeBoardLayout(state.bounds, viewport, borderThickness);
  const commands: DrawCommand[] = [
    {
      kind: "fill",
      rect: { x: 0, y: 0, width: viewport.width, height: viewport.height },
      color: theme.background,
    },
    { kind: "fill", rect: layout.frame, color: theme.board },
  ];

  if (borderThickness > 0) {
    commands.push({
      kind: "outline",
      rect: layout.frame,
      color: theme.border,
      thickness: borderThickness,
    });
  }

  commands.push({
    kind: "fill",
    rect: cellRect(layout, state.food),
    color: theme.food,
  });

  const segments = state.snake.getSegments();
  segments.forEach((segment, index) => {
    commands.push({
      kind: "fill",
      rect: cellRect(layout, segment),
      color: segmentColor(theme.snakeHead, index, segments.length),
    });
  });

  return commands;
}

export function drawCommands(
  surface: DrawSurface,
  commands: readonly DrawCommand[],
): void {
  for (const command of commands) {
    switch (command.kind) {
      case "fill":
        surface.fillRect(command.rect, command.color);
        break;
      case "outline":
        surface.strokeRect(command.rect, command.color, command.thickness);
        break;
    }
  }
}
