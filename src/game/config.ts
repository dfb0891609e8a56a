import type Phaser from "phaser";

// ── Grid Dimensions ──────────────────────────────────────────────
export const GRID_COLS = 25;
export const GRID_ROWS = 25;

// ── Initial Window Size (the canvas resizes with the page) ───────
export const SCREEN_WIDTH = 800;
export const SCREEN_HEIGHT = 450;
export const BORDER_THICKNESS = 2;
export const TARGET_FPS = 60;

// ── Simulation ──────────────────────────────────────────────────
/** Seconds between two simulation ticks. */
export const MOVE_INTERVAL_SECONDS = 0.1;
export const INITIAL_SNAKE_LENGTH = 3;
export const MAX_PENDING_DIRECTIONS = 3;
export const DEFAULT_DIRECTION = "right" as const;

// ── Palette ─────────────────────────────────────────────────────
export type RgbaColor = Readonly<{
  r: number;
  g: number;
  b: number;
  a: number;
}>;

export const COLORS = {
  BACKGROUND: { r: 10, g: 10, b: 10, a: 255 },
  BOARD: { r: 17, g: 17, b: 24, a: 255 },
  BORDER: { r: 0, g: 240, b: 255, a: 255 },
  FOOD: { r: 255, g: 45, b: 120, a: 255 },
  SNAKE_HEAD: { r: 71, g: 130, b: 255, a: 255 },
} as const satisfies Record<string, RgbaColor>;

export type BoardTheme = Readonly<{
  background: RgbaColor;
  board: RgbaColor;
  border: RgbaColor;
  food: RgbaColor;
  snakeHead: RgbaColor;
}>;

export const DEFAULT_THEME: BoardTheme = {
  background: COLORS.BACKGROUND,
  board: COLORS.BOARD,
  border: COLORS.BORDER,
  food: COLORS.FOOD,
  snakeHead: COLORS.SNAKE_HEAD,
};

/** Pack an RGBA color into the 0xRRGGBB number Phaser expects, plus alpha in [0, 1]. */
export function toPhaserColor(color: RgbaColor): { color: number; alpha: number } {
  const channel = (value: number) => Math.min(255, Math.max(0, Math.floor(value)));
  return {
    color: (channel(color.r) << 16) | (channel(color.g) << 8) | channel(color.b),
    alpha: channel(color.a) / 255,
  };
}

// ── Phaser namespace shape ──────────────────────────────────────
// Declares only the subset of the Phaser namespace used here so
// config.ts never needs a runtime `import Phaser` (which would
// crash during Next.js SSR because Phaser requires browser globals).
interface PhaserLike {
  AUTO: Phaser.Types.Core.GameConfig["type"];
  Scale: {
    RESIZE: Phaser.Types.Core.ScaleConfig["mode"];
    CENTER_BOTH: Phaser.Types.Core.ScaleConfig["autoCenter"];
  };
}

// ── Game Configuration Factory ───────────────────────────────────
export function createGameConfig(
  parent: HTMLElement,
  phaser: PhaserLike,
  scenes: Phaser.Types.Core.GameConfig["scene"],
): Phaser.Types.Core.GameConfig {
  return {
    type: phaser.AUTO,
    width: SCREEN_WIDTH,
    height: SCREEN_HEIGHT,
    parent,
    backgroundColor: "#0a0a0a",
    fps: { target: TARGET_FPS },
    scale: {
      mode: phaser.Scale.RESIZE,
      autoCenter: phaser.Scale.CENTER_BOTH,
    },
    scene: scenes,
  };
}
