import Phaser from "phaser";
import { toPhaserColor, type RgbaColor } from "../config";
import { GameLoop } from "../systems/GameLoop";
import {
  buildDrawCommands,
  drawCommands,
  type DrawSurface,
} from "../systems/boardRenderer";
import { directionForKeyEdge, type KeyEdgeEvent } from "../utils/keyboardInput";
import { createConsoleLogger, type Logger } from "../utils/logger";
import { mulberry32, randomSeed, readSessionSeed, type Rng } from "../utils/random";
import type { PixelRect } from "../utils/responsive";

/**
 * Adapt a Phaser Graphics object to the renderer's draw surface. Outlines
 * are drawn inside the rectangle, like a border.
 */
export function createGraphicsSurface(
  gfx: Phaser.GameObjects.Graphics,
): DrawSurface {
  return {
    fillRect(rect: PixelRect, color: RgbaColor) {
      const { color: hex, alpha } = toPhaserColor(color);
      gfx.fillStyle(hex, alpha);
      gfx.fillRect(rect.x, rect.y, rect.width, rect.height);
    },
    strokeRect(rect: PixelRect, color: RgbaColor, thickness: number) {
      const { color: hex, alpha } = toPhaserColor(color);
      const half = thickness / 2;
      gfx.lineStyle(thickness, hex, alpha);
      gfx.strokeRect(
        rect.x + half,
        rect.y + half,
        rect.width - thickness,
        rect.height - thickness,
      );
    },
  };
}

/** Seed from `?seed=` when present, otherwise a fresh one for this session. */
function resolveSessionRng(logger: Logger): Rng {
  const search = typeof window !== "undefined" ? window.location.search : "";
  const seed = readSessionSeed(search) ?? randomSeed();
  logger.info(`session seed ${seed}`);
  return mulberry32(seed);
}

/**
 * Gameplay scene.
 *
 * Owns the game loop for the session: keyboard edges are queued as turns,
 * each Phaser update feeds the frame delta to the loop, and the whole board
 * is redrawn at the current canvas size.
 */
export class MainScene extends Phaser.Scene {
  /** The loop for this session (null before create / after shutdown). */
  private loop: GameLoop | null = null;

  private gfx: Phaser.GameObjects.Graphics | null = null;

  private surface: DrawSurface | null = null;

  private readonly logger: Logger = createConsoleLogger("snake");

  /** Stored keyboard handler reference for cleanup in shutdown(). */
  private keydownHandler: ((event: KeyEdgeEvent) => void) | null = null;

  /** Optional generator override, used by tests for deterministic food. */
  private rng: Rng | null = null;

  constructor() {
    super({ key: "MainScene" });
  }

  // ── Phaser lifecycle ────────────────────────────────────────

  create(): void {
    this.loop = new GameLoop({
      rng: this.rng ?? resolveSessionRng(this.logger),
      logger: this.logger,
    });

    this.gfx = this.add.graphics();
    this.surface = createGraphicsSurface(this.gfx);

    this.keydownHandler = (event: KeyEdgeEvent) => {
      const direction = directionForKeyEdge(event);
      if (direction) {
        this.loop?.handleDirection(direction);
      }
    };
    this.input.keyboard?.on("keydown", this.keydownHandler);

    this.events.once("shutdown", this.shutdown, this);
    this.drawBoard();
  }

  update(_time: number, delta: number): void {
    if (!this.loop) return;

    this.loop.frame(delta / 1000);
    this.drawBoard();
  }

  /** Phaser shutdown callback: detach input and stop publishing. */
  shutdown(): void {
    if (this.keydownHandler) {
      this.input.keyboard?.off("keydown", this.keydownHandler);
      this.keydownHandler = null;
    }
    this.loop?.dispose();
    this.loop = null;
    this.gfx?.destroy();
    this.gfx = null;
    this.surface = null;
  }

  // ── Drawing ─────────────────────────────────────────────────

  private drawBoard(): void {
    if (!this.loop || !this.gfx || !this.surface) return;

    this.gfx.clear();
    drawCommands(
      this.surface,
      buildDrawCommands(this.loop.getState(), {
        width: this.scale.width,
        height: this.scale.height,
      }),
    );
  }

  // ── Accessors (for tests and external integration) ──────────

  /** Set the RNG function used when the scene is next created. */
  setRng(rng: Rng): void {
    this.rng = rng;
  }

  getLoop(): GameLoop | null {
    return this.loop;
  }
}
