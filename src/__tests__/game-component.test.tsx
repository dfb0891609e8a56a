import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { render, cleanup, waitFor, act } from "@testing-library/react";
import fs from "fs";
import path from "path";

const ROOT = path.resolve(__dirname, "../..");

// Track Phaser.Game constructor calls and destroy calls
const mockDestroy = vi.fn();
const mockGameInstances: Array<{
  destroy: typeof mockDestroy;
  config: Record<string, unknown>;
}> = [];

vi.mock("phaser", () => {
  const RESIZE = 5;
  const CENTER_BOTH = 1;
  const AUTO = 0;

  class MockScene {
    constructor() {}
  }

  class MockGame {
    destroy: typeof mockDestroy;
    constructor(public config: Record<string, unknown>) {
      this.destroy = mockDestroy;
      mockGameInstances.push(this);
    }
  }

  return {
    default: {
      Game: MockGame,
      Scene: MockScene,
      AUTO,
      Scale: { RESIZE, CENTER_BOTH },
    },
    Game: MockGame,
    Scene: MockScene,
    AUTO,
    Scale: { RESIZE, CENTER_BOTH },
  };
});

// Mock the scene module to prevent it from importing real Phaser
vi.mock("@/game/scenes/MainScene", () => {
  class MainScene {}
  return { MainScene };
});

// Import after mock setup
import Game from "@/components/Game";
import { MainScene } from "@/game/scenes/MainScene";

beforeEach(() => {
  mockDestroy.mockClear();
  mockGameInstances.length = 0;
});

afterEach(async () => {
  // Give any in-flight promises time to settle before cleanup
  await act(async () => {
    await new Promise((r) => setTimeout(r, 0));
  });
  cleanup();
});

describe("Game component", () => {
  it("renders a #game-container div and initialises asynchronously", async () => {
    const { container } = render(<Game />);
    await waitFor(() => {
      expect(container.querySelector("#game-container")).toBeTruthy();
      expect(mockGameInstances.length).toBe(1);
    });
  });

  it("passes the container div as parent to Phaser.Game", async () => {
    const { container } = render(<Game />);
    await waitFor(() => {
      expect(mockGameInstances.length).toBe(1);
    });
    const gameContainer = container.querySelector("#game-container");
    expect(mockGameInstances[0].config.parent).toBe(gameContainer);
  });

  it("starts at the initial window size with a resizable canvas", async () => {
    render(<Game />);
    await waitFor(() => {
      expect(mockGameInstances.length).toBe(1);
    });
    const config = mockGameInstances[0].config;
    expect(config.width).toBe(800);
    expect(config.height).toBe(450);
    expect(config.scale).toEqual({ mode: 5, autoCenter: 1 });
  });

  it("registers the main scene", async () => {
    render(<Game />);
    await waitFor(() => {
      expect(mockGameInstances.length).toBe(1);
    });
    expect(mockGameInstances[0].config.scene).toEqual([MainScene]);
  });

  it("calls game.destroy(true) on unmount", async () => {
    const { unmount } = render(<Game />);
    await waitFor(() => {
      expect(mockGameInstances.length).toBe(1);
    });
    expect(mockDestroy).not.toHaveBeenCalled();
    unmount();
    expect(mockDestroy).toHaveBeenCalledWith(true);
  });

  it("does not create duplicate instances on rerender", async () => {
    const { rerender } = render(<Game />);
    await waitFor(() => {
      expect(mockGameInstances.length).toBe(1);
    });
    rerender(<Game />);
    // Wait a tick and confirm still only one instance
    await new Promise((r) => setTimeout(r, 50));
    expect(mockGameInstances.length).toBe(1);
  });

  it("source file uses async import('phaser') instead of top-level import", () => {
    const source = fs.readFileSync(
      path.join(ROOT, "src/components/Game.tsx"),
      "utf-8"
    );
    expect(source).not.toMatch(/^import\s+.*from\s+["']phaser["']/m);
    expect(source).toContain('import("phaser")');
  });

  it("config.ts only imports phaser types", () => {
    const source = fs.readFileSync(
      path.join(ROOT, "src/game/config.ts"),
      "utf-8"
    );
    expect(source).not.toMatch(/^import\s+(?!type\s).*from\s+["']phaser["']/m);
  });
});
