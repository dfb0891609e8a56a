"use client";

import dynamic from "next/dynamic";
import { useEffect, useRef } from "react";
import { createConsoleLogger } from "@/game/utils/logger";

type PhaserGameInstance = {
  destroy: (removeCanvas: boolean, noReturn?: boolean) => void;
};

const logger = createConsoleLogger("snake");

function PhaserGameMount() {
  const mountRef = useRef<HTMLDivElement | null>(null);
  const gameRef = useRef<PhaserGameInstance | null>(null);

  useEffect(() => {
    let cancelled = false;
    const mountNode = mountRef.current;

    if (!mountNode || gameRef.current) {
      return;
    }

    mountNode.replaceChildren();

    void (async () => {
      try {
        const [
          { default: Phaser },
          { createGameConfig },
          { MainScene },
        ] = await Promise.all([
          import("phaser"),
          import("@/game/config"),
          import("@/game/scenes/MainScene"),
        ]);

        if (cancelled || !mountNode.isConnected || gameRef.current) {
          return;
        }

        gameRef.current = new Phaser.Game(
          createGameConfig(mountNode, Phaser, [MainScene]),
        );
      } catch (error) {
        // Keep the page up if the game fails to boot.
        logger.error("failed to start the game", error);
      }
    })();

    return () => {
      cancelled = true;

      if (gameRef.current) {
        gameRef.current.destroy(true);
        gameRef.current = null;
      }

      mountNode.replaceChildren();
    };
  }, []);

  return <div id="game-container" ref={mountRef} className="h-full w-full" />;
}

const ClientOnlyPhaserGame = dynamic(() => Promise.resolve(PhaserGameMount), {
  ssr: false,
});

export default function Game() {
  return <ClientOnlyPhaserGame />;
}
