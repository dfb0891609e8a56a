"use client";

import { useEffect, useState } from "react";
import { gameBridge } from "@/game/bridge";

/**
 * HUD top bar overlay: current and best snake length for this session.
 */
export default function HUD() {
  const [length, setLength] = useState<number>(
    () => gameBridge.getState().length,
  );
  const [bestLength, setBestLength] = useState<number>(
    () => gameBridge.getState().bestLength,
  );

  useEffect(() => {
    const onLength = (value: number) => setLength(value);
    const onBestLength = (value: number) => setBestLength(value);

    gameBridge.on("lengthChange", onLength);
    gameBridge.on("bestLengthChange", onBestLength);

    return () => {
      gameBridge.off("lengthChange", onLength);
      gameBridge.off("bestLengthChange", onBestLength);
    };
  }, []);

  return (
    <div
      id="hud"
      className="absolute inset-x-0 top-0 flex items-center gap-4 px-4 py-2 font-mono text-sm"
      role="status"
      aria-label="Game HUD"
    >
      <span data-testid="hud-length">
        LENGTH<span className="ml-2 tabular-nums">{length}</span>
      </span>
      <span data-testid="hud-best">
        BEST<span className="ml-1 tabular-nums">{bestLength}</span>
      </span>
    </div>
  );
}
