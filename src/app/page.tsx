"use client";

import dynamic from "next/dynamic";
import HUD from "@/components/HUD";

const Game = dynamic(() => import("@/components/Game"), { ssr: false });

export default function Home() {
  return (
    <main className="relative h-screen w-screen overflow-hidden">
      {/* Layer 0: Phaser canvas */}
      <div className="absolute inset-0">
        <Game />
      </div>

      {/* Layer 1: HUD overlay */}
      <div className="pointer-events-none absolute inset-0 z-10">
        <HUD />
      </div>
    </main>
  );
}
