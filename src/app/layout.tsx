import type { Metadata } from "next";
import type { ReactNode } from "react";
import "@/styles/globals.css";

export const metadata: Metadata = {
  title: "Snake",
  description: "Grid snake: eat, grow, and stay off the walls.",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="antialiased bg-background text-foreground overflow-hidden">
        {children}
      </body>
    </html>
  );
}
