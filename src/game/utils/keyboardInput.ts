import type { Direction } from "./grid";

/** Key mapping from keyboard codes to Direction. */
const KEY_DIRECTION_MAP: Readonly<Record<string, Direction>> = {
  ArrowUp: "up",
  ArrowDown: "down",
  ArrowLeft: "left",
  ArrowRight: "right",
  KeyW: "up",
  KeyS: "down",
  KeyA: "left",
  KeyD: "right",
};

/** Minimal shape of a DOM keydown event. */
export interface KeyEdgeEvent {
  code: string;
  repeat?: boolean;
}

export function directionForKey(code: string): Direction | null {
  return Object.hasOwn(KEY_DIRECTION_MAP, code) ? KEY_DIRECTION_MAP[code] : null;
}

/**
 * Direction for a key-down edge. Auto-repeat events from a held key are not
 * edges and map to null.
 */
export function directionForKeyEdge(event: KeyEdgeEvent): Direction | null {
  if (event.repeat) return null;
  return directionForKey(event.code);
}
