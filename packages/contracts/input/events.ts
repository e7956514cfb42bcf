/**
 * Input Event Types
 *
 * What the backend's event source can deliver to the loop. One event per
 * poll; a poll that times out yields null.
 */

/**
 * Named keys, plus any single printable character ("q", "a", "1", ...).
 */
export type KeySymbol =
  | "escape"
  | "space"
  | "enter"
  | "tab"
  | "backspace"
  | "left"
  | "right"
  | "up"
  | "down"
  | (string & {});

export type WindowState = "exposed" | "resized" | "focus-gained" | "focus-lost";

export interface WindowEvent {
  kind: "window";
  state: WindowState;
}

export interface QuitEvent {
  kind: "quit";
}

export type PointerButton = "left" | "middle" | "right";

export interface PointerPressEvent {
  kind: "pointer-press";
  x: number;
  y: number;
  button: PointerButton;
}

export interface KeyPressEvent {
  kind: "key-press";
  key: KeySymbol;
}

export type InputEvent = WindowEvent | QuitEvent | PointerPressEvent | KeyPressEvent;

export function describeEvent(event: InputEvent): string {
  switch (event.kind) {
    case "window":
      return `window ${event.state}`;
    case "quit":
      return "quit";
    case "pointer-press":
      return `pointer-press ${event.button} at (${event.x}, ${event.y})`;
    case "key-press":
      return `key-press ${event.key}`;
  }
}
