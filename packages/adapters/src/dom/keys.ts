import type { KeySymbol, PointerButton } from "@smileys/contracts";

const NAMED_KEYS = new Map<string, KeySymbol>([
  ["Escape", "escape"],
  ["Esc", "escape"],
  [" ", "space"],
  ["Spacebar", "space"],
  ["Enter", "enter"],
  ["Tab", "tab"],
  ["Backspace", "backspace"],
  ["ArrowLeft", "left"],
  ["ArrowRight", "right"],
  ["ArrowUp", "up"],
  ["ArrowDown", "down"],
]);

const POINTER_BUTTONS: readonly PointerButton[] = ["left", "middle", "right"];

/**
 * Map a KeyboardEvent `key` to a key symbol. Single characters come back
 * lower-cased; other named keys ("Shift", "F5", "Dead") map to null.
 */
export function keySymbolFor(key: string): KeySymbol | null {
  const named = NAMED_KEYS.get(key);
  if (named) return named;
  if ([...key].length === 1) return key.toLowerCase();
  return null;
}

/**
 * Map a PointerEvent `button` (0 main, 1 auxiliary, 2 secondary).
 */
export function pointerButtonFor(button: number): PointerButton | null {
  return POINTER_BUTTONS[button] ?? null;
}
