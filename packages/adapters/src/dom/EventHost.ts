/**
 * The slice of the DOM event API the adapters listen through. `window`,
 * `document` and canvas elements all satisfy it.
 */
export interface EventHost {
  addEventListener(type: string, listener: (event: Event) => void): void;
  removeEventListener(type: string, listener: (event: Event) => void): void;
}

/**
 * An event host that also reports the viewport size (usually `window`).
 */
export interface ViewportHost extends EventHost {
  readonly innerWidth: number;
  readonly innerHeight: number;
}

export function readNumber(event: Event, field: string): number | null {
  const value: unknown = Reflect.get(event, field);
  return typeof value === "number" ? value : null;
}

export function readString(event: Event, field: string): string | null {
  const value: unknown = Reflect.get(event, field);
  return typeof value === "string" ? value : null;
}

export function readFlag(event: Event, field: string): boolean {
  return Reflect.get(event, field) === true;
}
