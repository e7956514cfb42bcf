export { DomEventSource, type DomEventSourceConfig } from "./DomEventSource";
export { keySymbolFor, pointerButtonFor } from "./keys";
export type { EventHost, ViewportHost } from "./EventHost";
