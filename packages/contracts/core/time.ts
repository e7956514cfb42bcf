export type Ms = number;        // milliseconds (durations, timeouts)
export type BackendMs = number; // ms since backend init (monotonic)
