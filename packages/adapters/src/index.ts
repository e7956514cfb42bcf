// Canvas surfaces and windows
export * from "./canvas";

// Page input
export * from "./dom";

// Clock and random source
export * from "./system";
