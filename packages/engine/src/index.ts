// Face surfaces
export * from "./faces";

// Scene model
export * from "./scene";

// Renderers
export * from "./renderers";

// Event loop
export * from "./loop";
