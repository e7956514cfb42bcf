export * from "./core/time";

export * from "./color/color";
export * from "./geometry/geometry";

export * from "./graphics/graphics";

// Input events (backend → loop)
export * from "./input/events";

export * from "./runtime/runtime";

export * from "./scene/scene";
