export { CanvasSurface } from "./CanvasSurface";
export { CanvasWindow } from "./CanvasWindow";
export {
  CanvasGraphics,
  createDomCanvas,
  type CanvasFactory,
  type CanvasGraphicsConfig,
} from "./CanvasGraphics";
