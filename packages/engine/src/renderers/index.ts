export { SceneRenderer, type SceneRendererConfig } from "./SceneRenderer";
