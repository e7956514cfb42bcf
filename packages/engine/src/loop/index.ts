export {
  SceneLoop,
  type SceneLoopConfig,
  type SceneLoopDeps,
  type LoopState,
} from "./SceneLoop";
