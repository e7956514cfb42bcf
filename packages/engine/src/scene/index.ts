export { SceneEntity } from "./SceneEntity";
export {
  Smiley,
  type SmileyConfig,
  type DriftRange,
  RANDOM_CHANNEL_MIN,
  RANDOM_CHANNEL_SPAN,
} from "./Smiley";
export { Scene, DEFAULT_SCENE_SETUP, type SceneSetup, type SmileySetup } from "./Scene";
