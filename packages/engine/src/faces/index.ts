export {
  buildFace,
  type FaceBuilder,
  FACE_SIZE,
  FACE_DEPTH,
  SHADOW_COLOR,
  SHADOW_RECT,
  HEAD_RECT,
  EYE_RECTS,
  MOUTH_RECT,
} from "./buildFace";
