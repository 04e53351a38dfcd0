export type * from "./types";

export { Vec2, GEOMETRY_EPSILON } from "./math/Vec2";
export { Angle, linspace } from "./math/Angle";
export { RayUtils, intersectRayCircle, TANGENT_EPSILON } from "./math/Ray";

export { DEFAULT_SCENE_CONFIG, createSceneConfig, type SceneConfig } from "./config/sceneConfig";
export { LightcasterError, InvalidKindError, InvalidConfigError } from "./errors";

export {
  OBJECT_KINDS,
  EMITTER_KINDS,
  isObjectKind,
  isEmitter,
  isAbsorber,
  isDirectional,
  createSceneObject,
  containsPoint,
  pickRadiusOf,
} from "./objects/SceneObject";

export {
  generateRays,
  generateIsotropicRays,
  generateCollimatedRays,
  generateSpotlightRays,
} from "./emitters/RayGenerator";

export {
  traceScene,
  traceEmitter,
  traceRay,
  findNearestHit,
  viewportDiagonal,
  absorptionPoints,
  type TraceOptions,
  type RayHit,
  type AbsorptionPoint,
} from "./tracing/TracingEngine";

export { SceneManager } from "./scene/SceneManager";
export { SceneController, SCENE_ACTIONS, isSceneAction } from "./scene/SceneController";

export { SceneDebugLogger, type SceneDebugLog } from "./debug/SceneDebugLogger";
export {
  PRESET_SCENES,
  getPresetScene,
  applyPreset,
  type PresetScene,
  type PresetPlacement,
} from "./debug/presetScenes";
