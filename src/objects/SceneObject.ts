/**
 * SceneObject - factories and capability checks for the scene object union.
 *
 * Objects are plain immutable records tagged by `kind`. Every function here
 * switches over the tag, so adding a variant is a compile error until each
 * switch handles it.
 */

import type { SceneConfig } from "@/config/sceneConfig";
import { InvalidKindError } from "@/errors";
import { Vec2 } from "@/math/Vec2";
import type {
  Absorber,
  DirectionalEmitter,
  Emitter,
  EmitterKind,
  ObjectKind,
  SceneObject,
  Vector2,
} from "@/types";

export const EMITTER_KINDS: readonly EmitterKind[] = ["isotropic", "collimated", "spotlight"];

export const OBJECT_KINDS: readonly ObjectKind[] = [...EMITTER_KINDS, "circle", "perfect-absorber"];

export function isObjectKind(kind: string): kind is ObjectKind {
  return OBJECT_KINDS.some((known) => known === kind);
}

export function isEmitter(object: SceneObject): object is Emitter {
  switch (object.kind) {
    case "isotropic":
    case "collimated":
    case "spotlight":
      return true;
    case "circle":
    case "perfect-absorber":
      return false;
  }
}

export function isAbsorber(object: SceneObject): object is Absorber {
  return !isEmitter(object);
}

/**
 * Emitters with a direction that rotate actions can change.
 */
export function isDirectional(object: SceneObject): object is DirectionalEmitter {
  return object.kind === "collimated" || object.kind === "spotlight";
}

/**
 * Build an object of the given kind with default parameters.
 *
 * @param kind - Object kind; anything unrecognized throws InvalidKindError
 * @param id - Identifier assigned by the owning scene
 * @param order - Creation order within the scene
 * @param position - Where the object is placed
 * @param config - Source of default parameters
 */
export function createSceneObject(
  kind: string,
  id: string,
  order: number,
  position: Vector2,
  config: SceneConfig
): SceneObject {
  if (!isObjectKind(kind)) {
    throw new InvalidKindError(kind, OBJECT_KINDS);
  }

  const base = { id, order, position: { x: position.x, y: position.y } };

  switch (kind) {
    case "isotropic":
      return { ...base, kind, rayCount: config.rayCount };
    case "collimated":
      return {
        ...base,
        kind,
        rayCount: config.rayCount,
        direction: config.defaultDirection,
        beamWidth: config.beamWidth,
      };
    case "spotlight":
      return {
        ...base,
        kind,
        rayCount: config.rayCount,
        direction: config.defaultDirection,
        halfAngle: config.spotlightHalfAngle,
      };
    case "circle":
      return { ...base, kind, radius: config.circleRadius, opacity: 1 };
    case "perfect-absorber":
      return { ...base, kind, radius: config.circleRadius, opacity: 1 };
  }
}

/**
 * Radius of the region that selects this object under a cursor.
 * Absorbers are picked by their own disc, emitters by a fixed pick radius.
 */
export function pickRadiusOf(object: SceneObject, pickRadius: number): number {
  return isAbsorber(object) ? object.radius : pickRadius;
}

/**
 * Pick test: whether `point` selects this object.
 */
export function containsPoint(object: SceneObject, point: Vector2, pickRadius: number): boolean {
  const r = pickRadiusOf(object, pickRadius);
  return Vec2.lengthSquared(Vec2.subtract(point, object.position)) <= r * r;
}
