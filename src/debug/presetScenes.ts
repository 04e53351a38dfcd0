/**
 * Preset Scene Configurations
 *
 * Ready-made object layouts for debugging and demos. Coordinates assume the
 * default 800x600 viewport with +y pointing down.
 */

import { Angle } from "@/math/Angle";
import type { SceneManager } from "@/scene/SceneManager";
import type { ObjectKind, Vector2 } from "@/types";

/**
 * One object to place when loading a preset.
 * `direction` applies to directional emitters, `radius` to absorbers.
 */
export interface PresetPlacement {
  readonly kind: ObjectKind;
  readonly position: Vector2;
  readonly direction?: number;
  readonly radius?: number;
}

/**
 * A preset scene configuration.
 */
export interface PresetScene {
  /** Unique identifier */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** What this scene shows */
  readonly description: string;

  /** Objects in creation order */
  readonly objects: readonly PresetPlacement[];
}

const SINGLE_OCCLUDER: PresetScene = {
  id: "single-occluder",
  name: "Single Occluder",
  description: "Isotropic emitter casting a shadow behind one circle",
  objects: [
    { kind: "isotropic", position: { x: 200, y: 300 } },
    { kind: "circle", position: { x: 400, y: 300 }, radius: 40 },
  ],
};

const SPOTLIGHT_PAIR: PresetScene = {
  id: "spotlight-pair",
  name: "Spotlight Pair",
  description: "Spotlight aimed between two absorbers, partially blocked by both",
  objects: [
    { kind: "spotlight", position: { x: 100, y: 300 }, direction: 0 },
    { kind: "circle", position: { x: 450, y: 240 }, radius: 30 },
    { kind: "perfect-absorber", position: { x: 450, y: 360 }, radius: 30 },
  ],
};

const COLLIMATED_BEAM: PresetScene = {
  id: "collimated-beam",
  name: "Collimated Beam",
  description: "Downward beam wider than the absorber below it",
  objects: [
    { kind: "collimated", position: { x: 400, y: 50 }, direction: Angle.toRadians(90) },
    { kind: "perfect-absorber", position: { x: 400, y: 400 }, radius: 25 },
  ],
};

const EMPTY: PresetScene = {
  id: "empty",
  name: "Empty",
  description: "No objects",
  objects: [],
};

/**
 * All available preset scenes.
 */
export const PRESET_SCENES: readonly PresetScene[] = [
  SINGLE_OCCLUDER,
  SPOTLIGHT_PAIR,
  COLLIMATED_BEAM,
  EMPTY,
];

/**
 * Get a preset by ID.
 */
export function getPresetScene(id: string): PresetScene | null {
  return PRESET_SCENES.find((scene) => scene.id === id) ?? null;
}

/**
 * Place a preset's objects into a scene, on top of whatever is already there.
 * Radii below the scene's `minRadius` are clamped to it.
 * @returns Ids of the created objects, in placement order
 */
export function applyPreset(manager: SceneManager, preset: PresetScene): string[] {
  return preset.objects.map((placement) => {
    const id = manager.add(placement.kind, placement.position);

    if (placement.direction !== undefined) {
      manager.setDirection(id, placement.direction);
    }
    if (placement.radius !== undefined) {
      manager.setRadius(id, placement.radius);
    }

    return id;
  });
}
