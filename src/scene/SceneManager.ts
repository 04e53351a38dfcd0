import { DEFAULT_SCENE_CONFIG, type SceneConfig } from "@/config/sceneConfig";
import { Angle } from "@/math/Angle";
import { Vec2 } from "@/math/Vec2";
import {
  containsPoint,
  createSceneObject,
  isAbsorber,
  isDirectional,
  isEmitter,
} from "@/objects/SceneObject";
import type { Absorber, Emitter, ObjectKind, SceneObject, Vector2 } from "@/types";

/**
 * SceneManager - Sole owner of the scene's objects.
 *
 * Objects are immutable records; every mutation replaces the record under
 * the same id, which keeps its slot in creation order. Ids are never reused.
 *
 * Every operation except `add` is total: a missing id or an empty cursor
 * position is a no-op, because these calls come from positional user input
 * that may legitimately miss.
 */
export class SceneManager {
  private objects = new Map<string, SceneObject>();
  private nextOrder = 1;
  readonly config: SceneConfig;

  constructor(config: SceneConfig = DEFAULT_SCENE_CONFIG) {
    this.config = config;
  }

  /** Number of objects in the scene */
  get size(): number {
    return this.objects.size;
  }

  /**
   * Insert a new object with default parameters.
   * @returns The new object's id
   * @throws InvalidKindError if `kind` is not a known object kind
   */
  add(kind: string, position: Vector2): string {
    const order = this.nextOrder;
    const object = createSceneObject(kind, `${kind}-${order}`, order, position, this.config);

    this.nextOrder++;
    this.objects.set(object.id, object);
    return object.id;
  }

  /**
   * Move an object. Returns false if the id is absent.
   */
  move(id: string, position: Vector2): boolean {
    const object = this.objects.get(id);
    if (!object) return false;

    this.objects.set(id, { ...object, position: { x: position.x, y: position.y } });
    return true;
  }

  /**
   * Turn a directional emitter by `delta` radians.
   * Other objects are left alone, since the target comes from the cursor.
   */
  rotate(id: string, delta: number): boolean {
    const object = this.objects.get(id);
    if (!object || !isDirectional(object) || !Number.isFinite(delta)) return false;

    this.objects.set(id, { ...object, direction: Angle.wrap(object.direction + delta) });
    return true;
  }

  /**
   * Scale an absorber's radius by `factor`, never below `config.minRadius`.
   */
  resize(id: string, factor: number): boolean {
    const object = this.objects.get(id);
    if (!object || !isAbsorber(object) || !Number.isFinite(factor) || factor <= 0) {
      return false;
    }

    const radius = Math.max(this.config.minRadius, object.radius * factor);
    if (radius === object.radius) return false;

    this.objects.set(id, { ...object, radius });
    return true;
  }

  /**
   * Set an absorber's radius directly, clamped to `config.minRadius`.
   */
  setRadius(id: string, radius: number): boolean {
    const object = this.objects.get(id);
    if (!object || !isAbsorber(object) || !Number.isFinite(radius)) return false;

    this.objects.set(id, { ...object, radius: Math.max(this.config.minRadius, radius) });
    return true;
  }

  /**
   * Set a directional emitter's direction directly, wrapped to [0, 2π).
   */
  setDirection(id: string, direction: number): boolean {
    const object = this.objects.get(id);
    if (!object || !isDirectional(object) || !Number.isFinite(direction)) return false;

    this.objects.set(id, { ...object, direction: Angle.wrap(direction) });
    return true;
  }

  /**
   * Object selected by a cursor at `position`.
   *
   * Among objects whose pick region contains the point, the one with the
   * nearest center wins; exact ties go to the most recently created.
   */
  objectAt(position: Vector2): SceneObject | null {
    let best: SceneObject | null = null;
    let bestDistSq = Number.POSITIVE_INFINITY;

    for (const object of this.objects.values()) {
      if (!containsPoint(object, position, this.config.pickRadius)) continue;

      const distSq = Vec2.lengthSquared(Vec2.subtract(position, object.position));
      // Later objects come last in the map, so <= lets them win ties
      if (distSq <= bestDistSq) {
        best = object;
        bestDistSq = distSq;
      }
    }

    return best;
  }

  /**
   * Kind of the object under the cursor, or null.
   */
  kindAt(position: Vector2): ObjectKind | null {
    return this.objectAt(position)?.kind ?? null;
  }

  /**
   * Remove the object under the cursor.
   * @returns The removed id, or null if nothing was there
   */
  deleteAt(position: Vector2): string | null {
    const target = this.objectAt(position);
    if (!target) return null;

    this.objects.delete(target.id);
    return target.id;
  }

  /**
   * Get an object by id
   */
  get(id: string): SceneObject | null {
    return this.objects.get(id) ?? null;
  }

  /**
   * Snapshot of all objects in creation order
   */
  queryAll(): readonly SceneObject[] {
    return [...this.objects.values()];
  }

  /**
   * Get all emitters in creation order
   */
  emitters(): Emitter[] {
    return this.queryAll().filter(isEmitter);
  }

  /**
   * Get all absorbers in creation order
   */
  absorbers(): Absorber[] {
    return this.queryAll().filter(isAbsorber);
  }
}
