import type { CircleShape, Ray, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

/**
 * Discriminants within this fraction of b² count as a single tangential root.
 */
export const TANGENT_EPSILON = 1e-10;

/**
 * RayUtils - Pure utility functions for ray operations
 */
export const RayUtils = {
  /**
   * Create a ray from origin and direction
   * @param origin - Start point of ray
   * @param direction - Direction vector (will be normalized)
   * @param maxLength - Optional bound on the ray's length
   */
  create(origin: Vector2, direction: Vector2, maxLength?: number): Ray {
    const normalized = Vec2.normalize(direction);
    return maxLength === undefined
      ? { origin, direction: normalized }
      : { origin, direction: normalized, maxLength };
  },

  /**
   * Create a ray from origin pointing along an angle in radians
   */
  fromAngle(origin: Vector2, angle: number, maxLength?: number): Ray {
    return RayUtils.create(origin, Vec2.fromAngle(angle), maxLength);
  },

  /**
   * Get point along ray at parameter t
   * P(t) = origin + t * direction
   */
  pointAt(ray: Ray, t: number): Vector2 {
    return Vec2.add(ray.origin, Vec2.scale(ray.direction, t));
  },
};

/**
 * Distance along a ray to the first point where it meets a circle.
 *
 * Substitutes P(t) = origin + t * direction into |P - C|^2 = R^2:
 *   a*t^2 + b*t + c = 0
 * where:
 *   a = D·D
 *   b = 2 * D·(O - C)
 *   c = |O - C|^2 - R^2
 *
 * Returns the smallest root with t >= 0, which must also lie strictly below
 * `ray.maxLength` when the ray is bounded. A ray starting inside the circle
 * therefore reports its exit point.
 *
 * @returns Hit distance t, or null if the ray misses
 */
export function intersectRayCircle(ray: Ray, circle: CircleShape): number | null {
  const { origin, direction } = ray;

  const fx = origin.x - circle.center.x;
  const fy = origin.y - circle.center.y;

  const a = Vec2.dot(direction, direction);
  const b = 2 * (fx * direction.x + fy * direction.y);
  const c = fx * fx + fy * fy - circle.radius * circle.radius;

  // Degenerate direction: the ray is a single point
  if (a === 0) {
    return null;
  }

  const discriminant = b * b - 4 * a * c;
  const tolerance = TANGENT_EPSILON * Math.max(1, b * b);

  if (discriminant < -tolerance) {
    return null;
  }

  const withinBounds = (t: number): boolean =>
    t >= 0 && (ray.maxLength === undefined || t < ray.maxLength);

  if (Math.abs(discriminant) <= tolerance) {
    // Tangent: one root
    const t = -b / (2 * a);
    return withinBounds(t) ? t : null;
  }

  const sqrtDisc = Math.sqrt(discriminant);
  const t1 = (-b - sqrtDisc) / (2 * a);
  const t2 = (-b + sqrtDisc) / (2 * a);

  // t1 < t2, so the first root in bounds is the nearest
  if (withinBounds(t1)) return t1;
  if (withinBounds(t2)) return t2;
  return null;
}
