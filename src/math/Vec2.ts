import type { Vector2 } from "@/types";

/**
 * Vectors shorter than this have no meaningful direction.
 */
export const GEOMETRY_EPSILON = 1e-12;

/**
 * Vec2 - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec2 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number): Vector2 {
    return { x, y };
  },

  /**
   * Return a zero vector
   */
  zero(): Vector2 {
    return { x: 0, y: 0 };
  },

  /**
   * Unit vector pointing at the given angle (radians, measured from +x toward +y)
   */
  fromAngle(angle: number): Vector2 {
    return { x: Math.cos(angle), y: Math.sin(angle) };
  },

  /**
   * Add two vectors
   */
  add(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x + b.x, y: a.y + b.y };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Scale a vector by a scalar
   */
  scale(v: Vector2, scalar: number): Vector2 {
    return { x: v.x * scalar, y: v.y * scalar };
  },

  /**
   * Calculate dot product of two vectors
   */
  dot(a: Vector2, b: Vector2): number {
    return a.x * b.x + a.y * b.y;
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared(v: Vector2): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector2): number {
    return Math.sqrt(Vec2.lengthSquared(v));
  },

  /**
   * Normalize a vector to unit length
   * Returns zero vector if the input length is below GEOMETRY_EPSILON
   */
  normalize(v: Vector2): Vector2 {
    const len = Vec2.length(v);
    if (len < GEOMETRY_EPSILON) return { x: 0, y: 0 };
    return { x: v.x / len, y: v.y / len };
  },

  /**
   * Get perpendicular vector (90° counter-clockwise rotation)
   */
  perpendicular(v: Vector2): Vector2 {
    return { x: -v.y, y: v.x };
  },

  /**
   * Rotate a vector by an angle in radians
   */
  rotate(v: Vector2, angle: number): Vector2 {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return { x: v.x * cos - v.y * sin, y: v.x * sin + v.y * cos };
  },

  /**
   * Angle of a vector in radians, in (-π, π]
   */
  angle(v: Vector2): number {
    return Math.atan2(v.y, v.x);
  },

  /**
   * Calculate distance between two points
   */
  distance(a: Vector2, b: Vector2): number {
    return Vec2.length(Vec2.subtract(b, a));
  },

  /**
   * Get normalized direction vector from point a to point b
   */
  direction(from: Vector2, to: Vector2): Vector2 {
    return Vec2.normalize(Vec2.subtract(to, from));
  },
};
