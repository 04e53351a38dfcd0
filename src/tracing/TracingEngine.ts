/**
 * TracingEngine - Casts every emitter's rays against every absorber.
 *
 * Absorbers are fully opaque, so a ray stops at the nearest absorber it
 * meets (opaque shadowing, no energy accumulation). Rays that meet nothing
 * are clipped at the render distance supplied by the caller.
 *
 * The engine only reads the objects it is given. Cost is
 * O(rays × absorbers) per frame with no spatial index.
 */

import { intersectRayCircle, RayUtils } from "@/math/Ray";
import { isAbsorber, isEmitter } from "@/objects/SceneObject";
import { generateRays } from "@/emitters/RayGenerator";
import type { Absorber, Bounds, Emitter, Ray, SceneObject, TracedRay, Vector2 } from "@/types";

// =============================================================================
// TYPES
// =============================================================================

export interface TraceOptions {
  /** Length at which rays that hit nothing are clipped */
  readonly maxDistance: number;
}

/**
 * Nearest absorber along a single ray.
 */
export interface RayHit {
  readonly t: number;
  readonly absorber: Absorber;
}

/**
 * A point where a ray was absorbed.
 */
export interface AbsorptionPoint {
  readonly emitterId: string;
  readonly rayIndex: number;
  readonly absorberId: string;
  readonly point: Vector2;
}

// =============================================================================
// SINGLE RAY
// =============================================================================

/**
 * Find the nearest absorber a ray meets.
 * When two absorbers are hit at the same distance, the earlier one in
 * `absorbers` wins.
 */
export function findNearestHit(ray: Ray, absorbers: readonly Absorber[]): RayHit | null {
  let nearest: RayHit | null = null;

  for (const absorber of absorbers) {
    const t = intersectRayCircle(ray, { center: absorber.position, radius: absorber.radius });
    if (t !== null && (nearest === null || t < nearest.t)) {
      nearest = { t, absorber };
    }
  }

  return nearest;
}

/**
 * Trace one ray into its visible segment.
 */
export function traceRay(
  ray: Ray,
  absorbers: readonly Absorber[],
  emitterId: string,
  rayIndex: number,
  options: TraceOptions
): TracedRay {
  const limit = Math.min(options.maxDistance, ray.maxLength ?? Number.POSITIVE_INFINITY);
  const hit = findNearestHit(ray, absorbers);

  if (hit && hit.t <= limit) {
    return {
      emitterId,
      rayIndex,
      segment: { start: ray.origin, end: RayUtils.pointAt(ray, hit.t) },
      length: hit.t,
      termination: "absorbed",
      absorberId: hit.absorber.id,
    };
  }

  return {
    emitterId,
    rayIndex,
    segment: { start: ray.origin, end: RayUtils.pointAt(ray, limit) },
    length: limit,
    termination: "boundary",
    absorberId: null,
  };
}

// =============================================================================
// SCENE
// =============================================================================

/**
 * Trace every ray of one emitter.
 */
export function traceEmitter(
  emitter: Emitter,
  absorbers: readonly Absorber[],
  options: TraceOptions
): TracedRay[] {
  return generateRays(emitter).map((ray, index) =>
    traceRay(ray, absorbers, emitter.id, index, options)
  );
}

/**
 * Trace a full frame: every emitter's rays against every absorber.
 * Output is grouped by emitter in the order the objects are given,
 * then by ray index.
 */
export function traceScene(objects: readonly SceneObject[], options: TraceOptions): TracedRay[] {
  const absorbers = objects.filter(isAbsorber);
  const emitters = objects.filter(isEmitter);

  return emitters.flatMap((emitter) => traceEmitter(emitter, absorbers, options));
}

/**
 * Diagonal of the viewport: long enough for any unblocked ray starting
 * inside it to leave the visible area.
 */
export function viewportDiagonal(bounds: Bounds): number {
  return Math.hypot(bounds.width, bounds.height);
}

/**
 * Points where the frame's rays were absorbed.
 */
export function absorptionPoints(frame: readonly TracedRay[]): AbsorptionPoint[] {
  const points: AbsorptionPoint[] = [];
  for (const traced of frame) {
    if (traced.absorberId !== null) {
      points.push({
        emitterId: traced.emitterId,
        rayIndex: traced.rayIndex,
        absorberId: traced.absorberId,
        point: traced.segment.end,
      });
    }
  }
  return points;
}
