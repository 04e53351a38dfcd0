/**
 * RayGenerator - Sample rays for each emitter variant.
 *
 * Rays are derived from the emitter's current state every time they are
 * requested. Nothing is cached, so moves and rotations show up on the next
 * frame without any invalidation step.
 */

import { Angle, linspace } from "@/math/Angle";
import { RayUtils } from "@/math/Ray";
import { Vec2 } from "@/math/Vec2";
import type {
  CollimatedEmitter,
  Emitter,
  IsotropicEmitter,
  Ray,
  SpotlightEmitter,
} from "@/types";

/**
 * Isotropic: N rays at angles 2π·k/N, starting at angle 0.
 */
export function generateIsotropicRays(emitter: IsotropicEmitter): Ray[] {
  const count = emitter.rayCount;
  const rays: Ray[] = [];
  for (let k = 0; k < count; k++) {
    rays.push(RayUtils.fromAngle(emitter.position, (Angle.TWO_PI * k) / count));
  }
  return rays;
}

/**
 * Collimated: N parallel rays along the emitter direction, with origins spread
 * evenly along the perpendicular across the beam width.
 */
export function generateCollimatedRays(emitter: CollimatedEmitter): Ray[] {
  const direction = Vec2.fromAngle(emitter.direction);
  const across = Vec2.perpendicular(direction);
  const halfWidth = emitter.beamWidth / 2;

  return linspace(-halfWidth, halfWidth, emitter.rayCount).map((offset) =>
    RayUtils.create(Vec2.add(emitter.position, Vec2.scale(across, offset)), direction)
  );
}

/**
 * Spotlight: N rays spread over [direction - θ, direction + θ].
 * A single ray points straight along the direction.
 */
export function generateSpotlightRays(emitter: SpotlightEmitter): Ray[] {
  const { direction, halfAngle } = emitter;

  return linspace(direction - halfAngle, direction + halfAngle, emitter.rayCount).map((angle) =>
    RayUtils.fromAngle(emitter.position, angle)
  );
}

/**
 * Generate the rays for any emitter.
 */
export function generateRays(emitter: Emitter): Ray[] {
  switch (emitter.kind) {
    case "isotropic":
      return generateIsotropicRays(emitter);
    case "collimated":
      return generateCollimatedRays(emitter);
    case "spotlight":
      return generateSpotlightRays(emitter);
  }
}
