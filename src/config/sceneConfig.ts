import { InvalidConfigError } from "@/errors";
import { Angle } from "@/math/Angle";
import { viewportDiagonal } from "@/tracing/TracingEngine";
import type { Bounds } from "@/types";

/**
 * Scene-wide defaults for newly created objects and for tracing
 */
export interface SceneConfig {
  /** Rays generated per emitter per frame */
  readonly rayCount: number;
  /** Radius of newly created absorbers */
  readonly circleRadius: number;
  /** Smallest radius a resize can shrink an absorber to */
  readonly minRadius: number;
  /** Pick distance around an emitter's position */
  readonly pickRadius: number;
  /** Width of a collimated beam, across which its rays are spread */
  readonly beamWidth: number;
  /** Spotlight cone half-angle in radians */
  readonly spotlightHalfAngle: number;
  /** Initial direction of directional emitters in radians */
  readonly defaultDirection: number;
  /** Direction change per rotate action in radians */
  readonly rotationStep: number;
  /** Radius multiplier per grow action (shrink divides by it) */
  readonly resizeFactor: number;
  /** Length at which rays that hit nothing are clipped. Defaults to the viewport diagonal */
  readonly maxDistance: number;
  /** Visible area reported by the rendering side */
  readonly viewport: Bounds;
}

/**
 * Default scene configuration
 */
export const DEFAULT_SCENE_CONFIG: SceneConfig = {
  rayCount: 25,
  circleRadius: 50,
  minRadius: 4,
  pickRadius: 12,
  beamWidth: 100,
  spotlightHalfAngle: Angle.toRadians(20),
  defaultDirection: 0,
  rotationStep: Angle.toRadians(15),
  resizeFactor: 1.1,
  maxDistance: 1000,
  viewport: { x: 0, y: 0, width: 800, height: 600 },
};

function requirePositive(field: keyof SceneConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(field, `must be a positive number, got ${value}`);
  }
}

/**
 * Creates a scene configuration from defaults and overrides.
 * Without an explicit `maxDistance`, unblocked rays are clipped at the
 * viewport diagonal.
 * Throws InvalidConfigError when a value would break an object invariant.
 */
export function createSceneConfig(options: Partial<SceneConfig> = {}): SceneConfig {
  const merged: SceneConfig = { ...DEFAULT_SCENE_CONFIG, ...options };

  const { viewport } = merged;
  if (![viewport.x, viewport.y].every(Number.isFinite)) {
    throw new InvalidConfigError("viewport", "origin must be finite");
  }
  if (![viewport.width, viewport.height].every((v) => Number.isFinite(v) && v > 0)) {
    throw new InvalidConfigError(
      "viewport",
      `must have a positive size, got ${viewport.width}x${viewport.height}`
    );
  }

  const config: SceneConfig = {
    ...merged,
    maxDistance: options.maxDistance ?? viewportDiagonal(viewport),
  };

  if (!Number.isInteger(config.rayCount) || config.rayCount < 1) {
    throw new InvalidConfigError("rayCount", `must be an integer >= 1, got ${config.rayCount}`);
  }

  requirePositive("circleRadius", config.circleRadius);
  requirePositive("minRadius", config.minRadius);
  requirePositive("pickRadius", config.pickRadius);
  requirePositive("beamWidth", config.beamWidth);
  requirePositive("maxDistance", config.maxDistance);

  if (config.minRadius > config.circleRadius) {
    throw new InvalidConfigError("minRadius", "must not exceed circleRadius");
  }

  if (
    !Number.isFinite(config.spotlightHalfAngle) ||
    config.spotlightHalfAngle <= 0 ||
    config.spotlightHalfAngle > Math.PI
  ) {
    throw new InvalidConfigError("spotlightHalfAngle", "must be in (0, π]");
  }

  if (!Number.isFinite(config.resizeFactor) || config.resizeFactor <= 1) {
    throw new InvalidConfigError("resizeFactor", "must be greater than 1");
  }

  if (!Number.isFinite(config.rotationStep)) {
    throw new InvalidConfigError("rotationStep", "must be finite");
  }

  if (!Number.isFinite(config.defaultDirection)) {
    throw new InvalidConfigError("defaultDirection", "must be finite");
  }

  return { ...config, defaultDirection: Angle.wrap(config.defaultDirection) };
}
