/**
 * Core type definitions for the Lightcaster scene
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable), used for points and directions */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/** Line segment defined by two endpoints */
export interface LineSegment {
  readonly start: Vector2;
  readonly end: Vector2;
}

/** Ray defined by origin and direction, optionally bounded */
export interface Ray {
  readonly origin: Vector2;
  readonly direction: Vector2; // Should be normalized
  readonly maxLength?: number; // Unbounded when absent
}

/** Circle used for intersection tests */
export interface CircleShape {
  readonly center: Vector2;
  readonly radius: number;
}

/** Bounds rectangle */
export interface Bounds {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

// =============================================================================
// SCENE OBJECT TYPES
// =============================================================================

export type EmitterKind = "isotropic" | "collimated" | "spotlight";

export type AbsorberKind = "circle" | "perfect-absorber";

export type ObjectKind = EmitterKind | AbsorberKind;

/** Attributes shared by every scene object */
interface SceneObjectBase {
  readonly id: string;
  readonly position: Vector2;
  /** Creation order, used for iteration order and pick tie-breaks */
  readonly order: number;
}

/** Emits `rayCount` rays uniformly spaced over the full circle */
export interface IsotropicEmitter extends SceneObjectBase {
  readonly kind: "isotropic";
  readonly rayCount: number;
}

/** Emits `rayCount` parallel rays spread across `beamWidth` */
export interface CollimatedEmitter extends SceneObjectBase {
  readonly kind: "collimated";
  readonly rayCount: number;
  /** Radians in [0, 2π) */
  readonly direction: number;
  readonly beamWidth: number;
}

/** Emits `rayCount` rays inside the cone [direction - halfAngle, direction + halfAngle] */
export interface SpotlightEmitter extends SceneObjectBase {
  readonly kind: "spotlight";
  readonly rayCount: number;
  /** Radians in [0, 2π) */
  readonly direction: number;
  readonly halfAngle: number;
}

/** Opaque circle: blocks and terminates every ray that intersects it */
export interface CircleAbsorber extends SceneObjectBase {
  readonly kind: "circle";
  readonly radius: number;
  readonly opacity: 1;
}

/** Circle whose opacity is fixed at fully absorbing */
export interface PerfectAbsorber extends SceneObjectBase {
  readonly kind: "perfect-absorber";
  readonly radius: number;
  readonly opacity: 1;
}

export type Emitter = IsotropicEmitter | CollimatedEmitter | SpotlightEmitter;

export type DirectionalEmitter = CollimatedEmitter | SpotlightEmitter;

export type Absorber = CircleAbsorber | PerfectAbsorber;

export type SceneObject = Emitter | Absorber;

// =============================================================================
// TRACING TYPES
// =============================================================================

/** How a traced ray ended */
export type Termination =
  | "absorbed" // Hit an absorber
  | "boundary"; // Clipped at the render distance

/** The visible part of one generated ray */
export interface TracedRay {
  readonly emitterId: string;
  readonly rayIndex: number;
  readonly segment: LineSegment;
  /** Distance from origin to end of segment */
  readonly length: number;
  readonly termination: Termination;
  /** Absorber that terminated the ray, null when clipped at the boundary */
  readonly absorberId: string | null;
}

// =============================================================================
// ACTION TYPES
// =============================================================================

/** Actions issued by the input layer at a cursor position */
export type SceneAction =
  | "CreateCircle"
  | "CreateIsotropic"
  | "CreateCollimated"
  | "CreateSpotlight"
  | "CreateAbsorber"
  | "DeleteAtCursor"
  | "RotateCW"
  | "RotateCCW"
  | "GrowAtCursor"
  | "ShrinkAtCursor"
  | "GrabAtCursor"
  | "DragTo"
  | "Release";

/** What an action did to the scene */
export interface ActionOutcome {
  readonly action: SceneAction;
  /** Id of the created, changed, or removed object; null when the action missed */
  readonly targetId: string | null;
  readonly changed: boolean;
}
