import {
  generateCollimatedRays,
  generateIsotropicRays,
  generateRays,
  generateSpotlightRays,
} from "@/emitters/RayGenerator";
import { Vec2 } from "@/math/Vec2";
import {
  createTestCollimated,
  createTestIsotropic,
  createTestSpotlight,
} from "@test/helpers/sceneHelpers";
import { describe, expect, it } from "vitest";

describe("RayGenerator", () => {
  describe("isotropic", () => {
    it("should produce 4 directions exactly 90° apart starting at angle 0", () => {
      const rays = generateIsotropicRays(createTestIsotropic({ x: 0, y: 0 }, 4));

      expect(rays).toHaveLength(4);
      expect(rays[0]!.direction).toEqual({ x: 1, y: 0 });

      for (let k = 0; k < 4; k++) {
        const next = rays[(k + 1) % 4]!;
        expect(Vec2.dot(rays[k]!.direction, next.direction)).toBeCloseTo(0);
        // Counter-clockwise in math coordinates: cross product of +1
        const cross =
          rays[k]!.direction.x * next.direction.y - rays[k]!.direction.y * next.direction.x;
        expect(cross).toBeCloseTo(1);
      }
    });

    it("should start every ray at the emitter", () => {
      const rays = generateIsotropicRays(createTestIsotropic({ x: 7, y: -3 }, 12));
      for (const ray of rays) {
        expect(ray.origin).toEqual({ x: 7, y: -3 });
        expect(Vec2.length(ray.direction)).toBeCloseTo(1);
        expect(ray.maxLength).toBeUndefined();
      }
    });

    it("should space N rays by 2π/N", () => {
      const rays = generateIsotropicRays(createTestIsotropic({ x: 0, y: 0 }, 8));
      expect(Vec2.angle(rays[1]!.direction)).toBeCloseTo(Math.PI / 4);
      expect(Vec2.angle(rays[4]!.direction)).toBeCloseTo(Math.PI);
    });
  });

  describe("collimated", () => {
    it("should produce parallel rays along the emitter direction", () => {
      const emitter = createTestCollimated({ x: 0, y: 0 }, { rayCount: 5, direction: Math.PI / 2 });
      const rays = generateCollimatedRays(emitter);

      expect(rays).toHaveLength(5);
      for (const ray of rays) {
        expect(ray.direction.x).toBeCloseTo(0);
        expect(ray.direction.y).toBeCloseTo(1);
      }
    });

    it("should spread origins evenly across the beam width", () => {
      const emitter = createTestCollimated(
        { x: 100, y: 50 },
        { rayCount: 3, direction: 0, beamWidth: 40 }
      );
      const origins = generateCollimatedRays(emitter).map((r) => r.origin);

      // Perpendicular of +x is +y
      expect(origins[0]!.x).toBeCloseTo(100);
      expect(origins[0]!.y).toBeCloseTo(30);
      expect(origins[1]!.y).toBeCloseTo(50);
      expect(origins[2]!.y).toBeCloseTo(70);
    });

    it("should emit a single central ray when N=1", () => {
      const emitter = createTestCollimated({ x: 4, y: 4 }, { rayCount: 1, beamWidth: 80 });
      const rays = generateCollimatedRays(emitter);

      expect(rays).toHaveLength(1);
      expect(rays[0]!.origin.x).toBeCloseTo(4);
      expect(rays[0]!.origin.y).toBeCloseTo(4);
    });
  });

  describe("spotlight", () => {
    it("should produce exactly one ray along the direction when N=1", () => {
      const emitter = createTestSpotlight({ x: 0, y: 0 }, { rayCount: 1, direction: 1.2 });
      const rays = generateSpotlightRays(emitter);

      expect(rays).toHaveLength(1);
      expect(Vec2.angle(rays[0]!.direction)).toBeCloseTo(1.2);
    });

    it("should span the cone edges inclusively", () => {
      const emitter = createTestSpotlight(
        { x: 0, y: 0 },
        { rayCount: 5, direction: Math.PI / 2, halfAngle: Math.PI / 4 }
      );
      const angles = generateSpotlightRays(emitter).map((r) => Vec2.angle(r.direction));

      expect(angles).toHaveLength(5);
      expect(angles[0]).toBeCloseTo(Math.PI / 4);
      expect(angles[2]).toBeCloseTo(Math.PI / 2);
      expect(angles[4]).toBeCloseTo((3 * Math.PI) / 4);
    });

    it("should keep every ray inside the cone", () => {
      const halfAngle = Math.PI / 9;
      const emitter = createTestSpotlight({ x: 0, y: 0 }, { rayCount: 11, direction: 0, halfAngle });
      const center = Vec2.fromAngle(0);

      for (const ray of generateSpotlightRays(emitter)) {
        expect(Vec2.dot(ray.direction, center)).toBeGreaterThanOrEqual(Math.cos(halfAngle) - 1e-12);
      }
    });
  });

  describe("generateRays", () => {
    it("should dispatch on the emitter kind", () => {
      expect(generateRays(createTestIsotropic({ x: 0, y: 0 }, 6))).toHaveLength(6);
      expect(generateRays(createTestCollimated({ x: 0, y: 0 }, { rayCount: 3 }))).toHaveLength(3);
      expect(generateRays(createTestSpotlight({ x: 0, y: 0 }, { rayCount: 2 }))).toHaveLength(2);
    });

    it("should reflect the current emitter state on every call", () => {
      const before = createTestSpotlight({ x: 0, y: 0 }, { rayCount: 1, direction: 0 });
      const after = { ...before, position: { x: 5, y: 5 }, direction: Math.PI };

      expect(generateRays(before)[0]!.origin).toEqual({ x: 0, y: 0 });
      const moved = generateRays(after)[0]!;
      expect(moved.origin).toEqual({ x: 5, y: 5 });
      expect(moved.direction.x).toBeCloseTo(-1);
    });
  });
});
