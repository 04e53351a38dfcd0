import { Vec2 } from "@/math/Vec2";
import { describe, expect, it } from "vitest";

describe("Vec2", () => {
  describe("create", () => {
    it("should create a vector with given coordinates", () => {
      const v = Vec2.create(3, 4);
      expect(v).toEqual({ x: 3, y: 4 });
    });
  });

  describe("add", () => {
    it("should add two vectors", () => {
      expect(Vec2.add({ x: 1, y: 2 }, { x: 3, y: 4 })).toEqual({ x: 4, y: 6 });
    });

    it("should handle negative values", () => {
      expect(Vec2.add({ x: -1, y: 2 }, { x: 3, y: -4 })).toEqual({ x: 2, y: -2 });
    });
  });

  describe("subtract", () => {
    it("should subtract two vectors", () => {
      expect(Vec2.subtract({ x: 5, y: 7 }, { x: 2, y: 3 })).toEqual({ x: 3, y: 4 });
    });
  });

  describe("scale", () => {
    it("should scale a vector by a scalar", () => {
      expect(Vec2.scale({ x: 2, y: 3 }, 2)).toEqual({ x: 4, y: 6 });
    });

    it("should handle negative scalar", () => {
      expect(Vec2.scale({ x: 2, y: 3 }, -1)).toEqual({ x: -2, y: -3 });
    });
  });

  describe("dot", () => {
    it("should calculate dot product", () => {
      expect(Vec2.dot({ x: 1, y: 2 }, { x: 3, y: 4 })).toBe(11); // 1*3 + 2*4
    });

    it("should return zero for perpendicular vectors", () => {
      expect(Vec2.dot({ x: 1, y: 0 }, { x: 0, y: 1 })).toBe(0);
    });
  });

  describe("length", () => {
    it("should calculate vector length", () => {
      expect(Vec2.length({ x: 3, y: 4 })).toBe(5); // 3-4-5 triangle
    });

    it("should calculate squared length", () => {
      expect(Vec2.lengthSquared({ x: 3, y: 4 })).toBe(25);
    });
  });

  describe("normalize", () => {
    it("should normalize a vector to unit length", () => {
      const normalized = Vec2.normalize({ x: 3, y: 4 });
      expect(normalized.x).toBeCloseTo(0.6);
      expect(normalized.y).toBeCloseTo(0.8);
      expect(Vec2.length(normalized)).toBeCloseTo(1);
    });

    it("should return zero vector for zero input", () => {
      expect(Vec2.normalize({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
    });

    it("should return zero vector for near-zero input", () => {
      expect(Vec2.normalize({ x: 1e-14, y: -1e-14 })).toEqual({ x: 0, y: 0 });
    });

    it("should keep unit length for arbitrary directions", () => {
      for (const v of [
        { x: 1e6, y: -3 },
        { x: -0.001, y: 0.002 },
        { x: 7, y: 7 },
      ]) {
        expect(Vec2.length(Vec2.normalize(v))).toBeCloseTo(1, 12);
      }
    });
  });

  describe("perpendicular", () => {
    it("should return perpendicular vector (90° counter-clockwise)", () => {
      const perp = Vec2.perpendicular({ x: 1, y: 0 });
      expect(perp.x).toBeCloseTo(0);
      expect(perp.y).toBe(1);
    });

    it("should be perpendicular (dot product = 0)", () => {
      const v = { x: 3, y: 7 };
      expect(Vec2.dot(v, Vec2.perpendicular(v))).toBe(0);
    });
  });

  describe("rotate", () => {
    it("should rotate by 90 degrees", () => {
      const rotated = Vec2.rotate({ x: 1, y: 0 }, Math.PI / 2);
      expect(rotated.x).toBeCloseTo(0);
      expect(rotated.y).toBeCloseTo(1);
    });

    it("should preserve length", () => {
      const v = { x: 3, y: 4 };
      expect(Vec2.length(Vec2.rotate(v, 1.234))).toBeCloseTo(5);
    });

    it("should return to the start after opposite rotations", () => {
      const v = { x: -2, y: 5 };
      const back = Vec2.rotate(Vec2.rotate(v, 0.7), -0.7);
      expect(back.x).toBeCloseTo(-2);
      expect(back.y).toBeCloseTo(5);
    });
  });

  describe("fromAngle", () => {
    it("should point along +x at angle 0", () => {
      expect(Vec2.fromAngle(0)).toEqual({ x: 1, y: 0 });
    });

    it("should point along -y at angle -90°", () => {
      const v = Vec2.fromAngle(-Math.PI / 2);
      expect(v.x).toBeCloseTo(0);
      expect(v.y).toBeCloseTo(-1);
    });
  });

  describe("angle", () => {
    it("should return the direction angle", () => {
      expect(Vec2.angle({ x: 0, y: 2 })).toBeCloseTo(Math.PI / 2);
      expect(Vec2.angle({ x: -1, y: 0 })).toBeCloseTo(Math.PI);
    });
  });

  describe("distance", () => {
    it("should calculate distance between points", () => {
      expect(Vec2.distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });
  });

  describe("direction", () => {
    it("should return normalized direction between points", () => {
      const dir = Vec2.direction({ x: 0, y: 0 }, { x: 10, y: 0 });
      expect(dir).toEqual({ x: 1, y: 0 });
    });
  });
});
