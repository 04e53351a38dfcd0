import { createSceneConfig } from "@/config/sceneConfig";
import { SceneController } from "@/scene/SceneController";
import { absorptionPoints } from "@/tracing/TracingEngine";
import { beforeEach, describe, expect, it } from "vitest";

/**
 * Full frames driven through the controller, from actions to traced rays.
 */
describe("Full frame", () => {
  let controller: SceneController;

  beforeEach(() => {
    controller = new SceneController(
      createSceneConfig({ rayCount: 8, circleRadius: 5, maxDistance: 100 })
    );
    controller.handleAction("CreateIsotropic", { x: 0, y: 0 });
    controller.handleAction("CreateCircle", { x: 20, y: 0 });
  });

  it("should stop the ray pointing at the circle on its near surface", () => {
    const frame = controller.traceFrame();

    expect(frame).toHaveLength(8);
    expect(frame[0]).toEqual({
      emitterId: "isotropic-1",
      rayIndex: 0,
      segment: { start: { x: 0, y: 0 }, end: { x: 15, y: 0 } },
      length: 15,
      termination: "absorbed",
      absorberId: "circle-2",
    });
  });

  it("should let the diagonal rays pass beside the circle", () => {
    // Rays at ±45° pass 20/√2 ≈ 14.1 from the center, outside radius 5
    const rest = controller.traceFrame().slice(1);

    expect(rest).toHaveLength(7);
    for (const traced of rest) {
      expect(traced.termination).toBe("boundary");
      expect(traced.absorberId).toBeNull();
      expect(traced.length).toBe(100);
    }
  });

  it("should follow the circle after it is dragged", () => {
    controller.handleAction("GrabAtCursor", { x: 20, y: 0 });
    controller.handleAction("DragTo", { x: 0, y: 30 });
    controller.handleAction("Release", { x: 0, y: 30 });

    const points = absorptionPoints(controller.traceFrame());

    // Ray 2 points along +y
    expect(points).toHaveLength(1);
    expect(points[0]!.rayIndex).toBe(2);
    expect(points[0]!.point.x).toBeCloseTo(0);
    expect(points[0]!.point.y).toBeCloseTo(25);
  });

  it("should stop blocking once the circle is deleted", () => {
    controller.handleAction("DeleteAtCursor", { x: 20, y: 0 });

    const frame = controller.traceFrame();

    expect(frame.every((r) => r.termination === "boundary")).toBe(true);
  });

  it("should cast no rays once the emitter is deleted", () => {
    controller.handleAction("DeleteAtCursor", { x: 0, y: 0 });

    expect(controller.runFrame()).toEqual([]);
  });

  it("should apply queued actions before the frame they arrive in", () => {
    controller.queueAction("ShrinkAtCursor", { x: 20, y: 0 });
    controller.queueAction("CreateSpotlight", { x: 0, y: 100 });

    const frame = controller.runFrame();

    // Radius 5 shrinks to 5 / 1.1
    expect(frame[0]!.length).toBeCloseTo(20 - 5 / 1.1);
    expect(frame.filter((r) => r.emitterId === "spotlight-3")).toHaveLength(8);
  });
});
