/**
 * SceneDebugLogger - Captures scene actions and traced frames for debugging
 *
 * Enable this to capture all relevant data when reproducing a bug.
 * The output can be copied into a preset scene.
 */

import type { ActionOutcome, SceneObject, TracedRay, Vector2 } from "@/types";

/**
 * Debug log entry for one action or one traced frame.
 */
export interface SceneDebugLog {
  timestamp: number;
  objects: SceneObjectDebugInfo[];
  action?: ActionDebugInfo;
  frame?: FrameDebugInfo;
}

export interface SceneObjectDebugInfo {
  id: string;
  kind: string;
  position: Vector2;
  direction?: number;
  radius?: number;
}

export interface ActionDebugInfo {
  action: string;
  cursor: Vector2;
  targetId: string | null;
  changed: boolean;
}

export interface FrameDebugInfo {
  rayCount: number;
  absorbedCount: number;
  emitterIds: string[];
}

class SceneDebugLoggerImpl {
  private enabled = false;
  private logs: SceneDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: SceneDebugLog | null = null;
  private frameThrottleMs = 100; // Don't capture frames more than once per 100ms
  private lastFrameTime = Number.NEGATIVE_INFINITY;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[SCENE DEBUG] Logging enabled. Use SceneDebugLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[SCENE DEBUG] Logging disabled.");
  }

  /**
   * Toggle debug logging.
   */
  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  /**
   * Check if logging is enabled.
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log an applied action together with the scene it produced.
   */
  logAction(outcome: ActionOutcome, cursor: Vector2, objects: readonly SceneObject[]): void {
    if (!this.enabled) return;

    this.push({
      timestamp: Date.now(),
      objects: objects.map((o) => this.objectToDebugInfo(o)),
      action: {
        action: outcome.action,
        cursor: { ...cursor },
        targetId: outcome.targetId,
        changed: outcome.changed,
      },
    });

    console.log(
      `[SCENE DEBUG] ${outcome.action} at (${cursor.x.toFixed(1)}, ${cursor.y.toFixed(1)}) -> ${outcome.targetId ?? "miss"}`
    );
  }

  /**
   * Log a traced frame. Throttled, since frames arrive every tick.
   */
  logFrame(frame: readonly TracedRay[], objects: readonly SceneObject[]): void {
    if (!this.enabled) return;

    const now = Date.now();
    if (now - this.lastFrameTime < this.frameThrottleMs) return;
    this.lastFrameTime = now;

    const absorbedCount = frame.filter((r) => r.termination === "absorbed").length;
    const emitterIds = [...new Set(frame.map((r) => r.emitterId))];

    this.push({
      timestamp: now,
      objects: objects.map((o) => this.objectToDebugInfo(o)),
      frame: { rayCount: frame.length, absorbedCount, emitterIds },
    });

    console.log(
      `[SCENE DEBUG] Captured frame #${this.logs.length} - Rays: ${frame.length}, Absorbed: ${absorbedCount}, Emitters: ${emitterIds.length}`
    );
  }

  private push(log: SceneDebugLog): void {
    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  /**
   * Convert an object to debug info.
   */
  private objectToDebugInfo(object: SceneObject): SceneObjectDebugInfo {
    const info: SceneObjectDebugInfo = {
      id: object.id,
      kind: object.kind,
      position: { ...object.position },
    };

    switch (object.kind) {
      case "collimated":
      case "spotlight":
        info.direction = object.direction;
        break;
      case "circle":
      case "perfect-absorber":
        info.radius = object.radius;
        break;
      case "isotropic":
        break;
    }

    return info;
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[SCENE DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Log @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Objects:", log.objects);
      if (log.action) {
        console.log("Action:", log.action);
      }
      if (log.frame) {
        console.log("Frame:", log.frame);
      }
      console.groupEnd();
    }
  }

  /**
   * Get the last log entry.
   */
  getLastLog(): SceneDebugLog | null {
    return this.lastLog;
  }

  /**
   * Get all logs.
   */
  getAllLogs(): readonly SceneDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
    this.lastFrameTime = Number.NEGATIVE_INFINITY;
    console.log("[SCENE DEBUG] Logs cleared.");
  }

  /**
   * Export the last captured scene as a preset definition.
   */
  exportAsPreset(): string {
    if (!this.lastLog) {
      return "// No log available";
    }

    const log = this.lastLog;
    const placements = log.objects
      .map((o) => {
        const extras = [
          o.direction !== undefined ? `direction: ${o.direction}` : null,
          o.radius !== undefined ? `radius: ${o.radius}` : null,
        ].filter((e): e is string => e !== null);
        const suffix = extras.length > 0 ? `, ${extras.join(", ")}` : "";
        return `    { kind: "${o.kind}", position: { x: ${o.position.x}, y: ${o.position.y} }${suffix} },`;
      })
      .join("\n");

    return `/**
 * Captured scene
 * Timestamp: ${new Date(log.timestamp).toISOString()}
 */
export const capturedPreset: PresetScene = {
  id: "captured-${log.timestamp}",
  name: "Captured scene",
  description: "Exported from debug log",
  objects: [
${placements}
  ],
};`;
  }

  /**
   * Print last log as a preset to console.
   */
  exportToConsole(): void {
    console.log("[SCENE DEBUG] Preset Export:");
    console.log(this.exportAsPreset());
  }
}

/**
 * Global debug logger instance.
 */
export const SceneDebugLogger = new SceneDebugLoggerImpl();
