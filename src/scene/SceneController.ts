import { DEFAULT_SCENE_CONFIG, type SceneConfig } from "@/config/sceneConfig";
import { SceneDebugLogger } from "@/debug/SceneDebugLogger";
import { applyPreset, getPresetScene, PRESET_SCENES } from "@/debug/presetScenes";
import { InvalidKindError } from "@/errors";
import { traceScene } from "@/tracing/TracingEngine";
import type {
  ActionOutcome,
  ObjectKind,
  SceneAction,
  SceneObject,
  TracedRay,
  Vector2,
} from "@/types";
import { SceneManager } from "./SceneManager";

export const SCENE_ACTIONS: readonly SceneAction[] = [
  "CreateCircle",
  "CreateIsotropic",
  "CreateCollimated",
  "CreateSpotlight",
  "CreateAbsorber",
  "DeleteAtCursor",
  "RotateCW",
  "RotateCCW",
  "GrowAtCursor",
  "ShrinkAtCursor",
  "GrabAtCursor",
  "DragTo",
  "Release",
];

type CreateAction = Extract<SceneAction, `Create${string}`>;

const CREATE_KINDS: Record<CreateAction, ObjectKind> = {
  CreateCircle: "circle",
  CreateIsotropic: "isotropic",
  CreateCollimated: "collimated",
  CreateSpotlight: "spotlight",
  CreateAbsorber: "perfect-absorber",
};

export function isSceneAction(action: string): action is SceneAction {
  return SCENE_ACTIONS.some((known) => known === action);
}

interface QueuedAction {
  readonly action: SceneAction;
  readonly cursor: Vector2;
}

/**
 * SceneController - The surface the input and rendering layers talk to.
 *
 * Input arrives as (action, cursor) pairs and is mapped onto SceneManager
 * operations. The rendering side pulls one trace per frame.
 *
 * Frame-driven use: `queueAction` during input handling, then `runFrame`
 * once per tick. Queued actions are applied in arrival order before the
 * frame is traced.
 */
export class SceneController {
  readonly scene: SceneManager;
  private pending: QueuedAction[] = [];
  private grabbedId: string | null = null;

  constructor(config: SceneConfig = DEFAULT_SCENE_CONFIG) {
    this.scene = new SceneManager(config);
  }

  get config(): SceneConfig {
    return this.scene.config;
  }

  /** Id of the object currently being dragged, if any */
  get grabbed(): string | null {
    return this.grabbedId;
  }

  /**
   * Apply one action at the cursor position.
   *
   * @param action - Action name; unknown names throw InvalidKindError
   * @param cursor - Cursor position in scene coordinates
   */
  handleAction(action: string, cursor: Vector2): ActionOutcome {
    if (!isSceneAction(action)) {
      throw new InvalidKindError(action, SCENE_ACTIONS);
    }

    const outcome = this.apply(action, cursor);
    SceneDebugLogger.logAction(outcome, cursor, this.scene.queryAll());
    return outcome;
  }

  private apply(action: SceneAction, cursor: Vector2): ActionOutcome {
    const miss: ActionOutcome = { action, targetId: null, changed: false };
    const step = this.config.rotationStep;
    const factor = this.config.resizeFactor;

    switch (action) {
      case "CreateCircle":
      case "CreateIsotropic":
      case "CreateCollimated":
      case "CreateSpotlight":
      case "CreateAbsorber": {
        const id = this.scene.add(CREATE_KINDS[action], cursor);
        return { action, targetId: id, changed: true };
      }

      case "DeleteAtCursor": {
        const removed = this.scene.deleteAt(cursor);
        if (removed !== null && removed === this.grabbedId) {
          this.grabbedId = null;
        }
        return { action, targetId: removed, changed: removed !== null };
      }

      case "RotateCW":
        return this.atCursor(action, cursor, (id) => this.scene.rotate(id, step));
      case "RotateCCW":
        return this.atCursor(action, cursor, (id) => this.scene.rotate(id, -step));
      case "GrowAtCursor":
        return this.atCursor(action, cursor, (id) => this.scene.resize(id, factor));
      case "ShrinkAtCursor":
        return this.atCursor(action, cursor, (id) => this.scene.resize(id, 1 / factor));

      case "GrabAtCursor": {
        this.grabbedId = this.scene.objectAt(cursor)?.id ?? null;
        return { action, targetId: this.grabbedId, changed: false };
      }

      case "DragTo": {
        if (this.grabbedId === null) return miss;
        const moved = this.scene.move(this.grabbedId, cursor);
        return { action, targetId: this.grabbedId, changed: moved };
      }

      case "Release": {
        const released = this.grabbedId;
        this.grabbedId = null;
        return { action, targetId: released, changed: false };
      }
    }
  }

  /**
   * Apply `change` to the object under the cursor.
   * Objects the change does not apply to are reported as targeted but unchanged.
   */
  private atCursor(
    action: SceneAction,
    cursor: Vector2,
    change: (id: string) => boolean
  ): ActionOutcome {
    const target = this.scene.objectAt(cursor);
    if (!target) return { action, targetId: null, changed: false };
    return { action, targetId: target.id, changed: change(target.id) };
  }

  /**
   * Move an object directly by id.
   */
  moveObject(id: string, position: Vector2): boolean {
    return this.scene.move(id, position);
  }

  /**
   * Queue an action for the next `runFrame`.
   * Unknown names throw InvalidKindError here, leaving the queue untouched.
   */
  queueAction(action: string, cursor: Vector2): void {
    if (!isSceneAction(action)) {
      throw new InvalidKindError(action, SCENE_ACTIONS);
    }
    this.pending.push({ action, cursor: { x: cursor.x, y: cursor.y } });
  }

  /** Number of actions waiting for the next frame */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Apply all queued actions, then trace the resulting scene.
   */
  runFrame(): TracedRay[] {
    const batch = this.pending;
    this.pending = [];
    for (const { action, cursor } of batch) {
      this.handleAction(action, cursor);
    }
    return this.traceFrame();
  }

  /**
   * Trace every emitter against every absorber in the current scene.
   */
  traceFrame(): TracedRay[] {
    const objects = this.scene.queryAll();
    const frame = traceScene(objects, { maxDistance: this.config.maxDistance });
    SceneDebugLogger.logFrame(frame, objects);
    return frame;
  }

  /**
   * Read-only snapshot of all objects for debug overlays.
   */
  debugDump(): readonly SceneObject[] {
    return this.scene.queryAll();
  }

  /**
   * Printable listing of every object, one block per object.
   */
  describe(): string {
    return this.scene
      .queryAll()
      .map((object, index) => `SceneObject: ${index}\n${JSON.stringify(object, null, 2)}`)
      .join("\n");
  }

  /**
   * Add a preset scene's objects.
   * @returns Ids of the created objects, or null for an unknown preset
   */
  loadPreset(id: string): string[] | null {
    const preset = getPresetScene(id);
    return preset ? applyPreset(this.scene, preset) : null;
  }

  /** Ids of all available presets */
  static presetIds(): string[] {
    return PRESET_SCENES.map((scene) => scene.id);
  }
}
