import { Vector3 } from "three";
import type { Camera } from "three";
import type { InterpreterError, ShapeKind } from "@facesculpt/command-core";
import type { Vec3 } from "@facesculpt/control-core";
import type { PlaceableShape, PlacedShape, PlacedShapeSnapshot, SceneCollaborator } from "./types";

const SPAWN_EPS = 1e-6;

type ActiveShape<TShape extends PlaceableShape> = {
  kind: ShapeKind;
  shape: TShape;
  spawnPosition: Vector3;
};

export interface ShapeLifecycleOptions {
  spawnOffset: Vec3;
  onError?: (err: InterpreterError) => void;
}

export class ShapeLifecycleManager<TShape extends PlaceableShape> {
  private active: ActiveShape<TShape> | null = null;
  private readonly placed: PlacedShape<TShape>[] = [];

  constructor(
    private readonly scene: SceneCollaborator<TShape>,
    private readonly options: ShapeLifecycleOptions
  ) {}

  /** Creates a shape at the spawn offset in front of `camera`, replacing any unfinished one. */
  spawn(kind: ShapeKind, camera: Camera): TShape {
    if (this.active) {
      this.scene.detach(this.active.shape);
      this.active = null;
    }

    const shape = this.scene.create(kind);
    camera.updateMatrixWorld();
    shape.position.copy(camera.localToWorld(new Vector3(...this.options.spawnOffset)));
    this.scene.attach(shape);
    this.active = { kind, shape, spawnPosition: shape.position.clone() };
    return shape;
  }

  repositionXY(worldPoint: Vector3): boolean {
    if (!this.active) {
      this.options.onError?.({ type: "missing-active-shape", operation: "reposition" });
      return false;
    }
    this.active.shape.position.copy(worldPoint);
    return true;
  }

  /** Moves the active shape along the camera's forward axis; positive is away from the camera. */
  pushZ(delta: number, camera: Camera): boolean {
    if (!this.active) {
      this.options.onError?.({ type: "missing-active-shape", operation: "push" });
      return false;
    }
    camera.updateMatrixWorld();
    const forward = camera.getWorldDirection(new Vector3());
    this.active.shape.position.addScaledVector(forward, delta);
    return true;
  }

  finalize(): PlacedShape<TShape> | null {
    if (!this.active) {
      this.options.onError?.({ type: "missing-active-shape", operation: "finalize" });
      return null;
    }
    const entry: PlacedShape<TShape> = { kind: this.active.kind, shape: this.active.shape };
    this.placed.push(entry);
    this.active = null;
    return entry;
  }

  getActive(): TShape | null {
    return this.active?.shape ?? null;
  }

  isActiveAtSpawn(): boolean {
    if (!this.active) return false;
    return this.active.shape.position.distanceTo(this.active.spawnPosition) <= SPAWN_EPS;
  }

  getPlaced(): readonly PlacedShape<TShape>[] {
    return this.placed;
  }

  snapshot(): PlacedShapeSnapshot[] {
    return this.placed.map(({ kind, shape }) => ({
      kind,
      position: [shape.position.x, shape.position.y, shape.position.z],
    }));
  }
}
