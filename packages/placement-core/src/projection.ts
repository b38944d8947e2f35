import { Plane, Ray, Raycaster, Vector2, Vector3 } from "three";
import type { Camera } from "three";
import type { InterpreterError } from "@facesculpt/command-core";

const PARALLEL_EPS = 1e-6;

export type PlaneHit =
  | { ok: true; point: Vector3 }
  | { ok: false; reason: "parallel" | "behind" };

export function convertPercentToNdc(xPct: number, yPct: number): Vector2 {
  return new Vector2((xPct / 100) * 2 - 1, -((yPct / 100) * 2 - 1));
}

export function intersectRayWithPlane(ray: Ray, plane: Plane): PlaneHit {
  if (Math.abs(plane.normal.dot(ray.direction)) < PARALLEL_EPS) {
    return { ok: false, reason: "parallel" };
  }
  const point = ray.intersectPlane(plane, new Vector3());
  return point ? { ok: true, point } : { ok: false, reason: "behind" };
}

export interface ProjectionEngineOptions {
  fixedPlaneOffset: number;
  dragDistance: number;
  onError?: (err: InterpreterError) => void;
}

/**
 * Screen-to-world projection. Every call reads the camera's world matrix as
 * it is right now, so a camera that is still smoothing projects correctly.
 */
export class ProjectionEngine {
  private readonly raycaster = new Raycaster();

  constructor(private readonly options: ProjectionEngineOptions) {}

  rayThrough(camera: Camera, xPct: number, yPct: number): Ray {
    camera.updateMatrixWorld();
    this.raycaster.setFromCamera(convertPercentToNdc(xPct, yPct), camera);
    return this.raycaster.ray.clone();
  }

  /** Intersects the view ray with the world plane z = fixedPlaneOffset. */
  projectToFixedPlane(camera: Camera, xPct: number, yPct: number): Vector3 {
    const plane = new Plane(new Vector3(0, 0, 1), -this.options.fixedPlaneOffset);
    return this.resolve(intersectRayWithPlane(this.rayThrough(camera, xPct, yPct), plane));
  }

  /** Intersects the view ray with a plane facing the camera at `zDistance` in front of its eye. */
  projectToCameraPlane(camera: Camera, xPct: number, yPct: number, zDistance = this.options.dragDistance): Vector3 {
    const ray = this.rayThrough(camera, xPct, yPct);
    const forward = camera.getWorldDirection(new Vector3());
    const anchor = camera.getWorldPosition(new Vector3()).addScaledVector(forward, zDistance);
    const plane = new Plane().setFromNormalAndCoplanarPoint(forward, anchor);
    return this.resolve(intersectRayWithPlane(ray, plane));
  }

  private resolve(hit: PlaneHit): Vector3 {
    if (hit.ok) return hit.point;
    this.options.onError?.({ type: "projection-degenerate", reason: hit.reason });
    return new Vector3(0, 0, 0);
  }
}
