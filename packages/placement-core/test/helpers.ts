import { expect } from "vitest";
import { PerspectiveCamera, Vector3 } from "three";
import type { ShapeKind } from "@facesculpt/command-core";
import type { SceneCollaborator } from "../src";

export type FakeShape = { id: number; kind: ShapeKind; position: Vector3 };

export class FakeScene implements SceneCollaborator<FakeShape> {
  readonly created: FakeShape[] = [];
  readonly attached = new Set<FakeShape>();
  readonly detached: FakeShape[] = [];

  create(kind: ShapeKind): FakeShape {
    const shape = { id: this.created.length + 1, kind, position: new Vector3() };
    this.created.push(shape);
    return shape;
  }

  attach(shape: FakeShape): void {
    this.attached.add(shape);
  }

  detach(shape: FakeShape): void {
    this.attached.delete(shape);
    this.detached.push(shape);
  }
}

/** 90° vertical fov and square aspect, so a ray through the screen edge leaves at 45°. */
export function makeCamera(position: [number, number, number] = [0, 0, 0]): PerspectiveCamera {
  const camera = new PerspectiveCamera(90, 1, 0.1, 100);
  camera.position.set(...position);
  camera.updateProjectionMatrix();
  camera.updateMatrixWorld();
  return camera;
}

export function expectVec(actual: Vector3, expected: [number, number, number]): void {
  expect(actual.x).toBeCloseTo(expected[0]);
  expect(actual.y).toBeCloseTo(expected[1]);
  expect(actual.z).toBeCloseTo(expected[2]);
}
