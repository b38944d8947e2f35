import { describe, expect, it, vi } from "vitest";
import { Vector3 } from "three";
import { ShapeLifecycleManager } from "../src";
import { expectVec, FakeScene, makeCamera } from "./helpers";
import type { FakeShape } from "./helpers";

function setup() {
  const scene = new FakeScene();
  const onError = vi.fn();
  const lifecycle = new ShapeLifecycleManager<FakeShape>(scene, { spawnOffset: [0, 0.5, -4], onError });
  return { scene, onError, lifecycle, camera: makeCamera() };
}

describe("ShapeLifecycleManager", () => {
  it("spawns at the camera-local offset and attaches the shape", () => {
    const { scene, lifecycle, camera } = setup();
    camera.position.set(1, 0, 0);

    const shape = lifecycle.spawn("cube", camera);

    expectVec(shape.position, [1, 0.5, -4]);
    expect(scene.attached.has(shape)).toBe(true);
    expect(lifecycle.getActive()).toBe(shape);
    expect(lifecycle.isActiveAtSpawn()).toBe(true);
  });

  it("detaches an unfinished shape before spawning a new one", () => {
    const { scene, lifecycle, camera } = setup();
    const first = lifecycle.spawn("sphere", camera);
    const second = lifecycle.spawn("cube", camera);

    expect(scene.detached).toEqual([first]);
    expect(scene.attached.has(second)).toBe(true);
    expect(lifecycle.getActive()).toBe(second);
  });

  it("pushes along the camera forward axis", () => {
    const { lifecycle, camera } = setup();
    const shape = lifecycle.spawn("sphere", camera);

    lifecycle.pushZ(2, camera);

    // forward is (0, 0, -1)
    expectVec(shape.position, [0, 0.5, -6]);
    expect(lifecycle.isActiveAtSpawn()).toBe(false);
  });

  it("repositions the active shape", () => {
    const { lifecycle, camera } = setup();
    const shape = lifecycle.spawn("sphere", camera);

    expect(lifecycle.repositionXY(new Vector3(3, 2, 1))).toBe(true);
    expect(shape.position.toArray()).toEqual([3, 2, 1]);
  });

  it("finalizes into the placed list in completion order", () => {
    const { lifecycle, camera } = setup();
    lifecycle.spawn("sphere", camera);
    lifecycle.finalize();
    lifecycle.spawn("cube", camera);
    lifecycle.pushZ(1, camera);
    lifecycle.finalize();

    expect(lifecycle.getActive()).toBeNull();
    expect(lifecycle.getPlaced().map((entry) => entry.kind)).toEqual(["sphere", "cube"]);
    const snapshot = lifecycle.snapshot();
    expect(snapshot[1].kind).toBe("cube");
    expect(snapshot[1].position[2]).toBeCloseTo(-5);
  });

  it("treats operations without an active shape as no-ops", () => {
    const { lifecycle, onError, camera } = setup();

    expect(lifecycle.repositionXY(new Vector3(1, 1, 1))).toBe(false);
    expect(lifecycle.pushZ(1, camera)).toBe(false);
    expect(lifecycle.finalize()).toBeNull();
    expect(lifecycle.getPlaced()).toHaveLength(0);
    expect(onError.mock.calls.map(([err]) => err.operation)).toEqual(["reposition", "push", "finalize"]);
  });
});
