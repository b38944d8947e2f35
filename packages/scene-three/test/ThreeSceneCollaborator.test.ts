import { describe, expect, it, vi } from "vitest";
import { BoxGeometry, Group, PerspectiveCamera, SphereGeometry, TorusGeometry } from "three";
import { silentLogger } from "@facesculpt/command-core";
import { CameraRigController } from "@facesculpt/control-core";
import { FrameDriver } from "@facesculpt/placement-core";
import { ThreeSceneCollaborator } from "../src/ThreeSceneCollaborator";
import type { ShapeMesh } from "../src/ThreeSceneCollaborator";

describe("ThreeSceneCollaborator", () => {
  it("builds geometry for known shape kinds", () => {
    const scene = new ThreeSceneCollaborator(new Group());

    expect(scene.create("cube").geometry).toBeInstanceOf(BoxGeometry);
    expect(scene.create("sphere").geometry).toBeInstanceOf(SphereGeometry);
    expect(scene.create("torus").geometry).toBeInstanceOf(TorusGeometry);
  });

  it("falls back for unnamed kinds but keeps the requested name", () => {
    const scene = new ThreeSceneCollaborator(new Group(), { fallbackKind: "cube" });
    const mesh = scene.create("teapot");

    expect(mesh.geometry).toBeInstanceOf(BoxGeometry);
    expect(mesh.name).toBe("teapot");
    expect(mesh.userData.shapeKind).toBe("teapot");
  });

  it("does not treat object prototype keys as shape kinds", () => {
    const scene = new ThreeSceneCollaborator(new Group());
    expect(scene.create("toString").geometry).toBeInstanceOf(SphereGeometry);
  });

  it("attaches and detaches meshes under the root", () => {
    const root = new Group();
    const scene = new ThreeSceneCollaborator(root);
    const mesh = scene.create("sphere");

    scene.attach(mesh);
    expect(root.children).toEqual([mesh]);

    scene.detach(mesh);
    expect(root.children).toEqual([]);
  });

  it("clears only the meshes it attached", () => {
    const root = new Group();
    const marker = new Group();
    root.add(marker);
    const scene = new ThreeSceneCollaborator(root);
    const cube = scene.create("cube");
    const disposed = vi.fn();
    cube.geometry.addEventListener("dispose", disposed);
    scene.attach(cube);
    scene.attach(scene.create("sphere"));

    scene.clear();

    expect(root.children).toEqual([marker]);
    expect(disposed).toHaveBeenCalledTimes(1);
  });
});

describe("ThreeSceneCollaborator with FrameDriver", () => {
  it("leaves finalized meshes in the scene graph", () => {
    const root = new Group();
    const camera = new PerspectiveCamera(90, 1, 0.1, 100);
    const driver = new FrameDriver<ShapeMesh>({
      camera,
      rig: new CameraRigController({ initialPosition: [0, 0, 5] }),
      scene: new ThreeSceneCollaborator(root),
      logger: silentLogger,
    });

    driver.tick(1 / 60, [
      JSON.stringify({ command: "insert", shape: "cube" }),
      JSON.stringify({ command: "selectXY", x: 50, y: 50 }),
      JSON.stringify({ command: "selectZ", z: 1 }),
      JSON.stringify({ command: "insert", shape: "sphere" }),
    ]);

    expect(root.children.map((child) => child.name)).toEqual(["cube", "sphere"]);
    expect(root.children[0].position.z).toBeCloseTo(0);
    expect(driver.getPlacedShapes()).toHaveLength(1);
  });
});
