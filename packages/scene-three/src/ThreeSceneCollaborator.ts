import * as THREE from "three";
import type { ShapeKind } from "@facesculpt/command-core";
import type { SceneCollaborator } from "@facesculpt/placement-core";

type GeometryFactory = () => THREE.BufferGeometry;

const sphere: GeometryFactory = () => new THREE.SphereGeometry(0.5, 32, 16);

const GEOMETRIES = new Map<string, GeometryFactory>([
  ["sphere", sphere],
  ["cube", () => new THREE.BoxGeometry(1, 1, 1)],
  ["cylinder", () => new THREE.CylinderGeometry(0.5, 0.5, 1, 32)],
  ["cone", () => new THREE.ConeGeometry(0.5, 1, 32)],
  ["torus", () => new THREE.TorusGeometry(0.4, 0.15, 16, 48)],
]);

export interface ThreeSceneOptions {
  color?: THREE.ColorRepresentation;
  /** Geometry used for shape names with no factory of their own. */
  fallbackKind?: ShapeKind;
}

export type ShapeMesh = THREE.Mesh<THREE.BufferGeometry, THREE.MeshStandardMaterial> & {
  userData: { shapeKind?: ShapeKind };
};

export class ThreeSceneCollaborator implements SceneCollaborator<ShapeMesh> {
  private readonly color: THREE.ColorRepresentation;
  private readonly fallbackKind: string;
  private readonly attached = new Set<ShapeMesh>();

  constructor(private readonly root: THREE.Object3D, options: ThreeSceneOptions = {}) {
    this.color = options.color ?? "#46e6a5";
    this.fallbackKind = options.fallbackKind ?? "sphere";
  }

  create(kind: ShapeKind): ShapeMesh {
    const factory = GEOMETRIES.get(kind) ?? GEOMETRIES.get(this.fallbackKind) ?? sphere;
    const mesh: ShapeMesh = new THREE.Mesh(factory(), new THREE.MeshStandardMaterial({ color: this.color }));
    mesh.name = kind;
    mesh.userData.shapeKind = kind;
    return mesh;
  }

  attach(shape: ShapeMesh): void {
    this.root.add(shape);
    this.attached.add(shape);
  }

  detach(shape: ShapeMesh): void {
    this.root.remove(shape);
    this.attached.delete(shape);
    shape.geometry.dispose();
    shape.material.dispose();
  }

  /** Detaches every mesh this collaborator attached, placed ones included. */
  clear(): void {
    for (const shape of [...this.attached]) this.detach(shape);
  }
}
