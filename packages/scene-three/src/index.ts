export { ThreeSceneCollaborator } from "./ThreeSceneCollaborator";
export type { ShapeMesh, ThreeSceneOptions } from "./ThreeSceneCollaborator";
export { SculptCanvas } from "./SculptCanvas";
export type { SculptCanvasProps } from "./SculptCanvas";
export { SculptScene } from "./internal/SculptScene";
export type { SculptSceneProps } from "./internal/SculptScene";
