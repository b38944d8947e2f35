import type { Vector3 } from "three";
import type { SequenceStateName, ShapeKind } from "@facesculpt/command-core";

export type SequenceState = SequenceStateName;

/** Anything the scene can hold and this package can move. */
export interface PlaceableShape {
  position: Vector3;
}

export interface SceneCollaborator<TShape extends PlaceableShape> {
  create(kind: ShapeKind): TShape;
  attach(shape: TShape): void;
  detach(shape: TShape): void;
}

export interface PlacedShape<TShape extends PlaceableShape = PlaceableShape> {
  kind: ShapeKind;
  shape: TShape;
}

export interface PlacedShapeSnapshot {
  kind: ShapeKind;
  position: [number, number, number];
}

export interface CursorPosition {
  xPct: number;
  yPct: number;
}

export type PointerPhase = "press" | "release";

export interface InputSink {
  dispatchPointer(phase: PointerPhase, cursor: CursorPosition): void;
}

export interface MessageSource {
  drain(): string[];
  readonly connected: boolean;
}
