export * from "./types";
export * from "./config";
export { convertPercentToNdc, intersectRayWithPlane, ProjectionEngine } from "./projection";
export type { PlaneHit, ProjectionEngineOptions } from "./projection";
export { isPlacementCommand, SequenceStateMachine } from "./SequenceStateMachine";
export type { SequenceVerdict } from "./SequenceStateMachine";
export { ShapeLifecycleManager } from "./ShapeLifecycleManager";
export type { ShapeLifecycleOptions } from "./ShapeLifecycleManager";
export { DelayQueue } from "./DelayQueue";
export { MessageQueue } from "./MessageQueue";
export { FrameDriver } from "./FrameDriver";
export type { DispatchOutcome, FrameDriverOptions, TickReport } from "./FrameDriver";
