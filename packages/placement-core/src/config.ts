import type { Vec3 } from "@facesculpt/control-core";

export interface InterpreterConfig {
  /** z of the world plane the cursor marker rides on. */
  fixedPlaneOffset?: number;
  /** Standoff of the camera-relative plane a dragged shape rides on. */
  dragDistance?: number;
  /** Camera-local offset at which a new shape appears. */
  spawnOffset?: Vec3;
  /** Depth change per cursor message while awaiting Z. */
  pushStep?: number;
  /** Look nudge (radians) per cursor message while idle; 0 disables. */
  cursorRotateStep?: number;
}

const DEFAULT_CONFIG: Required<InterpreterConfig> = {
  fixedPlaneOffset: 0.5,
  dragDistance: 4,
  spawnOffset: [0, 0.5, -4],
  pushStep: 0.05,
  cursorRotateStep: 0.01,
};

export function resolveInterpreterConfig(config?: InterpreterConfig): Required<InterpreterConfig> {
  return { ...DEFAULT_CONFIG, ...config };
}
