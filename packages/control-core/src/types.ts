export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number];

export type CameraRigCommand =
  | { type: "MOVE"; x: number; y: number; z: number }
  | { type: "STAGE_ROTATE"; x: number; y: number };

export interface CameraRigConfig {
  /** Per-second rate at which the position closes on its target. */
  lerpCoefficient?: number;
  /** Per-second rate at which the orientation closes on its target. */
  slerpCoefficient?: number;
  translationScale?: number;
  rotationScale?: number;
  initialPosition?: Vec3;
  initialYaw?: number;
  initialPitch?: number;
  /**
   * When true, clamp target pitch to avoid flipping over the poles.
   * Set to false to allow upside-down views.
   * Default: true
   */
  clampPitch?: boolean;
}

export interface CameraRigState {
  position: Vec3;
  orientation: Quat;
  targetPosition: Vec3;
  targetOrientation: Quat;
  targetYaw: number;
  targetPitch: number;
}
