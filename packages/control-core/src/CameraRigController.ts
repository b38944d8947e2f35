import { Euler, Quaternion, Vector3 } from "three";
import type { CameraRigCommand, CameraRigConfig, CameraRigState, Quat, Vec3 } from "./types";

type CameraLike = {
  position: { copy: (v: Vector3) => unknown };
  quaternion: { copy: (q: Quaternion) => unknown };
};

const DEFAULT_CONFIG: Required<CameraRigConfig> = {
  lerpCoefficient: 5,
  slerpCoefficient: 5,
  translationScale: 1,
  rotationScale: 1,
  initialPosition: [0, 0, 0],
  initialYaw: 0,
  initialPitch: 0,
  clampPitch: true,
};

function clampPitch(pitch: number): number {
  const EPS = 1e-4;
  const limit = Math.PI / 2 - EPS;
  return Math.min(Math.max(pitch, -limit), limit);
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

function mergeConfig(config?: CameraRigConfig): Required<CameraRigConfig> {
  return { ...DEFAULT_CONFIG, ...config };
}

function orientationFrom(yaw: number, pitch: number): Quaternion {
  return new Quaternion().setFromEuler(new Euler(pitch, yaw, 0, "YXZ"));
}

/**
 * Keeps a commanded (target) camera transform apart from the applied one and
 * closes the gap a little every frame, so bursts of commands never snap.
 */
export class CameraRigController {
  private config: Required<CameraRigConfig>;
  private readonly position: Vector3;
  private readonly orientation: Quaternion;
  private readonly targetPosition: Vector3;
  private readonly targetOrientation: Quaternion;
  private targetYaw: number;
  private targetPitch: number;

  constructor(config?: CameraRigConfig) {
    this.config = mergeConfig(config);
    this.targetYaw = this.config.initialYaw;
    this.targetPitch = this.config.clampPitch ? clampPitch(this.config.initialPitch) : this.config.initialPitch;
    this.targetPosition = new Vector3(...this.config.initialPosition);
    this.targetOrientation = orientationFrom(this.targetYaw, this.targetPitch);
    // Start at rest on the target.
    this.position = this.targetPosition.clone();
    this.orientation = this.targetOrientation.clone();
  }

  handle(command: CameraRigCommand): void {
    switch (command.type) {
      case "MOVE":
        this.targetPosition.add(
          new Vector3(command.x, command.y, command.z).multiplyScalar(this.config.translationScale)
        );
        break;
      case "STAGE_ROTATE": {
        this.targetYaw += command.x * this.config.rotationScale;
        const pitch = this.targetPitch + command.y * this.config.rotationScale;
        this.targetPitch = this.config.clampPitch ? clampPitch(pitch) : pitch;
        this.targetOrientation.copy(orientationFrom(this.targetYaw, this.targetPitch));
        break;
      }
      default:
        break;
    }
  }

  update(dtSeconds: number): void {
    if (!(dtSeconds > 0)) return;
    this.position.lerp(this.targetPosition, clamp01(this.config.lerpCoefficient * dtSeconds));
    this.orientation.slerp(this.targetOrientation, clamp01(this.config.slerpCoefficient * dtSeconds));
  }

  applyToCamera(camera: CameraLike): void {
    camera.position.copy(this.position);
    camera.quaternion.copy(this.orientation);
  }

  getState(): CameraRigState {
    return {
      position: toVec3(this.position),
      orientation: toQuat(this.orientation),
      targetPosition: toVec3(this.targetPosition),
      targetOrientation: toQuat(this.targetOrientation),
      targetYaw: this.targetYaw,
      targetPitch: this.targetPitch,
    };
  }
}

function toVec3(v: Vector3): Vec3 {
  return [v.x, v.y, v.z];
}

function toQuat(q: Quaternion): Quat {
  return [q.x, q.y, q.z, q.w];
}
