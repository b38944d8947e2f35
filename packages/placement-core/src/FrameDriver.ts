import type { Camera, Vector3 } from "three";
import { consoleLogger, decodeMessage, describeError, signOf } from "@facesculpt/command-core";
import type { Command, InterpreterError, Logger, PlacementCommand } from "@facesculpt/command-core";
import type { CameraRigController } from "@facesculpt/control-core";
import { resolveInterpreterConfig } from "./config";
import type { InterpreterConfig } from "./config";
import { DelayQueue } from "./DelayQueue";
import { ProjectionEngine } from "./projection";
import { SequenceStateMachine } from "./SequenceStateMachine";
import { ShapeLifecycleManager } from "./ShapeLifecycleManager";
import type {
  CursorPosition,
  InputSink,
  MessageSource,
  PlaceableShape,
  PlacedShape,
  PlacedShapeSnapshot,
  SceneCollaborator,
  SequenceState,
} from "./types";

export type DispatchOutcome = "applied" | "ignored" | "rejected";

export interface TickReport {
  applied: number;
  ignored: number;
  rejected: number;
  malformed: number;
}

export interface FrameDriverOptions<TShape extends PlaceableShape> {
  camera: Camera;
  rig: CameraRigController;
  scene: SceneCollaborator<TShape>;
  source?: MessageSource;
  inputSink?: InputSink;
  config?: InterpreterConfig;
  logger?: Logger;
  onError?: (err: InterpreterError) => void;
}

/**
 * The only place interpreter state changes. Each `tick` drains pending
 * messages in arrival order, runs due scheduled input, then advances the
 * camera smoothing once with the frame's dt.
 */
export class FrameDriver<TShape extends PlaceableShape> {
  private readonly config: Required<InterpreterConfig>;
  private readonly logger: Logger;
  private readonly sequence = new SequenceStateMachine();
  private readonly lifecycle: ShapeLifecycleManager<TShape>;
  private readonly projection: ProjectionEngine;
  private readonly scheduled = new DelayQueue();
  private cursor: CursorPosition = { xPct: 50, yPct: 50 };

  constructor(private readonly options: FrameDriverOptions<TShape>) {
    this.config = resolveInterpreterConfig(options.config);
    this.logger = options.logger ?? consoleLogger;
    const onError = (err: InterpreterError) => this.report(err);
    this.lifecycle = new ShapeLifecycleManager(options.scene, { spawnOffset: this.config.spawnOffset, onError });
    this.projection = new ProjectionEngine({
      fixedPlaneOffset: this.config.fixedPlaneOffset,
      dragDistance: this.config.dragDistance,
      onError,
    });
    options.rig.applyToCamera(options.camera);
  }

  tick(dtSeconds: number, messages: readonly string[] = []): TickReport {
    const report: TickReport = { applied: 0, ignored: 0, rejected: 0, malformed: 0 };
    const pending = [...(this.options.source?.drain() ?? []), ...messages];

    for (const raw of pending) {
      const decoded = decodeMessage(raw);
      if (!decoded.ok) {
        this.report({ type: "decode-error", ...decoded.error });
        report.malformed += 1;
        continue;
      }
      report[this.dispatch(decoded.command)] += 1;
    }

    this.scheduled.flush();
    this.options.rig.update(dtSeconds);
    this.options.rig.applyToCamera(this.options.camera);
    this.scheduled.advance();
    return report;
  }

  dispatch(command: Command): DispatchOutcome {
    const verdict = this.sequence.evaluate(command, this.lifecycle.isActiveAtSpawn());
    switch (verdict.kind) {
      case "reject":
        this.report(verdict.error);
        return "rejected";
      case "duplicate":
        this.logger.debug("duplicate insert ignored");
        return "ignored";
      case "accept":
        if (!this.connected) {
          this.logger.warn(`${verdict.command.type} ignored: connection lost`);
          return "ignored";
        }
        this.applyPlacement(verdict.command);
        this.sequence.commit(verdict);
        return "applied";
      case "pass":
        return this.applyContinuous(command);
    }
  }

  getSequenceState(): SequenceState {
    return this.sequence.getState();
  }

  getCursor(): CursorPosition {
    return { ...this.cursor };
  }

  /** Cursor projected onto the fixed world plane, for drawing a marker. */
  getCursorWorldPoint(): Vector3 {
    return this.projection.projectToFixedPlane(this.options.camera, this.cursor.xPct, this.cursor.yPct);
  }

  getActiveShape(): TShape | null {
    return this.lifecycle.getActive();
  }

  getPlacedShapes(): readonly PlacedShape<TShape>[] {
    return this.lifecycle.getPlaced();
  }

  snapshot(): PlacedShapeSnapshot[] {
    return this.lifecycle.snapshot();
  }

  private get connected(): boolean {
    return this.options.source?.connected ?? true;
  }

  private applyPlacement(command: PlacementCommand): void {
    const { camera } = this.options;
    switch (command.type) {
      case "INSERT":
        this.lifecycle.spawn(command.shape, camera);
        break;
      case "SELECT_XY": {
        const xPct = command.xPct ?? this.cursor.xPct;
        const yPct = command.yPct ?? this.cursor.yPct;
        this.lifecycle.repositionXY(this.projection.projectToCameraPlane(camera, xPct, yPct));
        break;
      }
      case "SELECT_Z":
        this.lifecycle.pushZ(command.z, camera);
        this.lifecycle.finalize();
        break;
    }
  }

  private applyContinuous(command: Command): DispatchOutcome {
    switch (command.type) {
      case "CURSOR":
        this.cursor = { xPct: command.xPct, yPct: command.yPct };
        this.followCursor();
        return "applied";
      case "CLICK":
        this.scheduleClick({ xPct: command.xPct, yPct: command.yPct });
        return "applied";
      case "MOVE":
      case "STAGE_ROTATE":
        this.options.rig.handle(command);
        return "applied";
      case "UNKNOWN":
        this.logger.info(`unknown command "${command.rawTag}" ignored`);
        return "ignored";
      case "INSERT":
      case "SELECT_XY":
      case "SELECT_Z":
        return "ignored";
    }
  }

  private followCursor(): void {
    const { camera, rig } = this.options;
    const { xPct, yPct } = this.cursor;
    switch (this.sequence.getState()) {
      case "AWAITING_XY":
        if (!this.connected) return;
        this.lifecycle.repositionXY(this.projection.projectToCameraPlane(camera, xPct, yPct));
        break;
      case "AWAITING_Z": {
        if (!this.connected) return;
        const direction = -signOf(yPct);
        if (direction !== 0) this.lifecycle.pushZ(direction * this.config.pushStep, camera);
        break;
      }
      case "IDLE": {
        const step = this.config.cursorRotateStep;
        const yaw = -signOf(xPct) * step;
        const pitch = -signOf(yPct) * step;
        if (yaw !== 0 || pitch !== 0) rig.handle({ type: "STAGE_ROTATE", x: yaw, y: pitch });
        break;
      }
    }
  }

  private scheduleClick(at: CursorPosition): void {
    const sink = this.options.inputSink;
    if (!sink) {
      this.logger.debug("click dropped: no input sink");
      return;
    }
    this.scheduled.schedule(() => sink.dispatchPointer("press", at), 0);
    this.scheduled.schedule(() => sink.dispatchPointer("release", at), 1);
  }

  private report(err: InterpreterError): void {
    const message = describeError(err);
    if (err.type === "missing-active-shape") {
      this.logger.debug(message);
    } else {
      this.logger.warn(message);
    }
    this.options.onError?.(err);
  }
}
