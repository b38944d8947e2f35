import type { Command, InterpreterError, PlacementCommand } from "@facesculpt/command-core";
import type { SequenceState } from "./types";

export type SequenceVerdict =
  | { kind: "pass" }
  | { kind: "accept"; command: PlacementCommand; next: SequenceState }
  | { kind: "duplicate" }
  | { kind: "reject"; error: InterpreterError };

const LEGAL_FROM: Record<PlacementCommand["type"], readonly SequenceState[]> = {
  INSERT: ["IDLE", "AWAITING_XY"],
  SELECT_XY: ["AWAITING_XY", "AWAITING_Z"],
  SELECT_Z: ["AWAITING_Z"],
};

const NEXT_STATE: Record<PlacementCommand["type"], SequenceState> = {
  INSERT: "AWAITING_XY",
  SELECT_XY: "AWAITING_Z",
  SELECT_Z: "IDLE",
};

export function isPlacementCommand(command: Command): command is PlacementCommand {
  return command.type === "INSERT" || command.type === "SELECT_XY" || command.type === "SELECT_Z";
}

/**
 * Guards the insert → selectXY* → selectZ cycle. `evaluate` never mutates;
 * the caller performs the side effects and then calls `commit`.
 */
export class SequenceStateMachine {
  private state: SequenceState = "IDLE";

  getState(): SequenceState {
    return this.state;
  }

  /**
   * @param activeShapeUnmoved whether the active shape still sits where it spawned;
   *   an insert repeated on top of an unmoved shape is a duplicate trigger.
   */
  evaluate(command: Command, activeShapeUnmoved: boolean): SequenceVerdict {
    if (!isPlacementCommand(command)) {
      return { kind: "pass" };
    }
    if (!LEGAL_FROM[command.type].includes(this.state)) {
      return { kind: "reject", error: { type: "sequence-violation", command: command.type, state: this.state } };
    }
    if (command.type === "INSERT" && this.state === "AWAITING_XY" && activeShapeUnmoved) {
      return { kind: "duplicate" };
    }
    return { kind: "accept", command, next: NEXT_STATE[command.type] };
  }

  commit(verdict: Extract<SequenceVerdict, { kind: "accept" }>): void {
    this.state = verdict.next;
  }
}
