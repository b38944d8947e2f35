import type { CommandType, DecodeError } from "./types";

export type SequenceStateName = "IDLE" | "AWAITING_XY" | "AWAITING_Z";

export type InterpreterError =
  | ({ type: "decode-error" } & DecodeError)
  | { type: "sequence-violation"; command: CommandType; state: SequenceStateName }
  | { type: "projection-degenerate"; reason: "parallel" | "behind" }
  | { type: "missing-active-shape"; operation: "reposition" | "push" | "finalize" };

export function describeError(err: InterpreterError): string {
  switch (err.type) {
    case "decode-error":
      return `dropped malformed message (${err.reason}): ${err.raw}`;
    case "sequence-violation":
      return `${err.command} is not allowed while ${err.state}`;
    case "projection-degenerate":
      return `view ray does not reach the target plane (${err.reason})`;
    case "missing-active-shape":
      return `${err.operation} ignored: no active shape`;
  }
}
