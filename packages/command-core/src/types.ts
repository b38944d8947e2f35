export type ShapeKind = "sphere" | "cube" | (string & {});

export type Command =
  | { type: "INSERT"; shape: ShapeKind }
  | { type: "SELECT_XY"; xPct?: number; yPct?: number }
  | { type: "SELECT_Z"; z: number }
  | { type: "CURSOR"; xPct: number; yPct: number }
  | { type: "CLICK"; xPct: number; yPct: number }
  | { type: "MOVE"; x: number; y: number; z: number }
  | { type: "STAGE_ROTATE"; x: number; y: number }
  | { type: "UNKNOWN"; rawTag: string };

export type CommandType = Command["type"];

/** Commands that take part in the insert → selectXY → selectZ cycle. */
export type PlacementCommand = Extract<Command, { type: "INSERT" | "SELECT_XY" | "SELECT_Z" }>;

export type Direction = -1 | 0 | 1;

export interface DecodeError {
  raw: string;
  reason: string;
}

export type DecodeResult = { ok: true; command: Command } | { ok: false; error: DecodeError };
