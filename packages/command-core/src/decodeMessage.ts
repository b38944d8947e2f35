import { z } from "zod";
import type { Command, DecodeResult } from "./types";

const DEFAULT_SHAPE = "sphere";

function toNumber(value: number | string | null | undefined): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

// Trackers send numbers either raw or pre-formatted ("12.34"); missing means 0.
const lenientNumber = z.union([z.number(), z.string(), z.null()]).optional().transform(toNumber);

const optionalNumber = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value) => (value === undefined ? undefined : toNumber(value)));

const envelopeSchema = z.object({ command: z.string() }).passthrough();

const insertSchema = z.object({ shape: z.string().optional() });
const selectXYSchema = z.object({ x: optionalNumber, y: optionalNumber });
const selectZSchema = z.object({ z: lenientNumber });
const pointSchema = z.object({ x: lenientNumber, y: lenientNumber });
const moveSchema = z.object({ x: lenientNumber, y: lenientNumber, z: lenientNumber });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

type CommandSchema = z.ZodType<Command, z.ZodTypeDef, unknown>;

function schemaFor(tag: string): CommandSchema | null {
  switch (tag) {
    case "insert":
      return insertSchema.transform((m): Command => ({ type: "INSERT", shape: m.shape ?? DEFAULT_SHAPE }));
    case "selectXY":
      return selectXYSchema.transform((m): Command =>
        m.x !== undefined && m.y !== undefined
          ? { type: "SELECT_XY", xPct: m.x, yPct: m.y }
          : { type: "SELECT_XY" }
      );
    case "selectZ":
      return selectZSchema.transform((m): Command => ({ type: "SELECT_Z", z: m.z }));
    case "cursor":
      return pointSchema.transform((m): Command => ({ type: "CURSOR", xPct: m.x, yPct: m.y }));
    case "click":
      return pointSchema.transform((m): Command => ({ type: "CLICK", xPct: m.x, yPct: m.y }));
    case "move":
      return moveSchema.transform((m): Command => ({ type: "MOVE", x: m.x, y: m.y, z: m.z }));
    case "stagerotate":
      return pointSchema.transform((m): Command => ({ type: "STAGE_ROTATE", x: m.x, y: m.y }));
    default:
      return null;
  }
}

/** Decodes one inbound text message into a typed command. Never throws. */
export function decodeMessage(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : "invalid JSON";
    return { ok: false, error: { raw, reason } };
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return { ok: false, error: { raw, reason: formatIssues(envelope.error) } };
  }

  const tag = envelope.data.command;
  const schema = schemaFor(tag);
  if (!schema) {
    return { ok: true, command: { type: "UNKNOWN", rawTag: tag } };
  }

  const result = schema.safeParse(envelope.data);
  if (!result.success) {
    return { ok: false, error: { raw, reason: formatIssues(result.error) } };
  }
  return { ok: true, command: result.data };
}
