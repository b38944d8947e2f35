import { z } from "zod";

const DEFAULT_URL = "ws://localhost:8765";

const envSchema = z.object({
  FACESCULPT_WS_URL: z
    .string()
    .url()
    .refine((value) => /^wss?:\/\//.test(value), { message: "must be a ws:// or wss:// URL" })
    .default(DEFAULT_URL),
});

export interface ConnectionConfig {
  url: string;
}

export function loadConnectionConfig(env: Record<string, string | undefined> = process.env): ConnectionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid connection config: ${issues}`);
  }
  return { url: parsed.data.FACESCULPT_WS_URL };
}

export { DEFAULT_URL as defaultConnectionUrl };
