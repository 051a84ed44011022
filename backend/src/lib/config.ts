import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().min(1).default("./data"),
  STORAGE: z.enum(["file", "memory"]).default("file"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  USE_GPT4O_TRANSCRIBE: z
    .string()
    .optional()
    .transform(v => String(v).toLowerCase() === "true"),
  CARE_WINDOW_START: z.coerce.number().int().min(0).max(96).default(28),
  CARE_WINDOW_END: z.coerce.number().int().min(0).max(96).default(78),
  BALANCE_THRESHOLD_HOURS: z.coerce.number().nonnegative().default(4),
  AI_CARE_WINDOW_POLICY: z.enum(["reject", "clamp"]).default("reject"),
  MANUAL_CARE_WINDOW_POLICY: z.enum(["reject", "clamp"]).default("clamp"),
  OVERLAP_POLICY: z.enum(["reject", "displace"]).default("reject")
});

export type AppConfig = {
  port: number;
  dataDir: string;
  storage: "file" | "memory";
  openai: { apiKey?: string; model: string; useGpt4oTranscribe: boolean };
  careWindow: { start: number; end: number };
  /** Allowed A/B difference per week; scaled to the query window. */
  balanceThresholdHours: number;
  policies: {
    aiCareWindow: "reject" | "clamp";
    manualCareWindow: "reject" | "clamp";
    overlap: "reject" | "displace";
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;
  if (e.CARE_WINDOW_START >= e.CARE_WINDOW_END) {
    throw new Error(`Invalid configuration: CARE_WINDOW_START (${e.CARE_WINDOW_START}) must be before CARE_WINDOW_END (${e.CARE_WINDOW_END})`);
  }
  return {
    port: e.PORT,
    dataDir: e.DATA_DIR,
    storage: e.STORAGE,
    openai: {
      ...(e.OPENAI_API_KEY ? { apiKey: e.OPENAI_API_KEY } : {}),
      model: e.OPENAI_MODEL,
      useGpt4oTranscribe: e.USE_GPT4O_TRANSCRIBE
    },
    careWindow: { start: e.CARE_WINDOW_START, end: e.CARE_WINDOW_END },
    balanceThresholdHours: e.BALANCE_THRESHOLD_HOURS,
    policies: {
      aiCareWindow: e.AI_CARE_WINDOW_POLICY,
      manualCareWindow: e.MANUAL_CARE_WINDOW_POLICY,
      overlap: e.OVERLAP_POLICY
    }
  };
}
