import OpenAI from "openai";
import type { AppConfig } from "./config.js";

/** Null when no API key is configured; callers answer with NotConfigured. */
export function createOpenAIClient(config: AppConfig["openai"]): OpenAI | null {
  if (!config.apiKey) return null;
  return new OpenAI({ apiKey: config.apiKey });
}
