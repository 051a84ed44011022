import express, { type Express } from "express";
import cors from "cors";
import { blocksRouter } from "./routes/blocks.js";
import { batchesRouter } from "./routes/batches.js";
import { settingsRouter } from "./routes/settings.js";
import { assistantRoute, voiceIntentRoute, type AssistantDeps } from "./routes/voice-intent.js";

export function createApp(deps: AssistantDeps): Express {
  const { service } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true, version: service.store.version, assistant: deps.assistant !== null }));

  app.use(blocksRouter(service));
  app.use(settingsRouter(service));
  app.use(batchesRouter(service));

  app.post("/assistant", assistantRoute(deps));
  app.post("/voice-intent", ...voiceIntentRoute(deps));

  return app;
}
