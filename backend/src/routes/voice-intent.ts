import type { Request, RequestHandler, Response } from "express";
import multer from "multer";
import { z } from "zod";
import type { ScheduleAssistant, Transcriber } from "../lib/assistant.js";
import { AssistantError } from "../lib/errors.js";
import type { ScheduleService } from "../lib/schedule-service.js";
import type { Actor } from "../types.js";
import { actorFrom, handle } from "./http.js";

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 20 * 1024 * 1024 } });

export type AssistantDeps = {
  service: ScheduleService;
  assistant: ScheduleAssistant | null;
  transcriber: Transcriber | null;
};

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

async function propose(deps: AssistantDeps, instruction: string, actor: Actor, res: Response) {
  if (!deps.assistant) throw new AssistantError("NotConfigured", "AI assistant is not configured (OPENAI_API_KEY missing)");
  return deps.service.requestProposal(instruction, deps.assistant, { signal: disconnectSignal(res), actor });
}

const instructionBody = z.object({ instruction: z.string().trim().min(1) });

export function assistantRoute(deps: AssistantDeps): RequestHandler {
  return handle(async (req, res) => {
    const { instruction } = instructionBody.parse(req.body);
    const workflow = await propose(deps, instruction, actorFrom(req.body), res);
    res.status(201).json(workflow);
  });
}

const actorFields = z.object({ actor_name: z.string().optional(), actor_provider: z.string().optional() });

// Multipart bodies carry the actor as two plain fields.
function actorFromForm(req: Request): Actor {
  const form = actorFields.parse(req.body ?? {});
  if (!form.actor_name) return actorFrom(undefined);
  return actorFrom({ actor: { name: form.actor_name, provider: form.actor_provider } });
}

export function voiceIntentRoute(deps: AssistantDeps): RequestHandler[] {
  return [
    upload.single("audio"),
    handle(async (req, res) => {
      const audio = req.file;
      if (!audio) return res.status(400).json({ error: { code: "NoAudio", message: "No audio uploaded" } });
      if (!deps.transcriber) throw new AssistantError("NotConfigured", "Transcription is not configured (OPENAI_API_KEY missing)");

      const transcript = await deps.transcriber.transcribe({
        buffer: audio.buffer,
        filename: audio.originalname,
        mimetype: audio.mimetype
      });
      if (!transcript) throw new AssistantError("NoActionFound", "No speech was recognised in the recording");

      const workflow = await propose(deps, transcript, actorFromForm(req), res);
      res.status(201).json({ transcript, ...workflow.toJSON() });
    })
  ];
}
