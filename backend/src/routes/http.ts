import type { Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { AssistantError, InvariantViolation, ScheduleError, type ScheduleErrorCode } from "../lib/errors.js";
import { createLogger } from "../lib/log.js";
import { actorSchema } from "../lib/schemas.js";
import type { Actor } from "../types.js";

const log = createLogger("http");

const STATUS: Record<ScheduleErrorCode, number> = {
  InvalidRange: 400,
  InvalidPattern: 400,
  InvalidProposal: 400,
  StaleReference: 422,
  OutOfCareWindow: 422,
  OverlappingCoverage: 422,
  ApplyFailed: 422,
  InvalidTransition: 409,
  StoreBusy: 409,
  NotFound: 404
};

export function statusFor(err: unknown): number {
  if (err instanceof ScheduleError) return STATUS[err.code];
  if (err instanceof ZodError) return 400;
  if (err instanceof AssistantError) return err.code === "NotConfigured" ? 503 : 422;
  return 500;
}

export function sendError(res: Response, err: unknown): Response {
  const status = statusFor(err);
  if (err instanceof ScheduleError) return res.status(status).json({ error: err.toJSON() });
  if (err instanceof ZodError) {
    return res.status(status).json({ error: { code: "ValidationFailed", message: "Request validation failed", details: err.format() } });
  }
  if (err instanceof AssistantError) return res.status(status).json({ error: { code: err.code, message: err.message } });

  if (err instanceof InvariantViolation) log.error("INVARIANT VIOLATION:", err);
  else log.error(err);
  return res.status(500).json({ error: { code: "ServerError", message: "Server error" } });
}

/** Express 4 does not catch rejected handlers; every route goes through here. */
export function handle(fn: (req: Request, res: Response) => Promise<unknown> | unknown): RequestHandler {
  return async (req, res) => {
    try {
      await fn(req, res);
    } catch (err) {
      if (res.headersSent) {
        log.error("Error after response was sent:", err);
        return;
      }
      sendError(res, err);
    }
  };
}

const ANONYMOUS: Actor = { name: "anonymous" };

export function actorFrom(body: unknown): Actor {
  if (!body || typeof body !== "object" || !("actor" in body) || body.actor === undefined) return ANONYMOUS;
  return actorSchema.parse(body.actor);
}
