import { Router, type Response } from "express";
import { z } from "zod";
import { createProposal } from "../lib/proposals.js";
import type { ApplyResult, ScheduleService } from "../lib/schedule-service.js";
import { dateRangeSchema, manualBatchSchema, recurrencePatternSchema } from "../lib/schemas.js";
import { actorFrom, handle, statusFor } from "./http.js";

const approveBody = z.object({ apply: z.boolean().optional() });
const rejectBody = z.object({ reason: z.string().optional() });
const applyBody = z.object({ onBusy: z.enum(["queue", "fail"]).optional() });
const seriesBody = z.object({ pattern: recurrencePatternSchema, range: dateRangeSchema });

function sendApplyResult(res: Response, result: ApplyResult): void {
  if (result.ok) {
    res.json(result);
    return;
  }
  res.status(statusFor(result.error)).json({ batchId: result.batchId, state: result.state, error: result.error.toJSON() });
}

export function batchesRouter(service: ScheduleService): Router {
  const router = Router();

  router.get(
    "/batches",
    handle((req, res) => {
      const { state } = z.object({ state: z.enum(["pending", "all"]).default("pending") }).parse(req.query);
      res.json({ batches: state === "all" ? service.allBatches() : service.pendingBatches() });
    })
  );

  router.post(
    "/batches",
    handle((req, res) => {
      const body = manualBatchSchema.parse(req.body);
      const changes = body.changes.map(c =>
        createProposal(c.change, { rationale: c.rationale, wasAISuggested: false, names: service.providerNames })
      );
      const workflow = service.submit({ changes, summary: body.summary, instruction: body.instruction, source: "manual" });
      res.status(201).json(workflow);
    })
  );

  router.post(
    "/batches/approve-all",
    handle(async (req, res) => {
      const { apply } = approveBody.parse(req.body);
      const results = await service.approveAll(actorFrom(req.body), { apply });
      res.json({ results });
    })
  );

  router.post(
    "/batches/reject-all",
    handle((req, res) => {
      const { reason } = rejectBody.parse(req.body);
      const results = service.rejectAll(actorFrom(req.body), reason);
      res.json({ results });
    })
  );

  router.get(
    "/batches/:id",
    handle((req, res) => res.json(service.batch(req.params.id)))
  );

  router.post(
    "/batches/:id/approve",
    handle(async (req, res) => {
      const { apply } = approveBody.parse(req.body);
      const actor = actorFrom(req.body);
      if (apply) return sendApplyResult(res, await service.approveAndApply(req.params.id, actor));
      res.json(service.approve(req.params.id, actor));
    })
  );

  router.post(
    "/batches/:id/reject",
    handle((req, res) => {
      const { reason } = rejectBody.parse(req.body);
      res.json(service.reject(req.params.id, actorFrom(req.body), reason));
    })
  );

  router.post(
    "/batches/:id/apply",
    handle(async (req, res) => {
      const { onBusy } = applyBody.parse(req.body);
      sendApplyResult(res, await service.apply(req.params.id, actorFrom(req.body), { onBusy }));
    })
  );

  router.post(
    "/batches/:id/cancel",
    handle((req, res) => res.json(service.cancel(req.params.id, actorFrom(req.body))))
  );

  router.post(
    "/series",
    handle((req, res) => {
      const { pattern, range } = seriesBody.parse(req.body);
      const workflow = service.materializeSeries(pattern, range);
      if (!workflow) return res.json({ batch: null, message: "Series is already up to date" });
      res.status(201).json(workflow);
    })
  );

  return router;
}
