import { Router } from "express";
import { z } from "zod";
import { formatGap } from "../lib/balance.js";
import { ScheduleError } from "../lib/errors.js";
import type { ScheduleService } from "../lib/schedule-service.js";
import { isoDateSchema, providerSchema } from "../lib/schemas.js";
import { overlappingPairs, sortedByStart } from "../lib/store.js";
import type { DateRange } from "../types.js";
import { handle } from "./http.js";

const blocksQuery = z.object({
  date: isoDateSchema.optional(),
  provider: providerSchema.optional(),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional()
});

const rangeQuery = z.object({ from: isoDateSchema.optional(), to: isoDateSchema.optional() });

function rangeFrom(query: { from?: string; to?: string }): DateRange | undefined {
  const { from, to } = query;
  if (!from && !to) return undefined;
  if (!from || !to || from > to) {
    throw new ScheduleError("InvalidRange", "Both from and to are required, with from on or before to");
  }
  return { from, to };
}

export function blocksRouter(service: ScheduleService): Router {
  const router = Router();

  router.get(
    "/blocks",
    handle((req, res) => {
      const query = blocksQuery.parse(req.query);
      const range = rangeFrom(query);
      const blocks = service.store.blocks.filter(
        b =>
          (!query.date || b.date === query.date) &&
          (!query.provider || b.provider === query.provider) &&
          (!range || (b.date >= range.from && b.date <= range.to))
      );
      const ordered = sortedByStart(blocks).sort((a, b) => a.date.localeCompare(b.date));
      res.json({ version: service.store.version, blocks: ordered });
    })
  );

  router.get(
    "/blocks/overlaps",
    handle((req, res) => {
      const query = blocksQuery.pick({ date: true, provider: true }).parse(req.query);
      const overlaps = query.date
        ? service.store.overlaps(query.date, query.provider)
        : overlappingPairs(service.store.blocks.filter(b => !query.provider || b.provider === query.provider));
      res.json({ overlaps });
    })
  );

  router.get(
    "/balance",
    handle((req, res) => {
      const report = service.balance(rangeFrom(rangeQuery.parse(req.query)));
      res.json({ ...report, gapText: report.gap ? formatGap(report.gap) : null });
    })
  );

  router.get(
    "/journal",
    handle(async (req, res) => {
      const { limit } = z.object({ limit: z.coerce.number().int().positive().max(500).optional() }).parse(req.query);
      res.json({ entries: await service.journalEntries(limit) });
    })
  );

  return router;
}
