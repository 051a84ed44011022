import { Router } from "express";
import { CARE_PROVIDERS, displayName, PROVIDER_INFO } from "../lib/providers.js";
import type { ScheduleService } from "../lib/schedule-service.js";
import { careWindowSchema, providerNamesSchema } from "../lib/schemas.js";
import { careWindowHours } from "../lib/slots.js";
import { handle } from "./http.js";

export function settingsRouter(service: ScheduleService): Router {
  const router = Router();
  const careWindow = () => ({ careWindow: service.careWindow, hoursPerDay: careWindowHours(service.careWindow) });

  router.get(
    "/settings/care-window",
    handle((_req, res) => res.json(careWindow()))
  );

  router.put(
    "/settings/care-window",
    handle(async (req, res) => {
      await service.setCareWindow(careWindowSchema.parse(req.body));
      res.json(careWindow());
    })
  );

  router.delete(
    "/settings/care-window",
    handle(async (_req, res) => {
      await service.resetCareWindow();
      res.json(careWindow());
    })
  );

  router.get(
    "/providers",
    handle((_req, res) =>
      res.json({
        providers: CARE_PROVIDERS.map(id => ({ id, displayName: displayName(id, service.providerNames), color: PROVIDER_INFO[id].color }))
      })
    )
  );

  router.get(
    "/settings/provider-names",
    handle((_req, res) => res.json({ providerNames: service.providerNames }))
  );

  // An empty name restores the default display name.
  router.put(
    "/settings/provider-names",
    handle(async (req, res) => {
      const names = providerNamesSchema.parse(req.body);
      for (const provider of CARE_PROVIDERS) {
        const name = names[provider];
        if (name !== undefined) await service.setProviderName(provider, name);
      }
      res.json({ providerNames: service.providerNames });
    })
  );

  return router;
}
