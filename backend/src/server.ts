import "dotenv/config";
import { createApp } from "./app.js";
import { OpenAIScheduleAssistant, OpenAITranscriber } from "./lib/assistant.js";
import { formatCareTimeDelta } from "./lib/balance.js";
import { loadConfig } from "./lib/config.js";
import { createLogger } from "./lib/log.js";
import { createOpenAIClient } from "./lib/openai.js";
import { MemoryScheduleRepository } from "./lib/repository.js";
import { JsonFileScheduleRepository } from "./lib/schedule-file.js";
import { ScheduleService } from "./lib/schedule-service.js";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  const repository = config.storage === "memory" ? new MemoryScheduleRepository() : new JsonFileScheduleRepository(config.dataDir);

  const service = await ScheduleService.open({
    repository,
    journal: repository,
    policies: config.policies,
    balanceThresholdHours: config.balanceThresholdHours,
    defaultCareWindow: config.careWindow
  });
  const client = createOpenAIClient(config.openai);
  if (!client) log.warn("OPENAI_API_KEY not set; /assistant and /voice-intent are disabled");

  const app = createApp({
    service,
    assistant: client ? new OpenAIScheduleAssistant(client, config.openai.model) : null,
    transcriber: client ? new OpenAITranscriber(client, config.openai.useGpt4oTranscribe) : null
  });

  service.onApplied(event =>
    log.info(
      `Applied "${event.batchSummary}" on ${event.affectedDates.join(", ")} (${formatCareTimeDelta(event.careTimeDelta, service.providerNames)})`
    )
  );

  app.listen(config.port, () => log.info(`Custody schedule server listening on :${config.port}`));
}

main().catch(err => {
  log.error(err);
  process.exit(1);
});
