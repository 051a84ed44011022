import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { JournalRepository, ScheduleRepository } from "./repository.js";
import { journalEntrySchema, settingsSchema, timeBlockSchema } from "./schemas.js";
import type { ScheduleChangeEntry, ScheduleSettings, TimeBlock } from "../types.js";

const blocksFileSchema = z.object({ blocks: z.array(timeBlockSchema) });
const journalFileSchema = z.object({ entries: z.array(journalEntrySchema) });

async function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Malformed ${path.basename(file)}: ${parsed.error.message}`);
  }
  return parsed.data;
}

// Write to a sibling temp file and rename, so readers never see half a file.
async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(value, null, 2), "utf8");
  await fs.rename(tmp, file);
}

/** Keeps blocks, settings and the activity journal as JSON files in one directory. */
export class JsonFileScheduleRepository implements ScheduleRepository, JournalRepository {
  // Writes run one at a time; journal appends read the file before writing it.
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string) {}

  private serially<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writes.then(fn);
    this.writes = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private file(name: string) {
    return path.resolve(this.dir, name);
  }

  async load(): Promise<TimeBlock[]> {
    const data = await readJson(this.file("blocks.json"), blocksFileSchema);
    return data?.blocks ?? [];
  }

  async save(blocks: readonly TimeBlock[]): Promise<void> {
    await this.serially(() => writeJson(this.file("blocks.json"), { blocks }));
  }

  async loadSettings(): Promise<ScheduleSettings | null> {
    return readJson(this.file("settings.json"), settingsSchema);
  }

  async saveSettings(settings: ScheduleSettings): Promise<void> {
    await this.serially(() => writeJson(this.file("settings.json"), settings));
  }

  async append(entry: ScheduleChangeEntry): Promise<void> {
    await this.serially(async () => {
      const data = await readJson(this.file("journal.json"), journalFileSchema);
      await writeJson(this.file("journal.json"), { entries: [...(data?.entries ?? []), entry] });
    });
  }

  async list(limit = 50): Promise<ScheduleChangeEntry[]> {
    const data = await readJson(this.file("journal.json"), journalFileSchema);
    return [...(data?.entries ?? [])].reverse().slice(0, limit);
  }
}
