import type { ScheduleChangeEntry, ScheduleSettings, TimeBlock } from "../types.js";

/** Durable home of the schedule. Each call is treated as atomic. */
export interface ScheduleRepository {
  load(): Promise<TimeBlock[]>;
  save(blocks: readonly TimeBlock[]): Promise<void>;
  loadSettings(): Promise<ScheduleSettings | null>;
  saveSettings(settings: ScheduleSettings): Promise<void>;
}

/** Append-only activity journal. */
export interface JournalRepository {
  append(entry: ScheduleChangeEntry): Promise<void>;
  /** Newest first. */
  list(limit?: number): Promise<ScheduleChangeEntry[]>;
}

export class MemoryScheduleRepository implements ScheduleRepository, JournalRepository {
  private blocks: TimeBlock[];
  private settings: ScheduleSettings | null;
  private readonly entries: ScheduleChangeEntry[] = [];
  saves = 0;

  constructor(seed: { blocks?: TimeBlock[]; settings?: ScheduleSettings } = {}) {
    this.blocks = [...(seed.blocks ?? [])];
    this.settings = seed.settings ?? null;
  }

  async load(): Promise<TimeBlock[]> {
    return [...this.blocks];
  }

  async save(blocks: readonly TimeBlock[]): Promise<void> {
    this.blocks = [...blocks];
    this.saves++;
  }

  async loadSettings(): Promise<ScheduleSettings | null> {
    return this.settings;
  }

  async saveSettings(settings: ScheduleSettings): Promise<void> {
    this.settings = settings;
  }

  async append(entry: ScheduleChangeEntry): Promise<void> {
    this.entries.push(entry);
  }

  async list(limit = 50): Promise<ScheduleChangeEntry[]> {
    return [...this.entries].reverse().slice(0, limit);
  }
}
