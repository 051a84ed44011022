import { vi } from "vitest";
import type { AssistantContext, AssistantReply, ScheduleAssistant } from "./assistant.js";
import type { Logger } from "./log.js";
import type { CareProvider, IsoDate, TimeBlock } from "../types.js";

export function block(id: string, date: IsoDate, startSlot: number, endSlot: number, provider: CareProvider = "parent_a"): TimeBlock {
  return { id, date, startSlot, endSlot, provider };
}

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Replies with a fixed answer and records what it was asked. */
export class FakeAssistant implements ScheduleAssistant {
  readonly contexts: AssistantContext[] = [];

  constructor(private readonly reply: AssistantReply) {}

  async interpret(ctx: AssistantContext): Promise<AssistantReply> {
    this.contexts.push(ctx);
    return this.reply;
  }
}
