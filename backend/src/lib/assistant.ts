import type OpenAI from "openai";
import { toFile } from "openai";
import { formatDay, shiftDate } from "./dates.js";
import { CARE_PROVIDERS, displayName, type ProviderNames } from "./providers.js";
import { formatSlot, formatSlotRange } from "./slots.js";
import { sortedByStart } from "./store.js";
import { TOOL_DEFINITIONS } from "./tool-schema.js";
import type { RawToolCall } from "./tool-calls.js";
import type { CareWindow, IsoDate, TimeBlock } from "../types.js";

export type AssistantContext = {
  instruction: string;
  blocks: readonly TimeBlock[];
  careWindow: CareWindow;
  names: ProviderNames;
  today: IsoDate;
};

export type AssistantReply = { text: string; toolCalls: RawToolCall[] };

/** The language model behind schedule commands. Out of process and slow; always awaited. */
export interface ScheduleAssistant {
  interpret(ctx: AssistantContext, options?: { signal?: AbortSignal }): Promise<AssistantReply>;
}

export type AudioClip = { buffer: Buffer; filename: string; mimetype: string };

export interface Transcriber {
  transcribe(audio: AudioClip): Promise<string>;
}

const PROMPT_DAYS = 28;

export function buildSystemPrompt(ctx: AssistantContext): string {
  const { careWindow, names, today } = ctx;
  const lines = [
    "You are an AI assistant helping co-parents manage their childcare schedule.",
    `Today is ${formatDay(today)} (${today}).`,
    "",
    "The schedule uses 15-minute time slots (0-96 per day):",
    "- Slot 0 = 12:00 AM (midnight), slot 28 = 7:00 AM, slot 32 = 8:00 AM, slot 48 = 12:00 PM",
    "- Slot 72 = 6:00 PM, slot 78 = 7:30 PM, slot 96 = midnight (end of day)",
    "Formula: slot = hour * 4 + minute / 15. Round times like 8:10 to the nearest slot.",
    "",
    `CARE TIME WINDOW: every block MUST have start_slot >= ${careWindow.start} and end_slot <= ${careWindow.end} ` +
      `(${formatSlot(careWindow.start)} - ${formatSlot(careWindow.end)}). Time outside the window must not be scheduled.`,
    "",
    `Providers: ${CARE_PROVIDERS.map(p => `${p} (${displayName(p, names)})`).join(", ")}`,
    "",
    `Current schedule (next ${PROMPT_DAYS} days):`
  ];

  const until = shiftDate(today, PROMPT_DAYS - 1);
  const upcoming = ctx.blocks.filter(b => b.date >= today && b.date <= until);
  if (upcoming.length === 0) lines.push("(No blocks currently scheduled.)");
  const dates = [...new Set(upcoming.map(b => b.date))].sort();
  for (const date of dates) {
    lines.push(`${formatDay(date)} (${date}):`);
    for (const b of sortedByStart(upcoming.filter(x => x.date === date))) {
      const recurring = b.seriesId ? " [RECURRING]" : "";
      const notes = b.notes ? ` (${b.notes})` : "";
      lines.push(
        `  - ${displayName(b.provider, names)} [${b.provider}]: ${formatSlotRange(b.startSlot, b.endSlot)} (slots ${b.startSlot}-${b.endSlot})${recurring}${notes}`
      );
    }
  }

  lines.push(
    "",
    "Use the tools to make schedule changes and explain what you are doing in a friendly way.",
    "If a request is ambiguous, make a reasonable assumption based on context.",
    "For a weekly recurring schedule use set_weekly_schedule once with every block of the week.",
    "To override a single day call clear_day, then set_day_schedule.",
    "For simple single-block changes use change_time, add_block, remove_block, reassign_block or swap_days."
  );
  return lines.join("\n");
}

function parseArguments(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    // Left as text so validation reports the tool's input as invalid.
    return text;
  }
}

export class OpenAIScheduleAssistant implements ScheduleAssistant {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async interpret(ctx: AssistantContext, options: { signal?: AbortSignal } = {}): Promise<AssistantReply> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: buildSystemPrompt(ctx) },
          { role: "user", content: ctx.instruction }
        ],
        tools: TOOL_DEFINITIONS.map(fn => ({ type: "function" as const, function: fn })),
        tool_choice: "auto"
      },
      { signal: options.signal }
    );

    const message = completion.choices[0]?.message;
    const toolCalls = (message?.tool_calls ?? []).map(call => ({
      name: call.function.name,
      input: parseArguments(call.function.arguments)
    }));
    return { text: message?.content?.trim() ?? "", toolCalls };
  }
}

export class OpenAITranscriber implements Transcriber {
  constructor(
    private readonly client: OpenAI,
    private readonly useGpt4o: boolean
  ) {}

  async transcribe(audio: AudioClip): Promise<string> {
    const transcription = await this.client.audio.transcriptions.create({
      file: await toFile(audio.buffer, audio.filename || "command.webm", { type: audio.mimetype }),
      model: this.useGpt4o ? "gpt-4o-transcribe" : "whisper-1"
    });
    return transcription.text?.trim() ?? "";
  }
}
