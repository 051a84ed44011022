import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "./app.js";
import type { AudioClip, ScheduleAssistant, Transcriber } from "./lib/assistant.js";
import { MemoryScheduleRepository } from "./lib/repository.js";
import { ScheduleService } from "./lib/schedule-service.js";
import { block, FakeAssistant, silentLogger } from "./lib/testing.js";

const mon = block("mon", "2025-03-03", 32, 48, "parent_a");
const tue = block("tue", "2025-03-04", 32, 48, "parent_b");

const moveMonday = new FakeAssistant({
  text: "Moved Monday later.",
  toolCalls: [{ name: "change_time", input: { date: "2025-03-03", provider: "parent_a", new_start_slot: 36, new_end_slot: 52 } }]
});

class FakeTranscriber implements Transcriber {
  readonly clips: AudioClip[] = [];

  async transcribe(audio: AudioClip): Promise<string> {
    this.clips.push(audio);
    return "start Monday an hour later";
  }
}

const batchId = (body: unknown) => z.object({ batch: z.object({ id: z.string() }) }).parse(body).batch.id;

let server: Server;
let base: string;
let service: ScheduleService;
let transcriber: FakeTranscriber;

async function start(assistant: ScheduleAssistant | null) {
  const repo = new MemoryScheduleRepository({ blocks: [mon, tue] });
  service = await ScheduleService.open({
    repository: repo,
    journal: repo,
    policies: { aiCareWindow: "reject", manualCareWindow: "clamp", overlap: "reject" },
    balanceThresholdHours: 4,
    logger: silentLogger(),
    now: () => new Date("2025-03-03T08:00:00Z")
  });
  transcriber = new FakeTranscriber();
  const app = createApp({ service, assistant, transcriber: assistant ? transcriber : null });
  await new Promise<void>(resolve => {
    server = app.listen(0, "127.0.0.1", () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server did not bind to a port");
  base = `http://127.0.0.1:${address.port}`;
}

async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? undefined : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

describe("HTTP API", () => {
  beforeEach(async () => {
    await start(moveMonday);
  });

  it("reports health", async () => {
    expect(await call("GET", "/health")).toEqual({ status: 200, body: { ok: true, version: 0, assistant: true } });
  });

  it("filters blocks", async () => {
    expect((await call("GET", "/blocks?date=2025-03-04")).body).toEqual({ version: 0, blocks: [tue] });
    expect((await call("GET", "/blocks?provider=parent_a")).body).toEqual({ version: 0, blocks: [mon] });
    const bad = await call("GET", "/blocks?from=2025-03-04");
    expect(bad.status).toBe(400);
    expect(bad.body).toMatchObject({ error: { code: "InvalidRange" } });
  });

  it("reports the care balance", async () => {
    const { status, body } = await call("GET", "/balance");
    expect(status).toBe(200);
    expect(body).toMatchObject({ hoursByProvider: { parent_a: 4, parent_b: 4, nanny: 0 }, isBalanced: true, gapText: null });
  });

  it("runs a manual batch from proposal to journal", async () => {
    const created = await call("POST", "/batches", {
      summary: "Nanny covers Monday",
      changes: [{ change: { kind: "reassign", original: mon, proposed: { ...mon, provider: "nanny" } } }]
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ state: "proposed", batch: { summary: "Nanny covers Monday", source: "manual" } });
    const id = batchId(created.body);

    expect((await call("GET", "/batches")).body).toMatchObject({ batches: [{ batch: { id } }] });

    const applied = await call("POST", `/batches/${id}/approve`, { apply: true, actor: { name: "Sam", provider: "parent_a" } });
    expect(applied.status).toBe(200);
    expect(applied.body).toMatchObject({ ok: true, state: "applied", applied: 1 });

    expect((await call("GET", "/blocks?date=2025-03-03")).body).toEqual({ version: 1, blocks: [{ ...mon, provider: "nanny" }] });
    expect((await call("GET", "/journal?limit=5")).body).toMatchObject({
      entries: [{ title: "Caregiver 1 updated the schedule", changesApplied: 1, breakdown: ["~ Mon, Mar 3 8:00 AM - 12:00 PM: Caregiver 1 → Nanny"] }]
    });
    expect((await call("GET", "/batches")).body).toEqual({ batches: [] });
  });

  it("rejects a malformed batch", async () => {
    const res = await call("POST", "/batches", { changes: [] });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "ValidationFailed" } });
  });

  it("maps engine failures to status codes", async () => {
    const ghost = block("ghost", "2025-03-05", 32, 36);
    const created = await call("POST", "/batches", { changes: [{ change: { kind: "remove", original: ghost } }] });
    const id = batchId(created.body);

    expect((await call("POST", `/batches/${id}/apply`, {})).status).toBe(409);

    await call("POST", `/batches/${id}/approve`, {});
    const failed = await call("POST", `/batches/${id}/apply`, {});
    expect(failed.status).toBe(422);
    expect(failed.body).toMatchObject({ batchId: id, state: "apply_failed", error: { code: "ApplyFailed", proposalIndex: 0 } });

    expect((await call("POST", "/batches/unknown/reject", {})).status).toBe(404);
  });

  it("cancels a pending batch", async () => {
    const created = await call("POST", "/batches", { changes: [{ change: { kind: "remove", original: tue } }] });
    const id = batchId(created.body);
    const res = await call("POST", `/batches/${id}/cancel`, {});
    expect(res.body).toMatchObject({ state: "rejected", history: [{ action: "reject", reason: "cancelled", actor: { name: "anonymous" } }] });
  });

  it("rejects all pending batches", async () => {
    await call("POST", "/batches", { changes: [{ change: { kind: "remove", original: tue } }] });
    const res = await call("POST", "/batches/reject-all", { reason: "start over" });
    expect(res.body).toMatchObject({ results: [{ ok: true, state: "rejected" }] });
  });

  it("updates the care window", async () => {
    expect(await call("PUT", "/settings/care-window", { start: 32, end: 72 })).toEqual({
      status: 200,
      body: { careWindow: { start: 32, end: 72 }, hoursPerDay: 10 }
    });
    const bad = await call("PUT", "/settings/care-window", { start: 72, end: 32 });
    expect(bad.status).toBe(400);
    expect((await call("GET", "/settings/care-window")).body).toEqual({ careWindow: { start: 32, end: 72 }, hoursPerDay: 10 });
  });

  it("renames providers", async () => {
    const res = await call("PUT", "/settings/provider-names", { parent_b: "Alex" });
    expect(res.body).toEqual({ providerNames: { parent_b: "Alex" } });
    expect((await call("GET", "/providers")).body).toEqual({
      providers: [
        { id: "parent_a", displayName: "Caregiver 1", color: "#5957D6" },
        { id: "parent_b", displayName: "Alex", color: "#E6943A" },
        { id: "nanny", displayName: "Nanny", color: "#6BAD91" }
      ]
    });
  });

  it("materialises a recurring series", async () => {
    const pattern = { id: "pickup", weekdays: [2], startSlot: 60, endSlot: 72, provider: "nanny", startDate: "2025-03-01" };
    const res = await call("POST", "/series", { pattern, range: { from: "2025-03-03", to: "2025-03-16" } });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ batch: { summary: "Update recurring series pickup", changes: [{ change: { kind: "add" } }, { change: { kind: "add" } }] } });
  });

  it("turns a text instruction into a pending AI batch", async () => {
    const res = await call("POST", "/assistant", { instruction: "start Monday an hour later" });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ state: "proposed", batch: { source: "ai", summary: "Moved Monday later.", instruction: "start Monday an hour later" } });
  });

  it("transcribes an uploaded voice command", async () => {
    const form = new FormData();
    form.append("audio", new Blob([Buffer.from("fake-audio")], { type: "audio/webm" }), "command.webm");
    const res = await fetch(`${base}/voice-intent`, { method: "POST", body: form });
    expect(res.status).toBe(201);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ transcript: "start Monday an hour later", state: "proposed", batch: { source: "ai" } });
    expect(transcriber.clips[0]).toMatchObject({ filename: "command.webm", mimetype: "audio/webm" });
  });

  it("asks for audio when none was uploaded", async () => {
    const res = await call("POST", "/voice-intent", {});
    expect(res).toEqual({ status: 400, body: { error: { code: "NoAudio", message: "No audio uploaded" } } });
  });
});

describe("HTTP API without an assistant", () => {
  beforeEach(async () => {
    await start(null);
  });

  it("answers 503 for assistant requests", async () => {
    const res = await call("POST", "/assistant", { instruction: "swap Monday and Tuesday" });
    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ error: { code: "NotConfigured" } });
  });
});
