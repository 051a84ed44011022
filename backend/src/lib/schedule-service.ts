import { ApprovalWorkflow, PendingBatches, type ApprovalState, type BatchResult } from "./approval.js";
import type { ScheduleAssistant } from "./assistant.js";
import { applyBatch, batchDates, createBatch, summarize, type ApplyOutcome, type CareWindowPolicy, type OverlapPolicy } from "./batch.js";
import { careBalance, careTimeDelta, hoursByProvider, scaledThreshold, type CareBalanceReport, type HoursByProvider } from "./balance.js";
import { toIsoDate } from "./dates.js";
import { AssistantError, InvariantViolation, ScheduleError } from "./errors.js";
import { createJournalEntry } from "./journal.js";
import { createLogger, type Logger } from "./log.js";
import { validateProposal } from "./proposals.js";
import { seriesChanges } from "./recurrence.js";
import type { JournalRepository, ScheduleRepository } from "./repository.js";
import { DEFAULT_CARE_WINDOW, validateCareWindow } from "./slots.js";
import { overlappingPairs, TimeBlockStore } from "./store.js";
import { translateToolCalls } from "./tool-calls.js";
import type {
  Actor,
  AppliedEvent,
  BatchSource,
  CareProvider,
  CareWindow,
  ChangeProposal,
  DateRange,
  ScheduleChangeEntry,
  ScheduleSettings,
  RecurrencePattern,
  TimeBlock
} from "../types.js";

export type ServiceOptions = {
  repository: ScheduleRepository;
  journal: JournalRepository;
  policies: { aiCareWindow: CareWindowPolicy; manualCareWindow: CareWindowPolicy; overlap: OverlapPolicy };
  /** Allowed A/B difference per week. */
  balanceThresholdHours: number;
  /** Used when the repository holds no settings yet. */
  defaultCareWindow?: CareWindow;
  /** Applied or rejected batches kept for listing; older ones are dropped. */
  retainDecidedBatches?: number;
  logger?: Logger;
  now?: () => Date;
};

export type ApplyResult =
  | {
      ok: true;
      batchId: string;
      state: "applied";
      applied: number;
      displaced: TimeBlock[];
      entry: ScheduleChangeEntry;
      event: AppliedEvent;
    }
  | { ok: false; batchId: string; state: ApprovalState; error: ScheduleError };

export type AppliedListener = (event: AppliedEvent) => void;

const SYSTEM: Actor = { name: "system" };

/**
 * Owns the store, the pending batches and the settings, and runs the
 * propose -> approve -> apply flow against the repository.
 */
export class ScheduleService {
  readonly store: TimeBlockStore;
  private readonly batches: PendingBatches;
  private readonly listeners = new Set<AppliedListener>();
  private readonly log: Logger;
  private readonly now: () => Date;
  private balanceCache: { key: string; report: CareBalanceReport } | null = null;

  private constructor(
    private readonly options: ServiceOptions,
    blocks: TimeBlock[],
    private settings: ScheduleSettings
  ) {
    this.log = options.logger ?? createLogger("schedule");
    this.now = options.now ?? (() => new Date());
    this.store = new TimeBlockStore(blocks, this.log);
    this.batches = new PendingBatches(this.now, options.retainDecidedBatches);
  }

  static async open(options: ServiceOptions): Promise<ScheduleService> {
    const [blocks, saved] = await Promise.all([options.repository.load(), options.repository.loadSettings()]);
    const settings: ScheduleSettings = saved ?? {
      careWindow: validateCareWindow(options.defaultCareWindow ?? DEFAULT_CARE_WINDOW),
      providerNames: {}
    };
    const service = new ScheduleService(options, blocks, settings);
    service.log.info(`Loaded ${blocks.length} blocks`);
    const overlaps = overlappingPairs(blocks);
    if (overlaps.length > 0) {
      service.log.warn(`Loaded schedule has ${overlaps.length} overlapping block pair(s); see GET /blocks/overlaps`);
    }
    return service;
  }

  // Settings

  get careWindow(): CareWindow {
    return this.settings.careWindow;
  }

  get providerNames(): ScheduleSettings["providerNames"] {
    return this.settings.providerNames;
  }

  async setCareWindow(window: CareWindow): Promise<CareWindow> {
    const careWindow = validateCareWindow(window);
    await this.saveSettings({ ...this.settings, careWindow });
    return careWindow;
  }

  async resetCareWindow(): Promise<CareWindow> {
    return this.setCareWindow(this.options.defaultCareWindow ?? DEFAULT_CARE_WINDOW);
  }

  async setProviderName(provider: CareProvider, name: string): Promise<void> {
    const providerNames = { ...this.settings.providerNames };
    if (name.trim()) providerNames[provider] = name.trim();
    else delete providerNames[provider];
    await this.saveSettings({ ...this.settings, providerNames });
  }

  private async saveSettings(next: ScheduleSettings): Promise<void> {
    await this.options.repository.saveSettings(next);
    this.settings = next;
  }

  // Batches

  /** Registers a batch in state proposed. Every proposal must pass validation. */
  submit(input: { changes: readonly ChangeProposal[]; summary?: string; instruction?: string; source: BatchSource }): ApprovalWorkflow {
    for (const [index, proposal] of input.changes.entries()) {
      const result = validateProposal(proposal);
      if (!result.ok) {
        throw new ScheduleError("InvalidProposal", result.error.message, { proposalIndex: index, proposalId: proposal.id });
      }
    }
    const batch = createBatch({ ...input, now: this.now() });
    const workflow = this.batches.add(batch);
    this.log.info(`Batch ${batch.id} proposed (${input.source}): ${summarize(batch)}`);
    return workflow;
  }

  batch(batchId: string): ApprovalWorkflow {
    return this.batches.get(batchId);
  }

  pendingBatches(): ApprovalWorkflow[] {
    return this.batches.pending();
  }

  allBatches(): ApprovalWorkflow[] {
    return this.batches.all();
  }

  approve(batchId: string, actor: Actor = SYSTEM): ApprovalWorkflow {
    return this.batches.get(batchId).approve(actor);
  }

  reject(batchId: string, actor: Actor = SYSTEM, reason?: string): ApprovalWorkflow {
    return this.batches.get(batchId).reject(actor, reason);
  }

  /** Discards a batch that has not been approved. */
  cancel(batchId: string, actor: Actor = SYSTEM): ApprovalWorkflow {
    return this.reject(batchId, actor, "cancelled");
  }

  /**
   * Applies an approved batch under the store's single-writer lock. The
   * store and repository are untouched unless every proposal succeeds.
   */
  async apply(batchId: string, actor: Actor = SYSTEM, options: { onBusy?: "queue" | "fail" } = {}): Promise<ApplyResult> {
    const workflow = this.batches.get(batchId);
    if (!workflow.can("apply")) {
      throw new ScheduleError("InvalidTransition", `Cannot apply batch ${batchId} in state ${workflow.state}`);
    }
    const { batch } = workflow;
    const careWindowPolicy = batch.source === "ai" ? this.options.policies.aiCareWindow : this.options.policies.manualCareWindow;

    let applied: { outcome: ApplyOutcome; before: HoursByProvider; after: HoursByProvider };
    try {
      applied = await this.store.mutate(
        current => {
          const result = applyBatch(batch, current, {
            careWindow: this.settings.careWindow,
            careWindowPolicy,
            overlapPolicy: this.options.policies.overlap
          });
          if (!result.ok) throw result.error;
          return {
            blocks: result.value.blocks,
            result: { outcome: result.value, before: hoursByProvider(current), after: hoursByProvider(result.value.blocks) }
          };
        },
        { onBusy: options.onBusy, persist: blocks => this.options.repository.save(blocks) }
      );
    } catch (err) {
      if (err instanceof InvariantViolation) throw err;
      if (err instanceof ScheduleError && err.code === "StoreBusy") {
        return { ok: false, batchId, state: workflow.state, error: err };
      }
      const failure =
        err instanceof ScheduleError
          ? new ScheduleError("ApplyFailed", `Batch ${batchId} was not applied: ${err.message}`, { ...err.details, cause: err })
          : new ScheduleError("ApplyFailed", `Batch ${batchId} was not applied: ${err instanceof Error ? err.message : String(err)}`);
      workflow.markApplyFailed(failure, actor);
      this.log.warn(failure.message);
      return { ok: false, batchId, state: workflow.state, error: failure };
    }

    workflow.markApplied(actor);
    const delta = careTimeDelta(applied.before, applied.after);
    const entry = createJournalEntry({ batch, actor, careTimeDelta: delta, names: this.settings.providerNames, now: this.now() });
    try {
      await this.options.journal.append(entry);
    } catch (err) {
      this.log.error(`Batch ${batchId} applied but journal entry was not written:`, err);
    }

    const event: AppliedEvent = { batchId, batchSummary: summarize(batch), affectedDates: batchDates(batch), careTimeDelta: delta };
    this.emit(event);
    this.log.info(`Batch ${batchId} applied: ${applied.outcome.applied} changes, ${applied.outcome.displaced.length} displaced`);
    return {
      ok: true,
      batchId,
      state: "applied",
      applied: applied.outcome.applied,
      displaced: applied.outcome.displaced,
      entry,
      event
    };
  }

  /** The single user gesture of the review screen: approve, then apply straight away. */
  async approveAndApply(batchId: string, actor: Actor = SYSTEM): Promise<ApplyResult> {
    this.approve(batchId, actor);
    return this.apply(batchId, actor);
  }

  /** Approves (and by default applies) every pending batch, one at a time. */
  async approveAll(actor: Actor = SYSTEM, options: { apply?: boolean } = {}): Promise<BatchResult[]> {
    const results: BatchResult[] = [];
    for (const workflow of this.batches.pending()) {
      const batchId = workflow.batch.id;
      try {
        workflow.approve(actor);
      } catch (err) {
        if (!(err instanceof ScheduleError)) throw err;
        results.push({ batchId, ok: false, state: workflow.state, error: err });
        continue;
      }
      if (options.apply === false) {
        results.push({ batchId, ok: true, state: workflow.state });
        continue;
      }
      const outcome = await this.apply(batchId, actor);
      results.push(outcome.ok ? { batchId, ok: true, state: outcome.state } : { batchId, ok: false, state: outcome.state, error: outcome.error });
    }
    return results;
  }

  rejectAll(actor: Actor = SYSTEM, reason?: string): BatchResult[] {
    return this.batches.rejectAll(actor, reason);
  }

  // Recurrence

  /**
   * Proposes the changes that make the store match `pattern` inside
   * `within`. Returns null when the series is already up to date.
   */
  materializeSeries(pattern: RecurrencePattern, within: DateRange): ApprovalWorkflow | null {
    const changes = seriesChanges(pattern, within, this.store.blocks, { names: this.settings.providerNames, now: this.now() });
    if (changes.length === 0) return null;
    return this.submit({ changes, summary: `Update recurring series ${pattern.id}`, source: "manual" });
  }

  // AI proposals

  /**
   * Asks the assistant for changes and registers them as a pending batch.
   * Aborting before the reply discards it; aborting afterwards rejects the
   * batch unless it was already approved.
   */
  async requestProposal(
    instruction: string,
    assistant: ScheduleAssistant,
    options: { signal?: AbortSignal; actor?: Actor } = {}
  ): Promise<ApprovalWorkflow> {
    const { signal, actor = SYSTEM } = options;
    signal?.throwIfAborted();
    const today = toIsoDate(this.now());
    const reply = await assistant.interpret(
      { instruction, blocks: this.store.blocks, careWindow: this.settings.careWindow, names: this.settings.providerNames, today },
      { signal }
    );
    signal?.throwIfAborted();

    const changes = translateToolCalls(reply.toolCalls, { blocks: this.store.blocks, today, names: this.settings.providerNames });
    if (changes.length === 0) {
      throw new AssistantError("NoActionFound", "I couldn't understand that request. Please try rephrasing.");
    }
    const workflow = this.submit({ changes, summary: reply.text, instruction, source: "ai" });
    signal?.addEventListener(
      "abort",
      () => {
        if (workflow.state === "proposed") this.cancel(workflow.batch.id, actor);
      },
      { once: true }
    );
    return workflow;
  }

  // Derived data

  /** Care balance over `range` (or the whole schedule), recomputed after every commit. */
  balance(range?: DateRange): CareBalanceReport {
    const { careWindow } = this.settings;
    const key = `${this.store.version}|${range?.from ?? ""}|${range?.to ?? ""}|${careWindow.start}-${careWindow.end}`;
    if (this.balanceCache?.key === key) return this.balanceCache.report;

    const blocks = range ? this.store.blocksInRange(range) : this.store.blocks;
    const span = range ?? spanOf(blocks);
    const report = careBalance(blocks, {
      thresholdHours: scaledThreshold(this.options.balanceThresholdHours, span),
      careWindow
    });
    this.balanceCache = { key, report };
    return report;
  }

  async journalEntries(limit?: number): Promise<ScheduleChangeEntry[]> {
    return this.options.journal.list(limit);
  }

  onApplied(listener: AppliedListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: AppliedEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error("Applied-event listener failed:", err);
      }
    }
  }
}

function spanOf(blocks: readonly TimeBlock[]): DateRange | undefined {
  if (blocks.length === 0) return undefined;
  const dates = blocks.map(b => b.date).sort();
  return { from: dates[0], to: dates[dates.length - 1] };
}
