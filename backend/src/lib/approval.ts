import { ScheduleError } from "./errors.js";
import type { Actor, ChangeBatch } from "../types.js";

export type ApprovalState = "proposed" | "approved" | "rejected" | "applied" | "apply_failed";

export type ApprovalAction = "approve" | "reject" | "apply" | "fail";

const TRANSITIONS: Record<ApprovalState, Partial<Record<ApprovalAction, ApprovalState>>> = {
  proposed: { approve: "approved", reject: "rejected" },
  approved: { apply: "applied", fail: "apply_failed" },
  apply_failed: { approve: "approved", reject: "rejected" },
  rejected: {},
  applied: {}
};

export const isTerminal = (state: ApprovalState) => Object.keys(TRANSITIONS[state]).length === 0;

export type Transition = {
  readonly from: ApprovalState;
  readonly to: ApprovalState;
  readonly action: ApprovalAction;
  readonly at: string;
  readonly actor?: Actor;
  readonly reason?: string;
};

/**
 * Gate between a batch being proposed and it touching the schedule.
 * Approval and application are separate transitions so "approved, not
 * yet applied" is observable.
 */
export class ApprovalWorkflow {
  private current: ApprovalState = "proposed";
  private readonly transitions: Transition[] = [];
  private lastFailure: ScheduleError | undefined;

  constructor(
    readonly batch: ChangeBatch,
    private readonly now: () => Date = () => new Date()
  ) {}

  get state(): ApprovalState {
    return this.current;
  }

  get history(): readonly Transition[] {
    return this.transitions;
  }

  /** Why the last apply attempt failed, while in apply_failed. */
  get failure(): ScheduleError | undefined {
    return this.current === "apply_failed" ? this.lastFailure : undefined;
  }

  can(action: ApprovalAction): boolean {
    return TRANSITIONS[this.current][action] !== undefined;
  }

  approve(actor?: Actor): this {
    return this.transition("approve", { actor });
  }

  reject(actor?: Actor, reason?: string): this {
    return this.transition("reject", { actor, reason });
  }

  markApplied(actor?: Actor): this {
    return this.transition("apply", { actor });
  }

  markApplyFailed(error: ScheduleError, actor?: Actor): this {
    this.transition("fail", { actor, reason: error.message });
    this.lastFailure = error;
    return this;
  }

  private transition(action: ApprovalAction, extra: { actor?: Actor; reason?: string }): this {
    const to = TRANSITIONS[this.current][action];
    if (!to) {
      throw new ScheduleError("InvalidTransition", `Cannot ${action} batch ${this.batch.id} in state ${this.current}`);
    }
    this.transitions.push(
      Object.freeze({
        from: this.current,
        to,
        action,
        at: this.now().toISOString(),
        ...(extra.actor ? { actor: extra.actor } : {}),
        ...(extra.reason ? { reason: extra.reason } : {})
      })
    );
    this.current = to;
    return this;
  }

  toJSON() {
    return {
      batch: this.batch,
      state: this.current,
      history: this.transitions,
      ...(this.failure ? { failure: this.failure.toJSON() } : {})
    };
  }
}

export type BatchResult = {
  batchId: string;
  ok: boolean;
  state: ApprovalState;
  error?: ScheduleError;
};

export const DEFAULT_RETAINED_DECIDED = 50;

/**
 * Independent workflows for every batch awaiting a decision. Only the
 * most recent `retainDecided` applied or rejected workflows are kept;
 * the journal is the lasting record of what was applied.
 */
export class PendingBatches {
  private readonly items = new Map<string, ApprovalWorkflow>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly retainDecided = DEFAULT_RETAINED_DECIDED
  ) {}

  add(batch: ChangeBatch): ApprovalWorkflow {
    this.evictDecided();
    const workflow = new ApprovalWorkflow(batch, this.now);
    this.items.set(batch.id, workflow);
    return workflow;
  }

  /** Drops the oldest terminal workflows beyond the retention limit. */
  evictDecided(): void {
    const decided = [...this.items.values()].filter(w => isTerminal(w.state));
    for (const workflow of decided.slice(0, Math.max(0, decided.length - this.retainDecided))) {
      this.items.delete(workflow.batch.id);
    }
  }

  get(batchId: string): ApprovalWorkflow {
    const workflow = this.items.get(batchId);
    if (!workflow) throw new ScheduleError("NotFound", `No batch ${batchId}`);
    return workflow;
  }

  /** Workflows still needing a decision (proposed or apply_failed), oldest first. */
  pending(): ApprovalWorkflow[] {
    return this.all().filter(w => w.state === "proposed" || w.state === "apply_failed");
  }

  all(): ApprovalWorkflow[] {
    return [...this.items.values()];
  }

  rejectAll(actor?: Actor, reason?: string): BatchResult[] {
    return this.pending().map(w => {
      try {
        w.reject(actor, reason);
        return { batchId: w.batch.id, ok: true, state: w.state };
      } catch (err) {
        if (!(err instanceof ScheduleError)) throw err;
        return { batchId: w.batch.id, ok: false, state: w.state, error: err };
      }
    });
  }
}
