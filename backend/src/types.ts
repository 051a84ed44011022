export type CareProvider = "parent_a" | "parent_b" | "nanny";

/** 15-minute index into the day: 0 = 00:00, 96 = end of day (exclusive). */
export type Slot = number;

export type IsoDate = string; // yyyy-MM-dd

export type TimeBlock = {
  readonly id: string;
  readonly date: IsoDate;
  readonly startSlot: Slot;
  readonly endSlot: Slot;
  readonly provider: CareProvider;
  readonly notes?: string;
  readonly seriesId?: string; // set on blocks materialised from a RecurrencePattern
};

export type CareWindow = { start: Slot; end: Slot };

export type DateRange = { from: IsoDate; to: IsoDate }; // inclusive

/** 0 = Sunday ... 6 = Saturday, matching date-fns getDay. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export type RecurrencePattern = {
  id: string;
  weekdays: readonly Weekday[];
  startSlot: Slot;
  endSlot: Slot;
  provider: CareProvider;
  startDate: IsoDate;
  endDate?: IsoDate;
  notes?: string;
};

export type BlockChange = { readonly original: TimeBlock; readonly proposed: TimeBlock };

export type ChangeKind =
  | { readonly kind: "retime"; readonly original: TimeBlock; readonly proposed: TimeBlock }
  | { readonly kind: "swap"; readonly first: BlockChange; readonly second: BlockChange }
  | { readonly kind: "add"; readonly proposed: TimeBlock }
  | { readonly kind: "remove"; readonly original: TimeBlock }
  | { readonly kind: "reassign"; readonly original: TimeBlock; readonly proposed: TimeBlock };

export type ChangeProposal = {
  readonly id: string;
  readonly change: ChangeKind;
  readonly description: string;
  readonly rationale?: string;
  readonly wasAISuggested: boolean;
  readonly createdAt: string;
};

export type BatchSource = "ai" | "manual";

export type ChangeBatch = {
  readonly id: string;
  readonly changes: readonly ChangeProposal[];
  readonly summary: string;
  readonly instruction?: string; // raw narration the batch was produced from
  readonly source: BatchSource;
  readonly createdAt: string;
};

export type Actor = { name: string; provider?: CareProvider };

export type CareTimeDelta = Partial<Record<CareProvider, number>>;

export type ScheduleChangeEntry = {
  readonly id: string;
  readonly timestamp: string;
  readonly actor: Actor;
  readonly batchId: string;
  readonly title: string;
  readonly narration?: string;
  readonly aiSummary?: string;
  readonly changesApplied: number;
  readonly datesImpacted: readonly IsoDate[];
  readonly careTimeDelta: CareTimeDelta;
  readonly breakdown: readonly string[];
};

export type ScheduleSettings = {
  careWindow: CareWindow;
  providerNames: Partial<Record<CareProvider, string>>;
};

export type AppliedEvent = {
  batchId: string;
  batchSummary: string;
  affectedDates: IsoDate[];
  careTimeDelta: CareTimeDelta;
};
