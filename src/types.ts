export type SessionState =
  | "idle"
  | "initializing"
  | "logging-in"
  | "running"
  | "completed"
  | "error"
  | "stopped";

export type OutcomeCode =
  | "success"
  | "confirmed"
  | "missing-identifier"
  | "invalid-input"
  | "identifier-not-found"
  | "field-not-found"
  | "field-not-fillable"
  | "no-match"
  | "ambiguous-match"
  | "confirmation-failed"
  | "download-timeout"
  | "download-skipped"
  | "overlay-timeout"
  | "navigation-failed"
  | "unexpected-error";

export const SUCCESS_CODES: ReadonlySet<OutcomeCode> = new Set<OutcomeCode>([
  "success",
  "confirmed",
]);

export interface ItemOutcome {
  code: OutcomeCode;
  ok: boolean;
  detail: string;
  filePath?: string;
}

/**
 * `completed` and `rejected` are terminal: a later run skips them.
 * `failed` items are retried.
 */
export type ItemStatus = "pending" | "completed" | "failed" | "rejected";

export const TERMINAL_STATUSES: ReadonlySet<ItemStatus> = new Set<ItemStatus>([
  "completed",
  "rejected",
]);

export interface WorkItem<TFields> {
  readonly id: string;
  readonly fields: Readonly<TFields>;
  status: ItemStatus;
  outcome: ItemOutcome | null;
}

export function createWorkItem<TFields>(
  id: string,
  fields: TFields,
  status: ItemStatus = "pending",
): WorkItem<TFields> {
  return { id, fields: Object.freeze({ ...fields }), status, outcome: null };
}

export function isTerminal(item: WorkItem<unknown>): boolean {
  return TERMINAL_STATUSES.has(item.status);
}

export function buildOutcome(
  code: OutcomeCode,
  detail: string,
  filePath?: string,
): ItemOutcome {
  const outcome: ItemOutcome = { code, ok: SUCCESS_CODES.has(code), detail };
  if (filePath !== undefined) outcome.filePath = filePath;
  return outcome;
}

export function statusForOutcome(outcome: ItemOutcome): ItemStatus {
  if (outcome.ok) return "completed";
  if (outcome.code === "missing-identifier" || outcome.code === "invalid-input") {
    return "rejected";
  }
  return "failed";
}

export interface DownloadRecord {
  discoveredPath: string;
  fileName: string;
  detectedAt: number;
  finalPath?: string;
}

export type CollisionMode = "suffix" | "interactive";

export type ProgressSink = (
  itemId: string,
  outcomeCode: OutcomeCode,
  detail: string,
) => void;

export type LogSink = (message: string) => void;
