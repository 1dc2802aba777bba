import type { BotConfig } from "../schemas";
import type { SessionController } from "../bot/session-controller";
import type { RunReporter } from "../reporting/run-reporter";
import type { DownloadReconciler } from "../downloads/download-reconciler";
import type { TimeClockRecord } from "./time-clock-report";

export type WorkflowType =
  | "timesheet-download"
  | "timesheet-upload"
  | "order-details"
  | "time-clock";

export const WORKFLOW_TYPES: readonly WorkflowType[] = [
  "timesheet-download",
  "timesheet-upload",
  "order-details",
  "time-clock",
];

/** Everything a workflow needs from the run that owns it. */
export interface WorkflowDependencies {
  session: SessionController;
  botConfig: BotConfig;
  reporter: RunReporter;
  downloads: DownloadReconciler;
}

export interface TimeClockRange {
  dateFrom: string;
  dateTo: string;
  supplier: string;
}

export type TimeClockRecordsHandler = (
  records: TimeClockRecord[],
  range: TimeClockRange,
) => void | Promise<void>;

export interface WorkflowHooks {
  /** Receives the parsed time-clock report; the caller stores it. */
  onTimeClockRecords?: TimeClockRecordsHandler;
}
