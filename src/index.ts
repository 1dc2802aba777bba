export { startWorkflowRun } from "./runner/bot-runner";
export type { RunHandle, RunResult, WorkflowRunOptions } from "./runner/bot-runner";

export {
  createWorkflow,
  OrderDetailsWorkflow,
  TimeClockWorkflow,
  TimesheetDownloadWorkflow,
  TimesheetUploadWorkflow,
  WorkflowExecutor,
  WORKFLOW_TYPES,
  parseTimeClockReport,
} from "./workflows";
export type {
  TimeClockRange,
  TimeClockRecord,
  TimeClockRecordsHandler,
  WorkflowDependencies,
  WorkflowHooks,
  WorkflowInputs,
  WorkflowType,
} from "./workflows";

export { SessionController } from "./bot/session-controller";
export type { SessionHealth, SessionTiming } from "./bot/session-controller";
export { PageNavigator } from "./bot/page-navigator";
export { byAttribute, byIdPattern, byName, byRole, byText, chain } from "./bot/locators";
export type { LocatorChain, LocatorStrategy } from "./bot/locators";
export type { ElementSnapshot, PageDriver } from "./bot/page-driver";
export { launchPortalBrowser } from "./bot/browser-launcher";
export type { BrowserLauncher, BrowserLaunchSettings } from "./bot/browser-launcher";
export { acquireProfileLock } from "./bot/profile-lock";
export { waitForCondition, waitForNewFile, waitForOverlayCleared } from "./bot/wait-primitives";

export { DownloadReconciler } from "./downloads/download-reconciler";
export { InputChannel } from "./reporting/input-channel";
export type { InputRequest } from "./reporting/input-channel";
export { RunReporter } from "./reporting/run-reporter";
export type { ReporterSinks, RunSummary } from "./reporting/run-reporter";

export { Credentials } from "./credentials";
export { BotStopError, FatalBotError, ItemFailure, OverlayTimeoutError } from "./errors";
export type { FatalReason } from "./errors";
export { FATAL_MESSAGES, OUTCOME_MESSAGES, formatOutcome } from "./error-messages";
export { botConfigSchema, parseBotConfig } from "./schemas";
export type { BotConfig, BotConfigInput } from "./schemas";
export { createWorkItem, isTerminal } from "./types";
export type {
  DownloadRecord,
  ItemOutcome,
  ItemStatus,
  OutcomeCode,
  SessionState,
  WorkItem,
} from "./types";
export { logger } from "./logger";
