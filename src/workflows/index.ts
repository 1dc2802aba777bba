import type {
  OrderDetailsInput,
  TimeClockInput,
  TimesheetDownloadInput,
  TimesheetUploadInput,
} from "../schemas";
import { OrderDetailsWorkflow } from "./order-details";
import { TimeClockWorkflow } from "./time-clock";
import { TimesheetDownloadWorkflow } from "./timesheet-download";
import { TimesheetUploadWorkflow } from "./timesheet-upload";
import { WorkflowExecutor } from "./workflow-executor";
import type { WorkflowDependencies, WorkflowHooks, WorkflowType } from "./workflow-types";

export interface WorkflowInputs {
  "timesheet-download": TimesheetDownloadInput;
  "timesheet-upload": TimesheetUploadInput;
  "order-details": OrderDetailsInput;
  "time-clock": TimeClockInput;
}

type WorkflowFactories = {
  [K in WorkflowType]: (
    deps: WorkflowDependencies,
    hooks: WorkflowHooks,
  ) => WorkflowExecutor<WorkflowInputs[K], unknown>;
};

const WORKFLOW_FACTORIES: WorkflowFactories = {
  "timesheet-download": (deps) => new TimesheetDownloadWorkflow(deps),
  "timesheet-upload": (deps) => new TimesheetUploadWorkflow(deps),
  "order-details": (deps) => new OrderDetailsWorkflow(deps),
  "time-clock": (deps, hooks) => new TimeClockWorkflow(deps, hooks.onTimeClockRecords),
};

export function createWorkflow<K extends WorkflowType>(
  type: K,
  deps: WorkflowDependencies,
  hooks: WorkflowHooks = {},
): WorkflowExecutor<WorkflowInputs[K], unknown> {
  return WORKFLOW_FACTORIES[type](deps, hooks);
}

export { WorkflowExecutor };
export { TimesheetDownloadWorkflow } from "./timesheet-download";
export { TimesheetUploadWorkflow } from "./timesheet-upload";
export { OrderDetailsWorkflow } from "./order-details";
export { TimeClockWorkflow } from "./time-clock";
export { parseTimeClockReport, normalizeReportDate, normalizeReportTime, TIME_CLOCK_COLUMNS } from "./time-clock-report";
export type { TimeClockParseResult, TimeClockRecord } from "./time-clock-report";
export { WORKFLOW_TYPES } from "./workflow-types";
export type {
  TimeClockRange,
  TimeClockRecordsHandler,
  WorkflowDependencies,
  WorkflowHooks,
  WorkflowType,
} from "./workflow-types";
