import { timesheetDownloadFieldsSchema } from "../schemas";
import type { TimesheetDownloadFields, TimesheetDownloadInput } from "../schemas";
import type { ItemOutcome } from "../types";
import { WorkflowExecutor } from "./workflow-executor";
import {
  REPORT_MENU,
  TIMESHEET_EXPORT,
  TIMESHEET_MENU,
  TS_DATE_FROM,
  TS_ORDER_NUMBER,
  TS_ORDER_POSITION,
} from "./portal-locators";

/** Report → Timesheet: one Excel export per order/position, saved as `<order>[-<position>].xlsx`. */
export class TimesheetDownloadWorkflow extends WorkflowExecutor<
  TimesheetDownloadInput,
  TimesheetDownloadFields
> {
  readonly type = "timesheet-download" as const;
  readonly title = "Scarico TS";
  protected readonly schema = timesheetDownloadFieldsSchema;

  protected missingIdentifier(input: Readonly<TimesheetDownloadInput>): string | null {
    return input.orderNumber.trim() ? null : "Numero OdA mancante";
  }

  protected async setup(): Promise<void> {
    await this.openSection([REPORT_MENU, TIMESHEET_MENU]);
    this.session.throwIfStopRequested();
    await this.selectSupplier(this.botConfig.supplier, true);

    if (this.botConfig.dateFrom) {
      const dateFrom = this.requireDate(this.botConfig.dateFrom, "data inizio");
      this.reporter.log(`Inserimento data da: ${dateFrom}`);
      await this.navigator.fillField(TS_DATE_FROM, dateFrom);
    }
  }

  protected async process(fields: TimesheetDownloadFields): Promise<ItemOutcome> {
    const { orderNumber, position } = fields;
    this.reporter.log(`➡️ OdA ${orderNumber}${position ? ` posizione ${position}` : ""}`);

    await this.navigator.fillField(TS_ORDER_NUMBER, orderNumber);
    await this.navigator.fillField(TS_ORDER_POSITION, position);
    await this.search("ricerca timesheet");

    const stored = await this.downloadExport(
      TIMESHEET_EXPORT,
      position ? `${orderNumber}-${position}` : orderNumber,
    );
    return this.downloadOutcome(stored);
  }
}
