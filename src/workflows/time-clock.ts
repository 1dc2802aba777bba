import { promises as fsp } from "fs";
import path from "path";
import { ItemFailure, describeError } from "../errors";
import { timeClockFieldsSchema } from "../schemas";
import type { TimeClockFields, TimeClockInput } from "../schemas";
import { buildOutcome } from "../types";
import type { ItemOutcome } from "../types";
import { WorkflowExecutor } from "./workflow-executor";
import type { TimeClockRecordsHandler, WorkflowDependencies } from "./workflow-types";
import { parseTimeClockReport } from "./time-clock-report";
import {
  REPORT_MENU,
  TC_DATE_FROM,
  TC_DATE_TO,
  TC_PRESENCE_FLAG,
  TIME_CLOCK_EXPORT,
  TIME_CLOCK_MENU,
} from "./portal-locators";

const compactDate = (date: string) => date.split(".").reverse().join("");

/**
 * Report → Timbrature: exports the badge report of each date range and hands
 * the parsed records to the caller. Each item is one range.
 */
export class TimeClockWorkflow extends WorkflowExecutor<TimeClockInput, TimeClockFields> {
  readonly type = "time-clock" as const;
  readonly title = "Timbrature";
  protected readonly schema = timeClockFieldsSchema;

  constructor(
    deps: WorkflowDependencies,
    private readonly onRecords?: TimeClockRecordsHandler,
  ) {
    super(deps);
  }

  protected withDefaults(input: Readonly<TimeClockInput>): Readonly<TimeClockInput> {
    return {
      ...input,
      dateFrom: input.dateFrom?.trim() || this.botConfig.dateFrom,
      dateTo: input.dateTo?.trim() || this.botConfig.dateTo,
    };
  }

  protected missingIdentifier(input: Readonly<TimeClockInput>): string | null {
    if (!input.dateFrom) return "Data inizio mancante";
    if (!input.dateTo) return "Data fine mancante";
    return null;
  }

  protected async setup(): Promise<void> {
    await this.openSection([REPORT_MENU, TIME_CLOCK_MENU]);
  }

  protected async process(fields: TimeClockFields): Promise<ItemOutcome> {
    const supplier = fields.supplier || this.botConfig.supplier;
    const { dateFrom, dateTo } = fields;
    this.reporter.log(`🚀 Recupero timbrature ${dateFrom} - ${dateTo}${supplier ? ` (${supplier})` : ""}`);

    await this.selectSupplier(supplier, false);
    await this.navigator.fillField(TC_DATE_FROM, dateFrom);
    await this.navigator.fillField(TC_DATE_TO, dateTo);
    await this.navigator.setCheckbox(TC_PRESENCE_FLAG, true);
    await this.search("ricerca timbrature");

    const stored = await this.downloadExport(
      TIME_CLOCK_EXPORT,
      `timbrature_${compactDate(dateFrom)}_${compactDate(dateTo)}`,
    );
    const report = parseTimeClockReport(await fsp.readFile(stored.finalPath));
    if (report.missingColumns.length > 0) {
      throw new ItemFailure(
        "no-match",
        `Colonne mancanti nel report: ${report.missingColumns.join(", ")}`,
      );
    }

    const detail = `${report.records.length} timbrature (${report.duplicates} duplicati)`;
    if (!this.onRecords) {
      return buildOutcome("success", detail, stored.finalPath);
    }

    try {
      await this.onRecords(report.records, { dateFrom, dateTo, supplier });
    } catch (error) {
      // the report stays on disk for a manual import
      throw new ItemFailure(
        "confirmation-failed",
        `Salvataggio timbrature non riuscito: ${describeError(error)}`,
      );
    }

    if (this.botConfig.discardTimeClockReport) {
      await this.downloads.discard(stored.finalPath);
      this.reporter.log(`🗑️ Report ${path.basename(stored.finalPath)} eliminato`);
      return buildOutcome("success", detail);
    }
    return buildOutcome("success", detail, stored.finalPath);
  }
}
