import { logger } from "../logger";
import { ItemFailure } from "../errors";
import { chain } from "../bot/locators";
import { timesheetUploadFieldsSchema } from "../schemas";
import type { TimesheetUploadFields, TimesheetUploadInput } from "../schemas";
import { buildOutcome } from "../types";
import type { ItemOutcome } from "../types";
import { WorkflowExecutor } from "./workflow-executor";
import {
  CONFIRM_BUTTON,
  CONFIRMATION_MESSAGE,
  EXTRACT_ORDER_BUTTON,
  ORDER_NOT_FOUND_MESSAGE,
  POPUP_CLOSE,
  SEARCH_WORKER_BUTTON,
  TIMESHEET_MANAGEMENT_MENU,
  TIMESHEET_MENU,
  UPLOAD_ATTACHMENT,
  UPLOAD_ENTRY_TIME,
  UPLOAD_EXIT_TIME,
  UPLOAD_FORM_READY,
  UPLOAD_HOURS,
  UPLOAD_ORDER_FIELD,
  UPLOAD_POSITION,
  UPLOAD_SERVICE_TYPE,
  UPLOAD_TAX_CODE,
  UPLOAD_WORK_DATE,
  isGridRow,
} from "./portal-locators";

// The not-found message is checked first: the previous order's form may still be on screen
const EXTRACTION_RESULT = chain(
  "esito estrazione OdA",
  ...ORDER_NOT_FOUND_MESSAGE.strategies,
  ...UPLOAD_FORM_READY.strategies,
);

/**
 * Timesheet → Gestione Timesheet: enters one worker day per item. The order
 * is extracted once for consecutive items on the same order.
 */
export class TimesheetUploadWorkflow extends WorkflowExecutor<
  TimesheetUploadInput,
  TimesheetUploadFields
> {
  readonly type = "timesheet-upload" as const;
  readonly title = "Carico TS";
  protected readonly schema = timesheetUploadFieldsSchema;

  protected missingIdentifier(input: Readonly<TimesheetUploadInput>): string | null {
    if (!input.orderNumber?.trim()) return "Numero OdA mancante";
    if (!input.taxCode?.trim()) return "Codice Fiscale mancante";
    return null;
  }

  protected async setup(): Promise<void> {
    await this.openSection([TIMESHEET_MENU, TIMESHEET_MANAGEMENT_MENU]);
    this.session.throwIfStopRequested();
    await this.selectSupplier(this.botConfig.supplier, true);
  }

  protected contextKeyOf(fields: TimesheetUploadFields): string {
    return fields.orderNumber;
  }

  protected async prepareContext(fields: TimesheetUploadFields): Promise<void> {
    const { orderNumber } = fields;
    this.reporter.log(`Estrazione OdA ${orderNumber}...`);
    await this.navigator.fillFieldByHint(UPLOAD_ORDER_FIELD, orderNumber);
    await this.clickOrFail(EXTRACT_ORDER_BUTTON);
    await this.waitOverlay("estrai OdA", "hard");

    const result = await this.navigator.waitFor(EXTRACTION_RESULT);
    if (!result || result.strategyIndex < ORDER_NOT_FOUND_MESSAGE.strategies.length) {
      await this.navigator.clickIfPresent(POPUP_CLOSE);
      throw new ItemFailure("identifier-not-found", `OdA ${orderNumber} non trovata`);
    }
    this.reporter.log(`✓ OdA ${orderNumber} estratta`);
  }

  protected async process(fields: TimesheetUploadFields): Promise<ItemOutcome> {
    const navigator = this.navigator;
    const { taxCode, workDate } = fields;
    this.reporter.log(`➡️ ${taxCode} ${workDate} (OdA ${fields.orderNumber})`);

    if (fields.attachmentPath) {
      await navigator.attachFile(UPLOAD_ATTACHMENT, fields.attachmentPath);
    }
    if (fields.position) await navigator.fillFieldByHint(UPLOAD_POSITION, fields.position);
    await navigator.fillFieldByHint(UPLOAD_WORK_DATE, workDate);
    if (fields.entryTime) await navigator.fillFieldByHint(UPLOAD_ENTRY_TIME, fields.entryTime);
    if (fields.exitTime) await navigator.fillFieldByHint(UPLOAD_EXIT_TIME, fields.exitTime);
    if (fields.serviceType) {
      await navigator.fillFieldByHint(UPLOAD_SERVICE_TYPE, fields.serviceType);
    }
    if (fields.hours) await navigator.fillFieldByHint(UPLOAD_HOURS, fields.hours);

    await navigator.fillField(UPLOAD_TAX_CODE, taxCode);
    await this.search("ricerca risorsa", SEARCH_WORKER_BUTTON);

    const matches = await navigator.findAll(
      (element) => isGridRow(element) && element.text.toUpperCase().includes(taxCode),
    );
    if (matches.length === 0) {
      throw new ItemFailure("no-match", `Nessuna risorsa con codice fiscale ${taxCode}`);
    }
    if (matches.length > 1) {
      throw new ItemFailure(
        "ambiguous-match",
        `${matches.length} risorse con codice fiscale ${taxCode}`,
      );
    }
    await navigator.page.click(matches[0].ref);
    logger.debug(`[Upload] Selected worker row ${matches[0].ref}`);

    if (!(await navigator.click(CONFIRM_BUTTON))) {
      throw new ItemFailure("confirmation-failed", "Pulsante Conferma non trovato");
    }
    await this.waitOverlay("conferma", "soft");
    if (!(await navigator.waitFor(CONFIRMATION_MESSAGE))) {
      throw new ItemFailure("confirmation-failed", "Messaggio di conferma non ricevuto");
    }
    await navigator.clickIfPresent(POPUP_CLOSE);
    return buildOutcome("confirmed", `${taxCode} ${workDate}`);
  }
}
