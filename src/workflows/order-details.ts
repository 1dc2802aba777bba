import { orderDetailsFieldsSchema } from "../schemas";
import type { OrderDetailsFields, OrderDetailsInput } from "../schemas";
import type { ItemOutcome } from "../types";
import { WorkflowExecutor } from "./workflow-executor";
import {
  OD_CONTRACT,
  OD_DATE_TO,
  OD_ORDER_NUMBER,
  OD_SERVICE_DETAIL_FLAG,
  ORDER_EXPORT,
  ORDER_MENU,
  REPORT_MENU,
} from "./portal-locators";

/**
 * Report → Oda: exports the order detail, or the general list of the contract
 * when the order number is empty.
 */
export class OrderDetailsWorkflow extends WorkflowExecutor<OrderDetailsInput, OrderDetailsFields> {
  readonly type = "order-details" as const;
  readonly title = "Dettagli OdA";
  protected readonly schema = orderDetailsFieldsSchema;

  private dateTo = "";

  protected withDefaults(input: Readonly<OrderDetailsInput>): Readonly<OrderDetailsInput> {
    if (input.contractNumber?.trim() || !this.botConfig.contractNumber) return input;
    return { ...input, contractNumber: this.botConfig.contractNumber };
  }

  protected missingIdentifier(input: Readonly<OrderDetailsInput>): string | null {
    return input.orderNumber?.trim() || input.contractNumber?.trim()
      ? null
      : "Numero OdA e numero contratto mancanti";
  }

  protected async setup(): Promise<void> {
    this.dateTo = this.botConfig.dateTo
      ? this.requireDate(this.botConfig.dateTo, "data fine")
      : "";
    await this.openSection([REPORT_MENU, ORDER_MENU]);
    this.session.throwIfStopRequested();
    await this.selectSupplier(this.botConfig.supplier, true);
  }

  protected async process(fields: OrderDetailsFields): Promise<ItemOutcome> {
    const { orderNumber, contractNumber } = fields;
    this.reporter.log(
      orderNumber
        ? `➡️ OdA ${orderNumber}${contractNumber ? ` (contratto ${contractNumber})` : ""}`
        : `➡️ Lista generale contratto ${contractNumber}`,
    );

    await this.navigator.fillField(OD_ORDER_NUMBER, orderNumber);
    if (this.dateTo) await this.navigator.fillField(OD_DATE_TO, this.dateTo);
    await this.navigator.fillField(OD_CONTRACT, contractNumber);
    await this.navigator.setCheckbox(OD_SERVICE_DETAIL_FLAG, true);
    await this.search("ricerca OdA");

    const baseName = [orderNumber, contractNumber].filter(Boolean).join("-");
    return this.downloadOutcome(await this.downloadExport(ORDER_EXPORT, baseName));
  }
}
