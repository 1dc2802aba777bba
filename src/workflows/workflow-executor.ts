import path from "path";
import type { z } from "zod";
import { logger } from "../logger";
import {
  FatalBotError,
  ItemFailure,
  describeError,
  isBotStopError,
  isFatalBotError,
  isItemFailure,
  isOverlayTimeoutError,
} from "../errors";
import { FATAL_MESSAGES } from "../error-messages";
import { buildOutcome, isTerminal, statusForOutcome } from "../types";
import type { DownloadRecord, ItemOutcome, SessionState, WorkItem } from "../types";
import type { BotConfig } from "../schemas";
import { formatIssues, italianDateSchema } from "../schemas";
import type { SessionController } from "../bot/session-controller";
import type { PageNavigator } from "../bot/page-navigator";
import type { LocatorChain } from "../bot/locators";
import { waitForOverlayCleared } from "../bot/wait-primitives";
import type { OverlayPolicy } from "../bot/wait-primitives";
import type { RunReporter } from "../reporting/run-reporter";
import type { DownloadReconciler } from "../downloads/download-reconciler";
import { SEARCH_BUTTON, SUPPLIER_TRIGGER } from "./portal-locators";
import type { WorkflowDependencies, WorkflowType } from "./workflow-types";

/**
 * Batch run over one authenticated session: login, one-time section setup,
 * then each pending item in order. Item failures are recorded and the loop
 * moves on; fatal errors and stop requests end the run.
 */
export abstract class WorkflowExecutor<TInput extends object, TFields> {
  abstract readonly type: WorkflowType;
  /** Display name used in operator messages. */
  abstract readonly title: string;
  protected abstract readonly schema: z.ZodType<TFields, z.ZodTypeDef, TInput>;

  protected readonly session: SessionController;
  protected readonly botConfig: BotConfig;
  protected readonly reporter: RunReporter;
  protected readonly downloads: DownloadReconciler;

  /** Set when the run ended in `error`. */
  lastError: Error | null = null;

  private activeContextKey: string | null = null;
  private opSeq = 0;

  constructor(deps: WorkflowDependencies) {
    this.session = deps.session;
    this.botConfig = deps.botConfig;
    this.reporter = deps.reporter;
    this.downloads = deps.downloads;
  }

  protected get navigator(): PageNavigator {
    return this.session.navigator;
  }

  /** Returns a message when the item's primary identifier is empty. */
  protected abstract missingIdentifier(input: Readonly<TInput>): string | null;
  /** Navigates to the section and sets the filters shared by every item. */
  protected abstract setup(): Promise<void>;
  protected abstract process(fields: TFields, item: WorkItem<TInput>): Promise<ItemOutcome>;

  /** Fills run-level defaults into an item before it is validated. */
  protected withDefaults(input: Readonly<TInput>): Readonly<TInput> {
    return input;
  }

  /** Items sharing a key reuse the UI context prepared for the first of them. */
  protected contextKeyOf(_fields: TFields): string | null {
    return null;
  }

  protected async prepareContext(_fields: TFields): Promise<void> {}

  async execute(items: WorkItem<TInput>[]): Promise<boolean> {
    const { session, reporter } = this;
    session.reset();
    this.activeContextKey = null;
    this.lastError = null;

    const pending = items.filter((item) => !isTerminal(item)).length;
    reporter.log(`🚀 Avvio ${this.title}: ${pending}/${items.length} elementi da elaborare`);

    try {
      await session.authenticate();

      if (pending === 0) {
        reporter.log("Nessun elemento da elaborare");
        session.transition("completed");
        return true;
      }

      await this.runSetup();

      let allOk = true;
      for (const item of items) {
        session.throwIfStopRequested();
        if (isTerminal(item)) {
          logger.debug(`[Workflow] Skipping ${item.id} (${item.status})`);
          continue;
        }

        const outcome = await this.runOp(`item ${item.id}`, () => this.processItem(item));
        item.outcome = outcome;
        item.status = statusForOutcome(outcome);
        reporter.progress(item.id, outcome);
        allOk = allOk && outcome.ok;
      }
      session.throwIfStopRequested();

      if (this.botConfig.logoutOnFinish) await session.logout();
      session.transition("completed");

      const { processed, succeeded } = reporter.summary();
      reporter.log(`✨ ${this.title} completato: ${succeeded}/${processed} elementi riusciti`);
      return allOk;
    } catch (error) {
      this.settleFailure(error);
      return false;
    } finally {
      await session.terminate();
    }
  }

  private async processItem(item: WorkItem<TInput>): Promise<ItemOutcome> {
    const input = this.withDefaults(item.fields);
    const missing = this.missingIdentifier(input);
    if (missing) return buildOutcome("missing-identifier", missing);

    const parsed = this.schema.safeParse(input);
    if (!parsed.success) {
      return buildOutcome("invalid-input", formatIssues(parsed.error));
    }
    const fields = parsed.data;

    try {
      await this.ensureContext(fields);
      return await this.process(fields, item);
    } catch (error) {
      if (isBotStopError(error) || isFatalBotError(error)) throw error;
      if (isItemFailure(error)) return buildOutcome(error.code, error.message);
      if (isOverlayTimeoutError(error)) {
        return buildOutcome("overlay-timeout", error.message);
      }

      logger.error(`[Workflow] Unexpected error on ${item.id}`, {
        workflow: this.type,
        error: describeError(error),
      });
      await this.recover();
      return buildOutcome("unexpected-error", describeError(error));
    }
  }

  private async ensureContext(fields: TFields): Promise<void> {
    const key = this.contextKeyOf(fields);
    if (key === null || key === this.activeContextKey) return;

    // a failed lookup leaves no context behind
    this.activeContextKey = null;
    await this.prepareContext(fields);
    this.activeContextKey = key;
  }

  /** A reload throws the ExtJS view away, so the section is set up again. */
  private async recover(): Promise<void> {
    this.activeContextKey = null;
    const health = await this.session.ensureSessionAlive();
    logger.info(`[Workflow] Session ${health} after unexpected error, repeating setup`);
    await this.runSetup();
  }

  private async runSetup(): Promise<void> {
    this.session.throwIfStopRequested();
    try {
      await this.runOp("setup", () => this.setup());
    } catch (error) {
      if (isBotStopError(error) || isFatalBotError(error)) throw error;
      throw new FatalBotError(
        "setup-failed",
        `${FATAL_MESSAGES["setup-failed"]}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private settleFailure(error: unknown): void {
    const state: SessionState = this.session.state;
    if (isBotStopError(error)) {
      this.reporter.log("⏹ Esecuzione interrotta", "warn");
      if (state === "running" || state === "logging-in") {
        this.session.transition("stopped");
        return;
      }
    } else {
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.reporter.log(`✗ Errore esecuzione: ${describeError(error)}`, "error");
    }
    if (state !== "completed" && state !== "error" && state !== "stopped") {
      this.session.transition("error");
    }
  }

  protected async runOp<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const opId = ++this.opSeq;
    const startNs = process.hrtime.bigint();
    const elapsedMs = () => Number(process.hrtime.bigint() - startNs) / 1_000_000;

    logger.debug(`[OP ${opId} START] ${name}`, { workflow: this.type });
    try {
      const result = await fn();
      logger.debug(`[OP ${opId} END] ${name}`, { durationMs: elapsedMs() });
      return result;
    } catch (error) {
      logger.debug(`[OP ${opId} FAIL] ${name}`, {
        durationMs: elapsedMs(),
        error: describeError(error),
      });
      throw error;
    }
  }

  // Helpers shared by the section workflows

  protected async openSection(steps: readonly LocatorChain[]): Promise<void> {
    this.reporter.log(`Navigazione ${steps.map((step) => step.target).join(" → ")}...`);
    const result = await this.navigator.navigateMenuPath(steps);
    if (!result.ok) {
      throw new FatalBotError(
        "setup-failed",
        `${FATAL_MESSAGES["setup-failed"]}: menu "${result.failedStep}" non trovato`,
      );
    }
  }

  /** Picks the supplier in the section's combo box; an empty name leaves the filter alone. */
  protected async selectSupplier(supplier: string, required: boolean): Promise<boolean> {
    if (!supplier) return true;
    this.reporter.log(`Selezione fornitore: ${supplier}`);
    const selected = await this.navigator.selectComboOption(SUPPLIER_TRIGGER, supplier, {
      timeoutMs: this.session.timing.stepTimeoutMs,
    });
    if (selected) return true;
    if (required) {
      throw new FatalBotError(
        "setup-failed",
        `${FATAL_MESSAGES["setup-failed"]}: fornitore "${supplier}" non selezionabile`,
      );
    }
    this.reporter.log(`⚠️ Fornitore "${supplier}" non selezionabile, proseguo`, "warn");
    return false;
  }

  /** Validates a run-level date parameter, returning it normalised to dd.mm.yyyy. */
  protected requireDate(value: string, label: string): string {
    const parsed = italianDateSchema.safeParse(value);
    if (!parsed.success) {
      throw new FatalBotError(
        "setup-failed",
        `${FATAL_MESSAGES["setup-failed"]}: ${label} "${value}" non valida`,
      );
    }
    return parsed.data;
  }

  protected async clickOrFail(locator: LocatorChain): Promise<void> {
    if (!(await this.navigator.click(locator))) {
      throw new ItemFailure("navigation-failed", `Pulsante "${locator.target}" non trovato`);
    }
  }

  protected waitOverlay(label: string, policy: OverlayPolicy): Promise<boolean> {
    return waitForOverlayCleared(this.session.page, this.session.timing.overlayTimeoutMs, {
      policy,
      label,
    });
  }

  /** Clicks search and waits for the results; a stuck mask fails the item. */
  protected async search(label: string, button: LocatorChain = SEARCH_BUTTON): Promise<void> {
    await this.clickOrFail(button);
    await this.waitOverlay(label, "hard");
  }

  /** Triggers the export and stores the file as `<baseName>.<ext>`. */
  protected async downloadExport(
    exportButton: LocatorChain,
    baseName: string,
  ): Promise<DownloadRecord & { finalPath: string }> {
    this.session.throwIfStopRequested();
    const before = await this.downloads.snapshot();
    const record = await this.downloads.triggerDownloadAndWait(
      () => this.clickOrFail(exportButton),
      before,
    );
    if (!record) {
      throw new ItemFailure("download-timeout", `Nessun file ricevuto per ${baseName}`);
    }

    const stored = await this.downloads.reconcile(record, baseName);
    if (!stored?.finalPath) {
      throw new ItemFailure("download-skipped", record.fileName);
    }
    return { ...stored, finalPath: stored.finalPath };
  }

  protected downloadOutcome(stored: { finalPath: string }): ItemOutcome {
    return buildOutcome("success", path.basename(stored.finalPath), stored.finalPath);
  }
}
