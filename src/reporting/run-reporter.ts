import { logger } from "../logger";
import { formatOutcome } from "../error-messages";
import type { ItemOutcome, LogSink, OutcomeCode, ProgressSink } from "../types";
import type { InputChannel } from "./input-channel";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ReporterSinks {
  log?: LogSink;
  progress?: ProgressSink;
}

export interface RunSummary {
  processed: number;
  succeeded: number;
  failed: number;
  byCode: Partial<Record<OutcomeCode, number>>;
}

/**
 * Fans run messages out to winston and to the caller's sinks.
 * Sink exceptions are logged and swallowed so a broken UI cannot stop a run.
 */
export class RunReporter {
  private processed = 0;
  private succeeded = 0;
  private readonly byCode: Partial<Record<OutcomeCode, number>> = {};

  constructor(
    private readonly sinks: ReporterSinks = {},
    private readonly input: InputChannel | null = null,
  ) {}

  log(message: string, level: LogLevel = "info", meta?: Record<string, unknown>): void {
    if (meta) logger.log(level, message, meta);
    else logger.log(level, message);
    if (!this.sinks.log) return;
    try {
      this.sinks.log(message);
    } catch (error) {
      logger.warn(`[Reporter] Log sink error: ${error}`);
    }
  }

  progress(itemId: string, outcome: ItemOutcome): void {
    this.processed += 1;
    if (outcome.ok) this.succeeded += 1;
    this.byCode[outcome.code] = (this.byCode[outcome.code] ?? 0) + 1;

    this.log(
      `[${itemId}] ${outcome.ok ? "✓" : "✗"} ${formatOutcome(outcome.code, outcome.detail)}`,
      outcome.ok ? "info" : "warn",
    );
    if (!this.sinks.progress) return;
    try {
      this.sinks.progress(itemId, outcome.code, outcome.detail);
    } catch (error) {
      logger.warn(`[Reporter] Progress sink error: ${error}`);
    }
  }

  /** Asks the operator for text. Resolves to null when nobody can answer or the prompt is cancelled. */
  async requestInput(prompt: string): Promise<string | null> {
    if (!this.input) {
      logger.warn("[Reporter] Input requested but no input channel is attached", {
        prompt,
      });
      return null;
    }
    this.log(`Richiesta input: ${prompt}`);
    return this.input.request(prompt);
  }

  summary(): RunSummary {
    return {
      processed: this.processed,
      succeeded: this.succeeded,
      failed: this.processed - this.succeeded,
      byCode: { ...this.byCode },
    };
  }
}
