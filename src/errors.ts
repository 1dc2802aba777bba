import type { OutcomeCode } from "./types";

export class BotStopError extends Error {
  constructor(message = "Esecuzione interrotta dall'utente") {
    super(message);
    this.name = "BotStopError";
  }
}

export type FatalReason =
  | "auth-exhausted"
  | "session-create-failed"
  | "profile-locked"
  | "session-lost"
  | "setup-failed";

export class FatalBotError extends Error {
  readonly reason: FatalReason;

  constructor(reason: FatalReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalBotError";
    this.reason = reason;
  }
}

/**
 * Failure scoped to a single work item. Caught at the per-item boundary
 * and recorded as that item's outcome; never aborts the run.
 */
export class ItemFailure extends Error {
  readonly code: OutcomeCode;

  constructor(code: OutcomeCode, message: string) {
    super(message);
    this.name = "ItemFailure";
    this.code = code;
  }
}

export class OverlayTimeoutError extends Error {
  readonly label: string;

  constructor(label: string, timeoutMs: number) {
    super(`Overlay still visible after ${timeoutMs}ms (${label})`);
    this.name = "OverlayTimeoutError";
    this.label = label;
  }
}

export const isBotStopError = (error: unknown): error is BotStopError =>
  error instanceof BotStopError;

export const isFatalBotError = (error: unknown): error is FatalBotError =>
  error instanceof FatalBotError;

export const isItemFailure = (error: unknown): error is ItemFailure =>
  error instanceof ItemFailure;

export const isOverlayTimeoutError = (
  error: unknown,
): error is OverlayTimeoutError => error instanceof OverlayTimeoutError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
