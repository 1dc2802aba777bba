import { randomUUID } from "crypto";
import { logger } from "../logger";
import { Credentials } from "../credentials";
import { describeError } from "../errors";
import { parseBotConfig } from "../schemas";
import type { BotConfigInput } from "../schemas";
import type { SessionState, WorkItem } from "../types";
import { SessionController } from "../bot/session-controller";
import type { SessionControllerOptions } from "../bot/session-controller";
import { DownloadReconciler } from "../downloads/download-reconciler";
import { InputChannel } from "../reporting/input-channel";
import { RunReporter } from "../reporting/run-reporter";
import type { ReporterSinks, RunSummary } from "../reporting/run-reporter";
import { createWorkflow } from "../workflows";
import type { WorkflowInputs } from "../workflows";
import type { WorkflowHooks, WorkflowType } from "../workflows/workflow-types";

export interface WorkflowRunOptions<K extends WorkflowType> {
  type: K;
  items: WorkItem<WorkflowInputs[K]>[];
  /** Defaults to PORTAL_USERNAME / PORTAL_PASSWORD. */
  credentials?: Credentials;
  config?: BotConfigInput;
  sinks?: ReporterSinks;
  hooks?: WorkflowHooks;
  /** Browser seams, replaced in tests. */
  session?: Pick<SessionControllerOptions, "launcher" | "lockProfile" | "clearCache" | "timing">;
  downloadTimeoutMs?: number;
}

export interface RunResult {
  runId: string;
  ok: boolean;
  state: SessionState;
  summary: RunSummary;
  error: Error | null;
}

export interface RunHandle {
  readonly runId: string;
  /** Settles when the run is over; never rejects. */
  readonly done: Promise<RunResult>;
  requestStop(): void;
  state(): SessionState;
  /** Answers the operator prompts raised during the run. */
  readonly input: InputChannel;
}

/**
 * Starts a workflow run as a detached task and returns its handle.
 * Configuration and credentials are checked up front and throw synchronously.
 * Prompts raised before a responder is attached to `input` wait for it.
 */
export function startWorkflowRun<K extends WorkflowType>(
  options: WorkflowRunOptions<K>,
): RunHandle {
  const runId = randomUUID();
  const botConfig = parseBotConfig(options.config);
  const credentials = options.credentials ?? Credentials.fromConfig();
  if (!credentials.isComplete) {
    throw new Error("Credenziali del portale mancanti (PORTAL_USERNAME / PORTAL_PASSWORD)");
  }

  const input = new InputChannel();
  const reporter = new RunReporter(options.sinks, input);
  const session = new SessionController({
    credentials,
    botConfig,
    reporter,
    ...options.session,
  });
  const downloads = new DownloadReconciler({
    directory: botConfig.downloadDirectory,
    collisionMode: botConfig.collisionMode,
    reporter,
    timeoutMs: options.downloadTimeoutMs,
  });
  const workflow = createWorkflow(
    options.type,
    { session, botConfig, reporter, downloads },
    options.hooks,
  );

  const run = async (): Promise<RunResult> => {
    logger.info(`[Runner] Run ${runId} started`, {
      workflow: options.type,
      items: options.items.length,
    });
    let ok = false;
    let error: Error | null = null;
    try {
      ok = await workflow.execute(options.items);
      error = workflow.lastError;
    } catch (unexpected) {
      error = unexpected instanceof Error ? unexpected : new Error(String(unexpected));
      logger.error(`[Runner] Run ${runId} crashed: ${describeError(unexpected)}`);
    }

    const result: RunResult = {
      runId,
      ok,
      state: session.state,
      summary: reporter.summary(),
      error,
    };
    logger.info(`[Runner] Run ${runId} finished`, {
      state: result.state,
      ok,
      processed: result.summary.processed,
      failed: result.summary.failed,
    });
    return result;
  };

  return {
    runId,
    done: run(),
    requestStop: () => session.requestStop(),
    state: () => session.state,
    input,
  };
}
