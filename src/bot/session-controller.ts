import { config } from "../config";
import { logger } from "../logger";
import type { Credentials } from "../credentials";
import type { SessionState } from "../types";
import type { BotConfig } from "../schemas";
import {
  BotStopError,
  FatalBotError,
  describeError,
  isBotStopError,
  isFatalBotError,
} from "../errors";
import { FATAL_MESSAGES } from "../error-messages";
import { RunReporter } from "../reporting/run-reporter";
import type { PageDriver } from "./page-driver";
import { PageNavigator } from "./page-navigator";
import { chain } from "./locators";
import {
  clearBrowserCache,
  isCorruptedBrowserCacheError,
  launchPortalBrowser,
} from "./browser-launcher";
import type { BrowserLauncher, BrowserLaunchSettings } from "./browser-launcher";
import { acquireProfileLock } from "./profile-lock";
import type { ProfileLock } from "./profile-lock";
import {
  LOGIN_BUTTON,
  LOGOUT_OPTION,
  PASSWORD_FIELD,
  POPUP_OK,
  POST_LOGIN_MARKER,
  SESSION_ACTIVE_YES,
  SETTINGS_BUTTON,
  USERNAME_FIELD,
} from "./common-locators";
import {
  OVERLAY_TIMEOUT_MS,
  PAGE_LOAD_TIMEOUT_MS,
  SHORT_TIMEOUT_MS,
  sleep,
  waitForOverlayCleared,
} from "./wait-primitives";

export const LOGIN_MAX_ATTEMPTS = 3;

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ["initializing", "error"],
  initializing: ["logging-in", "error"],
  "logging-in": ["initializing", "running", "stopped", "error"],
  running: ["completed", "stopped", "error"],
  completed: [],
  error: [],
  stopped: [],
};

export const TERMINAL_SESSION_STATES: ReadonlySet<SessionState> = new Set<SessionState>([
  "completed",
  "error",
  "stopped",
]);

export interface SessionTiming {
  stepTimeoutMs: number;
  overlayTimeoutMs: number;
  pageLoadTimeoutMs: number;
  /** How long to wait for the post-login shell and the "session active" popup. */
  markerTimeoutMs: number;
}

export interface SessionControllerOptions {
  credentials: Credentials;
  botConfig: BotConfig;
  reporter?: RunReporter;
  launcher?: BrowserLauncher;
  lockProfile?: (profileDirectory: string) => Promise<ProfileLock>;
  clearCache?: (cacheDirectory: string) => Promise<boolean>;
  timing?: Partial<SessionTiming>;
}

export type SessionHealth = "alive" | "recovered";

/**
 * Owns the single browser session of a run: launch, login with retries,
 * liveness checks, logout and teardown, plus the cooperative stop flag.
 */
export class SessionController {
  private currentState: SessionState = "idle";
  private stopRequested = false;
  private recoveryUsed = false;
  private driver: PageDriver | null = null;
  private pageNavigator: PageNavigator | null = null;
  private profileLock: ProfileLock | null = null;

  private readonly credentials: Credentials;
  private readonly botConfig: BotConfig;
  private readonly reporter: RunReporter;
  private readonly launcher: BrowserLauncher;
  private readonly lockProfile: (profileDirectory: string) => Promise<ProfileLock>;
  private readonly clearCache: (cacheDirectory: string) => Promise<boolean>;
  readonly timing: SessionTiming;

  constructor(options: SessionControllerOptions) {
    this.credentials = options.credentials;
    this.botConfig = options.botConfig;
    this.reporter = options.reporter ?? new RunReporter();
    this.launcher = options.launcher ?? launchPortalBrowser;
    this.lockProfile = options.lockProfile ?? ((dir) => acquireProfileLock(dir));
    this.clearCache = options.clearCache ?? clearBrowserCache;
    this.timing = {
      stepTimeoutMs: this.botConfig.operationTimeoutSeconds * 1000,
      overlayTimeoutMs: OVERLAY_TIMEOUT_MS,
      pageLoadTimeoutMs: PAGE_LOAD_TIMEOUT_MS,
      markerTimeoutMs: SHORT_TIMEOUT_MS,
      ...options.timing,
    };
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isStopRequested(): boolean {
    return this.stopRequested;
  }

  get page(): PageDriver {
    if (!this.driver) throw new Error("Browser session not initialized");
    return this.driver;
  }

  get navigator(): PageNavigator {
    if (!this.pageNavigator) throw new Error("Browser session not initialized");
    return this.pageNavigator;
  }

  transition(next: SessionState): void {
    const from = this.currentState;
    if (!TRANSITIONS[from].includes(next)) {
      throw new Error(`Illegal session transition ${from} -> ${next}`);
    }
    this.currentState = next;
    logger.debug(`[Session] ${from} -> ${next}`);
  }

  /** Returns a finished controller to idle and clears the per-run flags. */
  reset(): void {
    if (this.currentState !== "idle" && !TERMINAL_SESSION_STATES.has(this.currentState)) {
      throw new Error(`Cannot reset a session in state ${this.currentState}`);
    }
    this.currentState = "idle";
    this.stopRequested = false;
    this.recoveryUsed = false;
  }

  requestStop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.reporter.log("Interruzione richiesta, attendo il termine dell'operazione in corso...");
  }

  throwIfStopRequested(): void {
    if (this.stopRequested) throw new BotStopError();
  }

  async initialize(): Promise<void> {
    await this.terminate();
    this.transition("initializing");
    this.reporter.log("Inizializzazione browser...");

    try {
      this.profileLock = await this.lockProfile(this.botConfig.profileDirectory);
    } catch (error) {
      this.transition("error");
      if (isFatalBotError(error)) throw error;
      throw new FatalBotError("session-create-failed", describeError(error), { cause: error });
    }

    try {
      this.driver = await this.launchWithCacheRecovery();
    } catch (error) {
      await this.terminate();
      this.transition("error");
      throw new FatalBotError(
        "session-create-failed",
        `${FATAL_MESSAGES["session-create-failed"]}: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.pageNavigator = new PageNavigator(this.driver, {
      stepTimeoutMs: this.timing.stepTimeoutMs,
      overlayTimeoutMs: this.timing.overlayTimeoutMs,
    });
    this.reporter.log("✓ Browser inizializzato");
  }

  async authenticate(): Promise<void> {
    for (let attempt = 1; attempt <= LOGIN_MAX_ATTEMPTS; attempt++) {
      await this.initialize();
      this.transition("logging-in");
      this.throwIfStopRequested();
      this.reporter.log(`Accesso al portale (tentativo ${attempt}/${LOGIN_MAX_ATTEMPTS})...`);

      try {
        if (await this.submitLogin()) {
          this.transition("running");
          this.reporter.log("✓ Login effettuato con successo");
          return;
        }
        this.reporter.log("✗ Login non riuscito", "warn", { attempt });
      } catch (error) {
        if (isBotStopError(error)) throw error;
        this.reporter.log(`✗ Errore login: ${describeError(error)}`, "warn", { attempt });
      }

      if (attempt < LOGIN_MAX_ATTEMPTS) {
        await sleep(this.botConfig.loginRetryDelayMs);
      }
    }

    this.transition("error");
    throw new FatalBotError(
      "auth-exhausted",
      `${FATAL_MESSAGES["auth-exhausted"]} (${LOGIN_MAX_ATTEMPTS})`,
    );
  }

  /**
   * Reloads the page and checks the post-login shell. One re-login per run is
   * allowed; after that the session is reported lost.
   */
  async ensureSessionAlive(): Promise<SessionHealth> {
    try {
      await this.page.reload(this.timing.pageLoadTimeoutMs);
      await waitForOverlayCleared(this.page, this.timing.overlayTimeoutMs, {
        policy: "soft",
        label: "reload",
      });
      if (await this.navigator.waitFor(POST_LOGIN_MARKER, { timeoutMs: this.timing.markerTimeoutMs })) {
        return "alive";
      }
    } catch (error) {
      logger.warn(`[Session] Liveness check failed: ${describeError(error)}`);
    }

    if (this.recoveryUsed) {
      throw new FatalBotError("session-lost", `${FATAL_MESSAGES["session-lost"]} (recupero già tentato)`);
    }
    this.recoveryUsed = true;
    this.reporter.log("Sessione scaduta, nuovo accesso in corso...", "warn");

    try {
      if (await this.submitLogin()) {
        this.reporter.log("✓ Sessione ripristinata");
        return "recovered";
      }
    } catch (error) {
      logger.warn(`[Session] Re-login failed: ${describeError(error)}`);
    }
    throw new FatalBotError("session-lost", FATAL_MESSAGES["session-lost"]);
  }

  /** Soft: a failed logout is logged, never raised. */
  async logout(): Promise<boolean> {
    if (!this.pageNavigator) return false;
    try {
      const timeoutMs = this.timing.markerTimeoutMs;
      const opened = await this.navigator.click(SETTINGS_BUTTON, { timeoutMs });
      if (!opened || !(await this.navigator.click(LOGOUT_OPTION, { timeoutMs }))) {
        this.reporter.log("Logout non riuscito, chiudo comunque il browser", "warn");
        return false;
      }
      await waitForOverlayCleared(this.page, this.timing.overlayTimeoutMs, {
        policy: "soft",
        label: "logout",
      });
      this.reporter.log("✓ Logout effettuato");
      return true;
    } catch (error) {
      this.reporter.log(`Logout non riuscito: ${describeError(error)}`, "warn");
      return false;
    }
  }

  /** Closes the browser and releases the profile lock. Safe to call repeatedly. */
  async terminate(): Promise<void> {
    const driver = this.driver;
    const lock = this.profileLock;
    this.driver = null;
    this.pageNavigator = null;
    this.profileLock = null;

    if (driver) {
      try {
        await driver.close();
        this.reporter.log("Browser chiuso");
      } catch (error) {
        logger.warn(`[Session] Browser close failed: ${describeError(error)}`);
      }
    }
    if (lock) {
      try {
        await lock.release();
      } catch (error) {
        logger.warn(`[Session] Profile lock release failed: ${describeError(error)}`);
      }
    }
  }

  private launchSettings(): BrowserLaunchSettings {
    return {
      headless: this.botConfig.headless,
      executablePath: config.browser.executablePath,
      channel: config.browser.channel,
      profileDirectory: this.botConfig.profileDirectory,
      cacheDirectory: this.botConfig.cacheDirectory,
      downloadDirectory: this.botConfig.downloadDirectory,
      slowMo: config.browser.slowMo,
      protocolTimeout: config.browser.protocolTimeout,
    };
  }

  private async launchWithCacheRecovery(): Promise<PageDriver> {
    const settings = this.launchSettings();
    try {
      return await this.launcher(settings);
    } catch (error) {
      if (!isCorruptedBrowserCacheError(error)) throw error;
      if (!(await this.clearCache(settings.cacheDirectory))) throw error;
      this.reporter.log("Cache del browser danneggiata, nuovo avvio...", "warn", {
        error: describeError(error),
      });
      return this.launcher(settings);
    }
  }

  private async submitLogin(): Promise<boolean> {
    const page = this.page;
    const navigator = this.navigator;

    await page.goto(this.botConfig.portalUrl, this.timing.pageLoadTimeoutMs);
    await waitForOverlayCleared(page, this.timing.overlayTimeoutMs, {
      policy: "soft",
      label: "login-page",
    });

    await navigator.fillField(USERNAME_FIELD, this.credentials.username);
    await navigator.fillField(PASSWORD_FIELD, this.credentials.password);
    if (!(await navigator.click(LOGIN_BUTTON))) return false;
    this.reporter.log("Credenziali inviate...");

    await waitForOverlayCleared(page, this.timing.overlayTimeoutMs, {
      policy: "soft",
      label: "login",
    });
    await this.dismissLoginPopups();
    return this.verifyLogin();
  }

  /** Waits for either the "session already active" dialog or the shell, and answers the dialog. */
  private async dismissLoginPopups(): Promise<void> {
    const navigator = this.navigator;
    const outcome = await navigator.waitFor(
      chain("login outcome", ...SESSION_ACTIVE_YES.strategies, ...POST_LOGIN_MARKER.strategies),
      { timeoutMs: this.timing.markerTimeoutMs },
    );
    if (outcome && outcome.strategyIndex < SESSION_ACTIVE_YES.strategies.length) {
      await this.page.click(outcome.element.ref);
      this.reporter.log("✓ Popup sessione gestito");
      await waitForOverlayCleared(this.page, this.timing.overlayTimeoutMs, {
        policy: "soft",
        label: "session-popup",
      });
    }
    if (await navigator.clickIfPresent(POPUP_OK)) {
      logger.debug("[Session] Acknowledged post-login popup");
    }
  }

  private async verifyLogin(): Promise<boolean> {
    const navigator = this.navigator;
    if (await navigator.waitFor(POST_LOGIN_MARKER, { timeoutMs: this.timing.markerTimeoutMs })) {
      return true;
    }
    const leftLoginPage = !this.page.currentUrl().toLowerCase().includes("login");
    return leftLoginPage && (await navigator.find(USERNAME_FIELD)) === null;
  }
}
