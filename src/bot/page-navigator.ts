import { logger } from "../logger";
import { ItemFailure } from "../errors";
import type { ElementSnapshot, PageDriver } from "./page-driver";
import {
  byRole,
  byText,
  chain,
  describeStrategy,
  resolveLocator,
} from "./locators";
import type { LocatorChain, LocatorMatch } from "./locators";
import { resolveAmbiguousField } from "./field-resolver";
import type { FieldHint, FieldResolution } from "./field-resolver";
import {
  DEFAULT_TIMEOUT_MS,
  OVERLAY_TIMEOUT_MS,
  SHORT_TIMEOUT_MS,
  pollFor,
  waitForOverlayCleared,
} from "./wait-primitives";

export interface NavigatorOptions {
  stepTimeoutMs?: number;
  overlayTimeoutMs?: number;
}

export type MenuPathResult =
  | { ok: true; completedSteps: number }
  | { ok: false; failedStep: string; completedSteps: number };

/**
 * Menu navigation and form filling on top of locator chains.
 * Elements are located on snapshots; only clicks and value assignment touch the page.
 */
export class PageNavigator {
  private readonly stepTimeoutMs: number;
  private readonly overlayTimeoutMs: number;

  constructor(
    readonly page: PageDriver,
    options: NavigatorOptions = {},
  ) {
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.overlayTimeoutMs = options.overlayTimeoutMs ?? OVERLAY_TIMEOUT_MS;
  }

  /** Polls the page until the chain resolves, or returns null on timeout. */
  async waitFor(
    locator: LocatorChain,
    options?: { timeoutMs?: number; requireInteractive?: boolean },
  ): Promise<LocatorMatch | null> {
    const { timeoutMs = this.stepTimeoutMs, requireInteractive = false } =
      options || {};
    return pollFor(
      async () =>
        resolveLocator(locator, await this.page.snapshot(), { requireInteractive }),
      timeoutMs,
      { label: locator.target },
    );
  }

  /** Resolves the chain against a single snapshot, without waiting. */
  async find(locator: LocatorChain): Promise<LocatorMatch | null> {
    return resolveLocator(locator, await this.page.snapshot());
  }

  async findAll(
    predicate: (element: ElementSnapshot) => boolean,
  ): Promise<ElementSnapshot[]> {
    const elements = await this.page.snapshot();
    return elements.filter((element) => element.visible && predicate(element));
  }

  async click(
    locator: LocatorChain,
    options?: { timeoutMs?: number },
  ): Promise<boolean> {
    const match = await this.waitFor(locator, {
      timeoutMs: options?.timeoutMs,
      requireInteractive: true,
    });
    if (!match) {
      logger.warn(`[Navigator] ${locator.target} not found`, {
        strategies: locator.strategies.map(describeStrategy),
      });
      return false;
    }
    if (match.strategyIndex > 0) {
      logger.debug(`[Navigator] ${locator.target} resolved by fallback`, {
        strategy: describeStrategy(locator.strategies[match.strategyIndex]),
      });
    }
    await this.page.click(match.element.ref);
    return true;
  }

  /** Clicks the element if it is already on the page. */
  async clickIfPresent(locator: LocatorChain): Promise<boolean> {
    const match = await this.find(locator);
    if (!match || !match.element.enabled) return false;
    await this.page.click(match.element.ref);
    return true;
  }

  async navigateMenuPath(
    steps: readonly LocatorChain[],
    options?: { stepTimeoutMs?: number },
  ): Promise<MenuPathResult> {
    const stepTimeoutMs = options?.stepTimeoutMs ?? this.stepTimeoutMs;

    for (let index = 0; index < steps.length; index++) {
      const step = steps[index];
      const clicked = await this.click(step, { timeoutMs: stepTimeoutMs });
      if (!clicked) {
        logger.warn(`[Navigator] Menu path stopped at "${step.target}"`, {
          completedSteps: index,
        });
        return { ok: false, failedStep: step.target, completedSteps: index };
      }
      await waitForOverlayCleared(this.page, this.overlayTimeoutMs, {
        policy: "soft",
        label: `menu:${step.target}`,
      });
    }

    logger.info(
      `[Navigator] Reached ${steps.map((step) => step.target).join(" > ")}`,
    );
    return { ok: true, completedSteps: steps.length };
  }

  async fillField(
    locator: LocatorChain,
    value: string,
    options?: { timeoutMs?: number },
  ): Promise<void> {
    const match = await this.waitFor(locator, { timeoutMs: options?.timeoutMs });
    if (!match) {
      throw new ItemFailure("field-not-found", `Campo "${locator.target}" non trovato`);
    }
    await this.assign(locator.target, match.element, value);
  }

  async fillFieldByHint(
    hint: FieldHint,
    value: string,
    options?: { timeoutMs?: number },
  ): Promise<void> {
    const timeoutMs = options?.timeoutMs ?? this.stepTimeoutMs;
    const found = await pollFor(
      async () => {
        const attempt = resolveAmbiguousField(hint, await this.page.snapshot());
        return attempt.status === "found" ? attempt : null;
      },
      timeoutMs,
      { label: hint.target },
    );

    const resolution: FieldResolution =
      found ?? resolveAmbiguousField(hint, await this.page.snapshot());
    if (resolution.status === "ambiguous") {
      throw new ItemFailure(
        "field-not-found",
        `Campo "${hint.target}" ambiguo (${resolution.candidates} candidati)`,
      );
    }
    if (resolution.status === "not-found") {
      throw new ItemFailure("field-not-found", `Campo "${hint.target}" non trovato`);
    }
    logger.debug(`[Navigator] ${hint.target} resolved by ${resolution.heuristic}`);
    await this.assign(hint.target, resolution.element, value);
  }

  /** Opens an ExtJS combo box and clicks the list option containing `optionText`. */
  async selectComboOption(
    trigger: LocatorChain,
    optionText: string,
    options?: { timeoutMs?: number },
  ): Promise<boolean> {
    const timeoutMs = options?.timeoutMs ?? SHORT_TIMEOUT_MS;
    if (!(await this.click(trigger, { timeoutMs }))) return false;

    const option = chain(
      `option "${optionText}"`,
      byText(optionText, { exact: false, tags: ["li"] }),
      byRole("option", optionText),
    );
    if (!(await this.click(option, { timeoutMs }))) {
      // close the picker so it does not cover the form
      await this.page.pressKey("Escape");
      return false;
    }

    await waitForOverlayCleared(this.page, this.overlayTimeoutMs, {
      policy: "soft",
      label: `combo:${optionText}`,
    });
    return true;
  }

  /** ExtJS checkboxes are `role="checkbox"` buttons carrying `aria-checked`. */
  async setCheckbox(
    locator: LocatorChain,
    checked: boolean,
    options?: { timeoutMs?: number },
  ): Promise<void> {
    const match = await this.waitFor(locator, {
      timeoutMs: options?.timeoutMs,
      requireInteractive: true,
    });
    if (!match) {
      throw new ItemFailure("field-not-found", `Campo "${locator.target}" non trovato`);
    }
    const { attributes, classes } = match.element;
    const current =
      attributes["aria-checked"] === "true" ||
      "checked" in attributes ||
      classes.includes("x-form-cb-checked");
    if (current !== checked) await this.page.click(match.element.ref);
  }

  async attachFile(
    locator: LocatorChain,
    filePath: string,
    options?: { timeoutMs?: number },
  ): Promise<void> {
    const match = await this.waitFor(locator, {
      timeoutMs: options?.timeoutMs,
      requireInteractive: true,
    });
    if (!match) {
      throw new ItemFailure("field-not-found", `Campo "${locator.target}" non trovato`);
    }
    await this.page.uploadFile(match.element.ref, filePath);
    logger.info(`[Navigator] Attached ${filePath}`);
  }

  private async assign(
    target: string,
    element: ElementSnapshot,
    value: string,
  ): Promise<void> {
    if (!element.enabled || element.readOnly) {
      throw new ItemFailure(
        "field-not-fillable",
        `Campo "${target}" non modificabile`,
      );
    }
    await this.page.setValue(element.ref, value);
  }
}
