import type { Browser, Page } from "puppeteer-core";
import { logger } from "../logger";
import type { ElementSnapshot, PageDriver, PageKey } from "./page-driver";
import { SHORT_TIMEOUT_MS } from "./wait-primitives";

const REF_ATTRIBUTE = "data-bot-ref";

const refSelector = (ref: string): string => `[${REF_ATTRIBUTE}="${ref}"]`;

/**
 * PageDriver over a puppeteer tab. Each snapshot tags the collected elements
 * with a stable `data-bot-ref` so later clicks address the same node.
 */
export class PuppeteerPageDriver implements PageDriver {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {
    this.page.on("console", (msg) => {
      const text = msg.text();
      if (text) {
        logger.debug(`[Browser Console] ${text}`);
      }
    });
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  async reload(timeoutMs: number): Promise<void> {
    await this.page.reload({ waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async snapshot(): Promise<ElementSnapshot[]> {
    return this.page.evaluate((refAttribute: string): ElementSnapshot[] => {
      const root = document.documentElement;
      let seq = parseInt(root.getAttribute("data-bot-ref-seq") || "0", 10);
      const clean = (text: string | null | undefined): string =>
        (text || "").replace(/\s+/g, " ").trim().slice(0, 500);

      const hasOwnText = (el: Element): boolean =>
        Array.from(el.childNodes).some(
          (node) => node.nodeType === Node.TEXT_NODE && clean(node.textContent) !== "",
        );

      const isRelevant = (el: Element): boolean => {
        const tag = el.tagName.toLowerCase();
        if (["a", "button", "input", "textarea", "select", "label", "li", "tr"].includes(tag)) {
          return true;
        }
        if (el.hasAttribute("role")) return true;
        const cls = el.getAttribute("class") || "";
        if (/x-btn|x-tool|x-form-trigger|x-grid-row|x-grid-item|x-menu-item/.test(cls)) {
          return true;
        }
        return hasOwnText(el);
      };

      const isVisible = (el: Element): boolean => {
        const style = window.getComputedStyle(el);
        if (style.display === "none" || style.visibility === "hidden") return false;
        const rect = el.getBoundingClientRect();
        return rect.width > 0 && rect.height > 0;
      };

      const labelFor = (el: Element): string => {
        if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
          const own = el.labels && el.labels.length ? el.labels[0].textContent : null;
          if (own) return clean(own);
        }
        const field = el.closest(".x-field, .x-form-item");
        return clean(field?.querySelector("label")?.textContent);
      };

      const containerFor = (el: Element): string => {
        const fieldset = el.closest("fieldset, .x-fieldset");
        const legend = fieldset?.querySelector("legend, .x-fieldset-header-text");
        if (legend) return clean(legend.textContent);
        const panel = el.closest(".x-panel");
        return clean(panel?.querySelector(".x-panel-header-title, .x-title-text")?.textContent);
      };

      const snapshots: ElementSnapshot[] = [];
      for (const el of Array.from(document.querySelectorAll("body *"))) {
        if (!isRelevant(el)) continue;
        let ref = el.getAttribute(refAttribute);
        if (!ref) {
          seq += 1;
          ref = `b${seq}`;
          el.setAttribute(refAttribute, ref);
        }

        const attributes: Record<string, string> = {};
        for (const attr of Array.from(el.attributes).slice(0, 30)) {
          attributes[attr.name] = attr.value.slice(0, 200);
        }

        const field =
          el instanceof HTMLInputElement ||
          el instanceof HTMLTextAreaElement ||
          el instanceof HTMLSelectElement
            ? el
            : null;
        const disabled =
          (field !== null && field.disabled) ||
          el.classList.contains("x-item-disabled") ||
          el.getAttribute("aria-disabled") === "true";

        snapshots.push({
          ref,
          tag: el.tagName.toLowerCase(),
          text: clean(el.textContent),
          id: el.id,
          role: el.getAttribute("role") || "",
          name: el.getAttribute("name") || "",
          type: el.getAttribute("type") || "",
          classes: Array.from(el.classList),
          attributes,
          value: field ? field.value : "",
          placeholder: el.getAttribute("placeholder") || "",
          labelText: field ? labelFor(el) : "",
          containerText: field ? containerFor(el) : "",
          visible: isVisible(el),
          enabled: !disabled,
          readOnly:
            (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) &&
            el.readOnly,
        });
      }
      root.setAttribute("data-bot-ref-seq", String(seq));
      return snapshots;
    }, REF_ATTRIBUTE);
  }

  async click(ref: string): Promise<void> {
    // ExtJS listens on mousedown/mouseup, a bare click() is not enough
    await this.page.evaluate((selector: string) => {
      const el = document.querySelector(selector);
      if (!(el instanceof HTMLElement)) {
        throw new Error(`Element ${selector} is no longer attached`);
      }
      el.scrollIntoView({ block: "center" });
      for (const type of ["mousedown", "mouseup", "click"]) {
        el.dispatchEvent(
          new MouseEvent(type, { bubbles: true, cancelable: true, view: window }),
        );
      }
    }, refSelector(ref));
  }

  async setValue(ref: string, value: string): Promise<void> {
    await this.page.evaluate(
      (selector: string, text: string) => {
        const el = document.querySelector(selector);
        if (!(el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement)) {
          throw new Error(`Element ${selector} is not a text field`);
        }
        const proto =
          el instanceof HTMLInputElement
            ? HTMLInputElement.prototype
            : HTMLTextAreaElement.prototype;
        const setter = Object.getOwnPropertyDescriptor(proto, "value")?.set;
        el.focus();
        setter?.call(el, "");
        setter?.call(el, text);
        el.dispatchEvent(new Event("input", { bubbles: true }));
        el.dispatchEvent(new Event("change", { bubbles: true }));
        el.dispatchEvent(new Event("blur", { bubbles: true }));
      },
      refSelector(ref),
      value,
    );
  }

  async uploadFile(ref: string, filePath: string): Promise<void> {
    const [chooser] = await Promise.all([
      this.page.waitForFileChooser({ timeout: SHORT_TIMEOUT_MS }),
      this.click(ref),
    ]);
    await chooser.accept([filePath]);
  }

  async pressKey(key: PageKey): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async isOverlayVisible(): Promise<boolean> {
    return this.page.evaluate(() => {
      const visible = (el: Element): boolean => {
        const style = window.getComputedStyle(el);
        if (style.display === "none" || style.visibility === "hidden") return false;
        const rect = el.getBoundingClientRect();
        return rect.width > 0 && rect.height > 0;
      };
      const masks = Array.from(document.querySelectorAll(".x-mask, .x-mask-msg"));
      if (masks.some(visible)) return true;
      return Array.from(document.querySelectorAll("div")).some(
        (el) => (el.textContent || "").trim() === "Caricamento..." && visible(el),
      );
    });
  }

  async setDownloadDirectory(directory: string): Promise<void> {
    const client = await this.page.target().createCDPSession();
    await client.send("Page.setDownloadBehavior", {
      behavior: "allow",
      downloadPath: directory,
    });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
