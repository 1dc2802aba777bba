import type { ElementSnapshot, PageDriver, PageKey } from '../bot/page-driver';

export type Interaction =
  | { type: 'goto'; url: string }
  | { type: 'reload' }
  | { type: 'click'; ref: string }
  | { type: 'setValue'; ref: string; value: string }
  | { type: 'upload'; ref: string; filePath: string }
  | { type: 'pressKey'; key: PageKey };

type Handler = (portal: FakePortal) => void | Promise<void>;

/**
 * In-process stand-in for a browser tab. Holds a flat list of element
 * snapshots, records every interaction and runs scripted handlers on click,
 * navigation and reload.
 */
export class FakePortal implements PageDriver {
  readonly interactions: Interaction[] = [];
  overlayVisible = false;
  downloadDirectory: string | null = null;
  closed = false;

  private elements: ElementSnapshot[] = [];
  private url = 'about:blank';
  private readonly clickHandlers = new Map<string, Handler>();
  private gotoHandler: ((portal: FakePortal, url: string) => void) | null = null;
  private reloadHandler: Handler | null = null;
  private overlayChecksRemaining = 0;

  setElements(elements: ElementSnapshot[]): void {
    this.elements = elements.map(copyElement);
  }

  addElements(...elements: ElementSnapshot[]): void {
    this.elements.push(...elements.map(copyElement));
  }

  removeElements(...refs: string[]): void {
    this.elements = this.elements.filter((el) => !refs.includes(el.ref));
  }

  element(ref: string): ElementSnapshot | undefined {
    return this.elements.find((el) => el.ref === ref);
  }

  valueOf(ref: string): string | undefined {
    return this.element(ref)?.value;
  }

  setUrl(url: string): void {
    this.url = url;
  }

  onClick(ref: string, handler: Handler): void {
    this.clickHandlers.set(ref, handler);
  }

  onGoto(handler: (portal: FakePortal, url: string) => void): void {
    this.gotoHandler = handler;
  }

  onReload(handler: Handler): void {
    this.reloadHandler = handler;
  }

  /** Shows the loading mask for the next `checks` overlay probes. */
  showOverlayFor(checks: number): void {
    this.overlayChecksRemaining = checks;
  }

  clicks(): string[] {
    return this.interactions.flatMap((i) => (i.type === 'click' ? [i.ref] : []));
  }

  domInteractionCount(): number {
    return this.interactions.filter((i) => i.type !== 'goto' && i.type !== 'reload')
      .length;
  }

  clearInteractions(): void {
    this.interactions.length = 0;
  }

  async goto(url: string): Promise<void> {
    this.interactions.push({ type: 'goto', url });
    this.url = url;
    this.gotoHandler?.(this, url);
  }

  async reload(): Promise<void> {
    this.interactions.push({ type: 'reload' });
    if (this.reloadHandler) await this.reloadHandler(this);
  }

  currentUrl(): string {
    return this.url;
  }

  async snapshot(): Promise<ElementSnapshot[]> {
    return this.elements.map(copyElement);
  }

  async click(ref: string): Promise<void> {
    this.requireElement(ref);
    this.interactions.push({ type: 'click', ref });
    const handler = this.clickHandlers.get(ref);
    if (handler) await handler(this);
  }

  async setValue(ref: string, value: string): Promise<void> {
    const target = this.requireElement(ref);
    this.interactions.push({ type: 'setValue', ref, value });
    target.value = value;
  }

  async uploadFile(ref: string, filePath: string): Promise<void> {
    this.requireElement(ref);
    this.interactions.push({ type: 'upload', ref, filePath });
  }

  async pressKey(key: PageKey): Promise<void> {
    this.interactions.push({ type: 'pressKey', key });
  }

  async isOverlayVisible(): Promise<boolean> {
    if (this.overlayChecksRemaining > 0) {
      this.overlayChecksRemaining -= 1;
      return true;
    }
    return this.overlayVisible;
  }

  async setDownloadDirectory(directory: string): Promise<void> {
    this.downloadDirectory = directory;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private requireElement(ref: string): ElementSnapshot {
    const target = this.element(ref);
    if (!target) throw new Error(`Element ${ref} is no longer attached`);
    return target;
  }
}

function copyElement(el: ElementSnapshot): ElementSnapshot {
  return { ...el, classes: [...el.classes], attributes: { ...el.attributes } };
}
