/**
 * Serialisable view of one DOM element. Locating logic runs on these in Node;
 * only clicks and value assignment go back to the live page, addressed by `ref`.
 */
export interface ElementSnapshot {
  ref: string;
  tag: string;
  text: string;
  id: string;
  role: string;
  name: string;
  type: string;
  classes: string[];
  attributes: Record<string, string>;
  value: string;
  placeholder: string;
  labelText: string;
  containerText: string;
  visible: boolean;
  enabled: boolean;
  readOnly: boolean;
}

export type PageKey = "Enter" | "Escape" | "Tab" | "Space";

/**
 * Minimal page surface the bot needs. `PuppeteerPageDriver` implements it
 * against a real browser tab, tests use an in-process fake portal.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  reload(timeoutMs: number): Promise<void>;
  currentUrl(): string;
  snapshot(): Promise<ElementSnapshot[]>;
  click(ref: string): Promise<void>;
  setValue(ref: string, value: string): Promise<void>;
  uploadFile(ref: string, filePath: string): Promise<void>;
  pressKey(key: PageKey): Promise<void>;
  isOverlayVisible(): Promise<boolean>;
  setDownloadDirectory(directory: string): Promise<void>;
  close(): Promise<void>;
}

export const INPUT_TAGS: ReadonlySet<string> = new Set([
  "input",
  "textarea",
  "select",
]);

export function isInputElement(element: ElementSnapshot): boolean {
  return INPUT_TAGS.has(element.tag);
}
