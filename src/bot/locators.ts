import type { ElementSnapshot } from "./page-driver";

const PARTIAL_TEXT_MAX_LENGTH = 100;

export type LocatorStrategy =
  | { kind: "text"; text: string; exact: boolean; tags?: string[] }
  | { kind: "role"; role: string; name?: string }
  | { kind: "idPattern"; pattern: string; text?: string }
  | {
      kind: "attribute";
      attribute: string;
      value: string;
      match: "equals" | "contains";
      text?: string;
    };

/** Ordered fallback strategies for one logical page element. */
export interface LocatorChain {
  target: string;
  strategies: LocatorStrategy[];
}

export interface LocatorMatch {
  element: ElementSnapshot;
  strategyIndex: number;
}

export const byText = (
  text: string,
  options?: { exact?: boolean; tags?: string[] },
): LocatorStrategy => ({
  kind: "text",
  text,
  exact: options?.exact ?? true,
  tags: options?.tags,
});

export const byRole = (role: string, name?: string): LocatorStrategy => ({
  kind: "role",
  role,
  name,
});

export const byIdPattern = (pattern: string, text?: string): LocatorStrategy => ({
  kind: "idPattern",
  pattern,
  text,
});

export const byAttribute = (
  attribute: string,
  value: string,
  options?: { match?: "equals" | "contains"; text?: string },
): LocatorStrategy => ({
  kind: "attribute",
  attribute,
  value,
  match: options?.match ?? "equals",
  text: options?.text,
});

export const byName = (name: string): LocatorStrategy => byAttribute("name", name);

export function chain(target: string, ...strategies: LocatorStrategy[]): LocatorChain {
  return { target, strategies };
}

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function hasText(element: ElementSnapshot, text: string): boolean {
  return normalizeText(element.text).toLowerCase() === normalizeText(text).toLowerCase();
}

function attributeValue(element: ElementSnapshot, attribute: string): string | undefined {
  switch (attribute) {
    case "id":
      return element.id || undefined;
    case "name":
      return element.name || undefined;
    case "role":
      return element.role || undefined;
    case "type":
      return element.type || element.attributes.type || undefined;
    case "class":
      return element.classes.length ? element.classes.join(" ") : undefined;
    default:
      return element.attributes[attribute];
  }
}

export function matchesStrategy(
  element: ElementSnapshot,
  strategy: LocatorStrategy,
): boolean {
  switch (strategy.kind) {
    case "text": {
      if (strategy.tags && !strategy.tags.includes(element.tag)) return false;
      const elementText = normalizeText(element.text);
      if (strategy.exact) return elementText === normalizeText(strategy.text);
      return (
        elementText.length < PARTIAL_TEXT_MAX_LENGTH &&
        elementText.toLowerCase().includes(strategy.text.toLowerCase())
      );
    }
    case "role": {
      if (element.role !== strategy.role) return false;
      if (strategy.name === undefined) return true;
      const accessibleName = element.attributes["aria-label"] || element.text;
      return normalizeText(accessibleName) === normalizeText(strategy.name);
    }
    case "idPattern": {
      if (!element.id || !new RegExp(strategy.pattern).test(element.id)) {
        return false;
      }
      return strategy.text === undefined || hasText(element, strategy.text);
    }
    case "attribute": {
      const value = attributeValue(element, strategy.attribute);
      if (value === undefined) return false;
      const matched =
        strategy.match === "equals"
          ? value === strategy.value
          : value.includes(strategy.value);
      if (!matched) return false;
      return strategy.text === undefined || hasText(element, strategy.text);
    }
  }
}

/**
 * Text matches prefer the element with the shortest text, so the button label
 * wins over the toolbar that contains it. Other strategies keep document order.
 */
function pickCandidate(
  candidates: ElementSnapshot[],
  strategy: LocatorStrategy,
): ElementSnapshot | undefined {
  if (strategy.kind !== "text") return candidates[0];
  let best: ElementSnapshot | undefined;
  for (const candidate of candidates) {
    if (!best || normalizeText(candidate.text).length < normalizeText(best.text).length) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Returns the element of the first strategy, in order, that matches a visible
 * (and enabled, when `requireInteractive`) element, or null.
 */
export function resolveLocator(
  locator: LocatorChain,
  elements: readonly ElementSnapshot[],
  options?: { requireInteractive?: boolean },
): LocatorMatch | null {
  const requireInteractive = options?.requireInteractive ?? false;
  const usable = elements.filter(
    (element) => element.visible && (!requireInteractive || element.enabled),
  );

  for (let index = 0; index < locator.strategies.length; index++) {
    const strategy = locator.strategies[index];
    const candidates = usable.filter((element) => matchesStrategy(element, strategy));
    const element = pickCandidate(candidates, strategy);
    if (element) return { element, strategyIndex: index };
  }
  return null;
}

export function describeStrategy(strategy: LocatorStrategy): string {
  switch (strategy.kind) {
    case "text":
      return `text${strategy.exact ? "=" : "~"}"${strategy.text}"`;
    case "role":
      return strategy.name ? `role=${strategy.role}("${strategy.name}")` : `role=${strategy.role}`;
    case "idPattern":
      return `id~/${strategy.pattern}/`;
    case "attribute":
      return `[${strategy.attribute}${strategy.match === "equals" ? "=" : "*="}"${strategy.value}"]`;
  }
}
