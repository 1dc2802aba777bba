import { isInputElement } from "./page-driver";
import type { ElementSnapshot } from "./page-driver";
import { normalizeText } from "./locators";

const NON_TEXT_INPUT_TYPES = new Set([
  "hidden",
  "button",
  "submit",
  "file",
  "checkbox",
  "radio",
]);

/** Hints for an input whose id is generated and changes on every page load. */
export interface FieldHint {
  target: string;
  name?: string;
  label?: string;
  valuePattern?: RegExp;
  container?: string;
}

export type FieldHeuristic = "name" | "label" | "value-shape" | "container" | "combined";

export type FieldResolution =
  | { status: "found"; element: ElementSnapshot; heuristic: FieldHeuristic }
  | { status: "not-found" }
  | { status: "ambiguous"; candidates: number };

type Heuristic = {
  id: Exclude<FieldHeuristic, "combined">;
  test: (element: ElementSnapshot) => boolean;
};

const contains = (haystack: string, needle: string): boolean =>
  normalizeText(haystack).toLowerCase().includes(normalizeText(needle).toLowerCase());

function applicableHeuristics(hint: FieldHint): Heuristic[] {
  const heuristics: Heuristic[] = [];
  const { name, label, valuePattern, container } = hint;
  if (name) {
    heuristics.push({
      id: "name",
      test: (el) => el.name.toLowerCase() === name.toLowerCase(),
    });
  }
  if (label) {
    heuristics.push({
      id: "label",
      test: (el) => el.labelText !== "" && contains(el.labelText, label),
    });
  }
  if (valuePattern) {
    heuristics.push({
      id: "value-shape",
      test: (el) =>
        (el.value !== "" && valuePattern.test(el.value)) ||
        (el.placeholder !== "" && valuePattern.test(el.placeholder)),
    });
  }
  if (container) {
    heuristics.push({
      id: "container",
      test: (el) => el.containerText !== "" && contains(el.containerText, container),
    });
  }
  return heuristics;
}

export function isFillableCandidate(element: ElementSnapshot): boolean {
  return (
    element.visible &&
    isInputElement(element) &&
    !NON_TEXT_INPUT_TYPES.has(element.type.toLowerCase())
  );
}

/**
 * Applies name, label, value shape and container heuristics in that order and
 * returns the first that isolates a single input. Falls back to the inputs
 * accepted by every applicable heuristic.
 */
export function resolveAmbiguousField(
  hint: FieldHint,
  elements: readonly ElementSnapshot[],
): FieldResolution {
  const candidates = elements.filter(isFillableCandidate);
  const heuristics = applicableHeuristics(hint);
  if (heuristics.length === 0 || candidates.length === 0) {
    return { status: "not-found" };
  }

  let widest = 0;
  for (const heuristic of heuristics) {
    const matches = candidates.filter(heuristic.test);
    if (matches.length === 1) {
      return { status: "found", element: matches[0], heuristic: heuristic.id };
    }
    widest = Math.max(widest, matches.length);
  }

  const combined = candidates.filter((el) => heuristics.every((h) => h.test(el)));
  if (combined.length === 1) {
    return { status: "found", element: combined[0], heuristic: "combined" };
  }
  if (widest === 0) return { status: "not-found" };
  return { status: "ambiguous", candidates: combined.length || widest };
}
