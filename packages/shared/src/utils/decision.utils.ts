import {
  ClickDecision,
  DECISION_ACTIONS,
  Decision,
  DecisionAction,
  KeyDecision,
  ScrollDecision,
  TypeDecision,
  WaitDecision,
} from "../types/decision.types";

/**
 * Type guard factory for decisions
 */
function createDecisionTypeGuard<T extends Decision>(
  action: T["action"],
): (decision: Decision) => decision is T {
  return (decision: Decision): decision is T => decision.action === action;
}

export const isClickDecision = createDecisionTypeGuard<ClickDecision>("click");
export const isTypeDecision = createDecisionTypeGuard<TypeDecision>("type");
export const isKeyDecision = createDecisionTypeGuard<KeyDecision>("key");
export const isScrollDecision =
  createDecisionTypeGuard<ScrollDecision>("scroll");
export const isWaitDecision = createDecisionTypeGuard<WaitDecision>("wait");

export function isDecisionAction(value: string): value is DecisionAction {
  return DECISION_ACTIONS.some((action) => action === value);
}

/**
 * Key names of a `+`-joined chord, trimmed and lowercased. Empty segments
 * (`alt+f4+`, `win++r`) are dropped so the chord checked is the chord pressed.
 */
export function splitKeyCombo(key: string): string[] {
  return key
    .split("+")
    .map((segment) => segment.trim().toLowerCase())
    .filter((segment) => segment.length > 0);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

/**
 * One-line summary used in log output. Typed text is shortened.
 */
export function describeDecision(decision: Decision): string {
  switch (decision.action) {
    case "click": {
      const { x, y } = decision.coordinates;
      const times = decision.clickCount > 1 ? ` x${decision.clickCount}` : "";
      return `click ${decision.button} at (${x}, ${y})${times}`;
    }
    case "type":
      return `type "${truncate(decision.text, 50)}"`;
    case "key":
      return `key ${decision.key}`;
    case "scroll":
      return `scroll ${decision.direction} by ${decision.amount}`;
    case "wait":
      return `wait ${decision.duration}s`;
  }
}
