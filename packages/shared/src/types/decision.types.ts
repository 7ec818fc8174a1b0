export const DECISION_ACTIONS = [
  "click",
  "type",
  "key",
  "scroll",
  "wait",
] as const;

export type DecisionAction = (typeof DECISION_ACTIONS)[number];

export const SCROLL_DIRECTIONS = ["up", "down", "left", "right"] as const;

export type ScrollDirection = (typeof SCROLL_DIRECTIONS)[number];

export const MOUSE_BUTTONS = ["left", "right", "middle"] as const;

export type MouseButton = (typeof MOUSE_BUTTONS)[number];

export type Coordinates = { x: number; y: number };

// One variant per action; each carries only its own payload
export type ClickDecision = {
  action: "click";
  coordinates: Coordinates;
  button: MouseButton;
  clickCount: number;
  reasoning: string;
};

export type TypeDecision = {
  action: "type";
  text: string;
  reasoning: string;
};

export type KeyDecision = {
  action: "key";
  key: string;
  reasoning: string;
};

export type ScrollDecision = {
  action: "scroll";
  direction: ScrollDirection;
  amount: number;
  reasoning: string;
};

export type WaitDecision = {
  action: "wait";
  duration: number;
  reasoning: string;
};

export type Decision =
  | ClickDecision
  | TypeDecision
  | KeyDecision
  | ScrollDecision
  | WaitDecision;

export type ActionOutcome = {
  success: boolean;
  action: DecisionAction;
  timestamp: Date;
  durationMs: number;
  error?: string;
};
