export * from "./types/decision.types";
export * from "./types/desktop.types";
export * from "./types/instruction.types";
export * from "./types/safetyPolicy.types";
export * from "./utils/decision.utils";
