/**
 * One queued natural-language request. Its identity is its exact text.
 */
export type Instruction = {
  text: string;
  lineNumber: number;
};

export type InstructionHistoryEntry = {
  instruction: string;
  processedAt: Date | null;
};
