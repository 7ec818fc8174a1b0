import { ActionOutcome, Decision, Instruction } from '@deskpilot/shared';

export type PipelineState =
  | 'polled'
  | 'captured'
  | 'decided'
  | 'gated'
  | 'executed';

export type PipelineStatus = 'success' | 'failure';

export interface PipelineResult {
  instruction: Instruction;
  status: PipelineStatus;
  /** Furthest state reached; the instruction is marked attempted regardless */
  lastState: PipelineState;
  decision?: Decision;
  outcome?: ActionOutcome;
  error?: Error;
}
