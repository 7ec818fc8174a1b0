import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  describeDecision,
  InputInjector,
  Instruction,
  ScreenCapturer,
  Screenshot,
  ScreenSize,
} from '@deskpilot/shared';
import { CommandSourceService } from '../commands/command-source.service';
import { DecisionService } from '../decision/decision.service';
import { ActionExecutorService } from '../executor/action-executor.service';
import { SafetyGateService } from '../safety/safety-gate.service';
import { INPUT_INJECTOR, SCREEN_CAPTURER } from '../nut/nut.constants';
import {
  CaptureError,
  errorMessage,
  errorStack,
  ExecutionError,
  PipelineError,
} from '../common/pipeline.errors';
import { PipelineResult } from './agent.types';

/**
 * Runs one instruction through capture, decision, safety gate and
 * execution. Any failure ends the pass early; every pass, whatever its
 * result, marks the instruction attempted.
 */
@Injectable()
export class AgentProcessor {
  private readonly logger = new Logger(AgentProcessor.name);

  constructor(
    private readonly commandSource: CommandSourceService,
    private readonly decisionService: DecisionService,
    private readonly safetyGate: SafetyGateService,
    private readonly actionExecutor: ActionExecutorService,
    @Inject(SCREEN_CAPTURER) private readonly capturer: ScreenCapturer,
    @Inject(INPUT_INJECTOR) private readonly injector: InputInjector,
  ) {}

  async processInstruction(instruction: Instruction): Promise<PipelineResult> {
    const result: PipelineResult = {
      instruction,
      status: 'failure',
      lastState: 'polled',
    };
    this.logger.log(
      `Processing command (line ${instruction.lineNumber}): ${instruction.text}`,
    );

    try {
      const { screen, screenshot } = await this.observe();
      result.lastState = 'captured';

      const decision = await this.decisionService.decide(
        screenshot,
        instruction,
      );
      result.decision = decision;
      result.lastState = 'decided';

      this.safetyGate.assertSafe(decision, this.safetyGate.buildPolicy(screen));
      result.lastState = 'gated';

      const outcome = await this.actionExecutor.execute(decision);
      result.outcome = outcome;
      result.lastState = 'executed';

      if (outcome.success) {
        result.status = 'success';
        this.logger.log(
          `Command succeeded: ${instruction.text} -> ${describeDecision(decision)}`,
        );
      } else {
        result.error = new ExecutionError(outcome.error ?? 'Action failed');
      }
    } catch (error) {
      result.error = error instanceof Error ? error : new Error(String(error));
    } finally {
      await this.commandSource.markAttempted(instruction);
    }

    if (result.status === 'failure') {
      const stage =
        result.error instanceof PipelineError ? result.error.stage : 'unknown';
      this.logger.error(
        `Command failed at ${stage} (${result.lastState}): ${instruction.text}: ${errorMessage(result.error)}`,
        errorStack(result.error),
      );
    }

    return result;
  }

  private async observe(): Promise<{
    screen: ScreenSize;
    screenshot: Screenshot;
  }> {
    try {
      const screen = await this.injector.getScreenSize();
      const screenshot = await this.capturer.capture();
      return { screen, screenshot };
    } catch (error) {
      throw new CaptureError(
        `Failed to capture screen: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
