import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import {
  ActionOutcome,
  ClickDecision,
  Decision,
  describeDecision,
  InputInjector,
  KeyDecision,
  ScrollDecision,
  ScrollDirection,
  splitKeyCombo,
} from '@deskpilot/shared';
import { agentConfig, AgentConfig } from '../config/agent.config';
import {
  errorMessage,
  errorStack,
  ExecutionError,
} from '../common/pipeline.errors';
import { INPUT_INJECTOR } from '../nut/nut.constants';

const OPPOSITE_DIRECTION: Record<ScrollDirection, ScrollDirection> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

const MIN_MOVE_SECONDS = 0.1;
const MAX_MOVE_SECONDS = 0.5;

/**
 * Pointer travel time: Manhattan distance / 1000 seconds, clamped to
 * [0.1, 0.5].
 */
export function moveDurationMs(
  from: { x: number; y: number },
  to: { x: number; y: number },
): number {
  const seconds =
    (Math.abs(to.x - from.x) + Math.abs(to.y - from.y)) / 1000;
  return (
    Math.min(MAX_MOVE_SECONDS, Math.max(MIN_MOVE_SECONDS, seconds)) * 1000
  );
}

/**
 * Performs approved decisions on the input injector, one at a time.
 * Failures are reported in the outcome and never thrown.
 */
@Injectable()
export class ActionExecutorService {
  private readonly logger = new Logger(ActionExecutorService.name);
  private readonly minActionInterval: number;
  private readonly settleDelay: number;
  private readonly typeInterval: number;
  private lastActionAt: number | null = null;

  constructor(
    @Inject(INPUT_INJECTOR) private readonly injector: InputInjector,
    @Inject(agentConfig.KEY) config: AgentConfig,
  ) {
    this.minActionInterval = config.executor.minActionIntervalMs;
    this.settleDelay = config.executor.settleDelayMs;
    this.typeInterval = config.executor.typeIntervalMs;
  }

  async execute(decision: Decision): Promise<ActionOutcome> {
    await this.waitForSpacing();

    const startTime = Date.now();
    try {
      await this.dispatch(decision);
    } catch (error) {
      const failure =
        error instanceof ExecutionError
          ? error
          : new ExecutionError(
              `Failed to ${decision.action}: ${errorMessage(error)}`,
              { cause: error },
            );
      this.logger.error(
        `Execution failed for ${describeDecision(decision)}: ${failure.message}`,
        errorStack(error),
      );
      return {
        success: false,
        action: decision.action,
        timestamp: new Date(),
        durationMs: Date.now() - startTime,
        error: failure.message,
      };
    }

    const completedAt = Date.now();
    this.lastActionAt = completedAt;
    this.logger.log(`Executed ${describeDecision(decision)}`);

    if (this.settleDelay > 0) {
      await delay(this.settleDelay);
    }

    return {
      success: true,
      action: decision.action,
      timestamp: new Date(completedAt),
      durationMs: completedAt - startTime,
    };
  }

  private async waitForSpacing(): Promise<void> {
    if (this.lastActionAt === null) {
      return;
    }
    const remaining = this.minActionInterval - (Date.now() - this.lastActionAt);
    if (remaining > 0) {
      await delay(remaining);
    }
  }

  private async dispatch(decision: Decision): Promise<void> {
    switch (decision.action) {
      case 'click':
        return this.click(decision);
      case 'type':
        if (decision.text.length === 0) {
          throw new ExecutionError('Cannot type empty text');
        }
        return this.injector.typeText(decision.text, this.typeInterval);
      case 'key':
        return this.pressKey(decision);
      case 'scroll':
        return this.scroll(decision);
      case 'wait':
        await delay(decision.duration * 1000);
        return;
    }
  }

  private async click({
    coordinates,
    button,
    clickCount,
  }: ClickDecision): Promise<void> {
    const current = await this.injector.getCursorPosition();
    await this.injector.moveTo(
      coordinates.x,
      coordinates.y,
      moveDurationMs(current, coordinates),
    );

    for (let i = 0; i < clickCount; i++) {
      switch (button) {
        case 'left':
          await this.injector.click();
          break;
        case 'right':
          await this.injector.rightClick();
          break;
        case 'middle':
          await this.injector.middleClick();
          break;
      }
    }
  }

  private async scroll({ direction, amount }: ScrollDecision): Promise<void> {
    const steps = Math.round(Math.abs(amount));
    if (steps === 0) {
      this.logger.debug(`Scroll amount ${amount} is below one step`);
      return;
    }
    const at = await this.injector.getCursorPosition();
    await this.injector.scroll(
      amount < 0 ? OPPOSITE_DIRECTION[direction] : direction,
      steps,
      at,
    );
  }

  private async pressKey({ key }: KeyDecision): Promise<void> {
    const keys = splitKeyCombo(key);

    if (keys.length === 0) {
      throw new ExecutionError('Cannot press an empty key');
    }
    if (keys.length === 1) {
      await this.injector.pressKey(keys[0]);
      return;
    }
    await this.injector.pressCombo(keys);
  }
}
