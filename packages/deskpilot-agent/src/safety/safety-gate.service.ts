import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  Decision,
  describeDecision,
  ExclusionZone,
  SafetyPolicy,
  SafetyVerdict,
  ScreenSize,
  splitKeyCombo,
} from '@deskpilot/shared';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { SafetyViolation } from '../common/pipeline.errors';
import {
  FORBIDDEN_KEY_COMBOS,
  FORBIDDEN_TEXT_PATTERNS,
} from './safety.constants';

const APPROVED: SafetyVerdict = { approved: true };

const reject = (reason: string): SafetyVerdict => ({ approved: false, reason });

/** Canonical `a+b` form of a chord; segment order is kept. */
export function normalizeKeyCombo(key: string): string {
  return splitKeyCombo(key).join('+');
}

function insideZone(x: number, y: number, zone: ExclusionZone): boolean {
  return x >= zone.x1 && x <= zone.x2 && y >= zone.y1 && y <= zone.y2;
}

/**
 * Pure policy check for one decision.
 */
export function evaluateDecision(
  decision: Decision,
  policy: SafetyPolicy,
): SafetyVerdict {
  switch (decision.action) {
    case 'click': {
      const { x, y } = decision.coordinates;
      if (x < 0 || x >= policy.screenWidth || y < 0 || y >= policy.screenHeight) {
        return reject(
          `click (${x}, ${y}) outside screen ${policy.screenWidth}x${policy.screenHeight}`,
        );
      }
      if (y >= policy.screenHeight - policy.bottomMargin) {
        return reject(
          `click (${x}, ${y}) inside the bottom ${policy.bottomMargin}px band`,
        );
      }
      const zone = policy.exclusionZones.find((candidate) =>
        insideZone(x, y, candidate),
      );
      if (zone) {
        return reject(
          `click (${x}, ${y}) inside exclusion zone (${zone.x1}, ${zone.y1})-(${zone.x2}, ${zone.y2})`,
        );
      }
      return APPROVED;
    }
    case 'type': {
      if (decision.text.length > policy.maxTextLength) {
        return reject(
          `text length ${decision.text.length} exceeds ${policy.maxTextLength}`,
        );
      }
      const lowered = decision.text.toLowerCase();
      const pattern = policy.forbiddenTextPatterns.find((candidate) =>
        lowered.includes(candidate.toLowerCase()),
      );
      return pattern ? reject(`text contains "${pattern}"`) : APPROVED;
    }
    case 'key': {
      const combo = normalizeKeyCombo(decision.key);
      const forbidden = policy.forbiddenKeyCombos.some(
        (candidate) => normalizeKeyCombo(candidate) === combo,
      );
      return forbidden ? reject(`key combination "${combo}" is forbidden`) : APPROVED;
    }
    case 'scroll':
      return APPROVED;
    case 'wait':
      if (!(decision.duration > 0 && decision.duration <= policy.maxWaitSeconds)) {
        return reject(
          `wait ${decision.duration}s outside (0, ${policy.maxWaitSeconds}]`,
        );
      }
      return APPROVED;
  }
}

@Injectable()
export class SafetyGateService {
  private readonly logger = new Logger(SafetyGateService.name);

  constructor(@Inject(agentConfig.KEY) private readonly config: AgentConfig) {}

  /**
   * Combines the configured limits with the current screen bounds.
   */
  buildPolicy(screen: ScreenSize): SafetyPolicy {
    const { safety } = this.config;
    return Object.freeze({
      screenWidth: screen.width,
      screenHeight: screen.height,
      bottomMargin: safety.bottomMargin,
      exclusionZones: Object.freeze([...safety.exclusionZones]),
      forbiddenTextPatterns: FORBIDDEN_TEXT_PATTERNS,
      forbiddenKeyCombos: FORBIDDEN_KEY_COMBOS,
      maxTextLength: safety.maxTextLength,
      maxWaitSeconds: safety.maxWaitSeconds,
    });
  }

  check(decision: Decision, policy: SafetyPolicy): SafetyVerdict {
    return evaluateDecision(decision, policy);
  }

  assertSafe(decision: Decision, policy: SafetyPolicy): void {
    const verdict = this.check(decision, policy);
    if (!verdict.approved) {
      this.logger.warn(
        `Rejected ${describeDecision(decision)}: ${verdict.reason}`,
      );
      throw new SafetyViolation(verdict.reason);
    }
  }
}
