import { ClassConstructor, plainToInstance } from 'class-transformer';
import {
  validateSync,
  ValidationError as ConstraintViolation,
} from 'class-validator';
import { Decision, DecisionAction, isDecisionAction } from '@deskpilot/shared';
import { ValidationError } from '../common/pipeline.errors';
import {
  ClickDecisionDto,
  KeyDecisionDto,
  ScrollDecisionDto,
  TypeDecisionDto,
  WaitDecisionDto,
} from './dto/decision.dto';

export const DEFAULT_SCROLL_AMOUNT = 3;
export const DEFAULT_WAIT_SECONDS = 1.0;

function collectIssues(errors: ConstraintViolation[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = `${prefix}${error.property}`;
    const own = Object.values(error.constraints ?? {});
    const nested = collectIssues(error.children ?? [], `${path}.`);
    return own.length > 0 || nested.length > 0
      ? [...own, ...nested]
      : [`${path} is invalid`];
  });
}

function validateDto<T extends object>(
  dtoClass: ClassConstructor<T>,
  plain: object,
): T {
  const dto = plainToInstance(dtoClass, plain);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new ValidationError(collectIssues(errors));
  }
  return dto;
}

function readAction(value: object): DecisionAction {
  const raw: unknown = Reflect.get(value, 'action');
  if (raw === undefined || raw === null) {
    throw new ValidationError(['action is required']);
  }
  if (typeof raw !== 'string') {
    throw new ValidationError(['action must be a string']);
  }

  const action = raw.trim().toLowerCase();
  if (!isDecisionAction(action)) {
    throw new ValidationError([`unknown action "${raw}"`]);
  }
  return action;
}

// Button names are matched like actions; other values are left to the DTO
function readButton(value: object): { button?: string } {
  const raw: unknown = Reflect.get(value, 'button');
  return typeof raw === 'string' ? { button: raw.trim().toLowerCase() } : {};
}

/**
 * Checks a parsed model reply against the decision schema and returns the
 * typed variant for its action. Fields belonging to other actions are
 * dropped. Every failed constraint is reported in one `ValidationError`.
 */
export function parseDecision(value: unknown): Decision {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(['decision must be a JSON object']);
  }

  const action = readAction(value);
  const plain = { ...value, action, ...readButton(value) };

  switch (action) {
    case 'click': {
      const dto = validateDto(ClickDecisionDto, plain);
      // Whole pixels here, so the gate checks the point the executor clicks
      const [x, y] = dto.coordinates.map(Math.floor);
      return {
        action,
        coordinates: { x, y },
        button: dto.button ?? 'left',
        clickCount: dto.clickCount ?? 1,
        reasoning: dto.reasoning ?? '',
      };
    }
    case 'type': {
      const dto = validateDto(TypeDecisionDto, plain);
      return { action, text: dto.text, reasoning: dto.reasoning ?? '' };
    }
    case 'key': {
      const dto = validateDto(KeyDecisionDto, plain);
      return { action, key: dto.key, reasoning: dto.reasoning ?? '' };
    }
    case 'scroll': {
      const dto = validateDto(ScrollDecisionDto, plain);
      return {
        action,
        direction: dto.direction,
        amount: dto.amount ?? DEFAULT_SCROLL_AMOUNT,
        reasoning: dto.reasoning ?? '',
      };
    }
    case 'wait': {
      const dto = validateDto(WaitDecisionDto, plain);
      return {
        action,
        duration: dto.duration ?? DEFAULT_WAIT_SECONDS,
        reasoning: dto.reasoning ?? '',
      };
    }
  }
}
