import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
} from 'class-validator';
import {
  MOUSE_BUTTONS,
  MouseButton,
  SCROLL_DIRECTIONS,
  ScrollDirection,
} from '@deskpilot/shared';

/**
 * Fields shared by every decision the model may propose
 */
abstract class BaseDecisionDto {
  abstract action: string;

  @IsOptional()
  @IsString()
  reasoning?: string | null;
}

export class ClickDecisionDto extends BaseDecisionDto {
  @IsIn(['click'])
  action!: 'click';

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  coordinates!: number[];

  @IsOptional()
  @IsIn([...MOUSE_BUTTONS])
  button?: MouseButton;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(3)
  clickCount?: number;
}

export class TypeDecisionDto extends BaseDecisionDto {
  @IsIn(['type'])
  action!: 'type';

  @IsString()
  text!: string;
}

export class KeyDecisionDto extends BaseDecisionDto {
  @IsIn(['key'])
  action!: 'key';

  @IsString()
  key!: string;
}

export class ScrollDecisionDto extends BaseDecisionDto {
  @IsIn(['scroll'])
  action!: 'scroll';

  @IsIn([...SCROLL_DIRECTIONS])
  direction!: ScrollDirection;

  // Signed wheel steps; a negative amount scrolls the other way
  @IsOptional()
  @IsNumber()
  amount?: number;
}

export class WaitDecisionDto extends BaseDecisionDto {
  @IsIn(['wait'])
  action!: 'wait';

  @IsOptional()
  @IsNumber()
  @IsPositive()
  duration?: number;
}
