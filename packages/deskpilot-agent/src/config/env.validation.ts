import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { parseExclusionZones } from './agent.config';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export class EnvironmentVariables {
  @IsOptional()
  @IsUrl({ require_tld: false })
  DESKPILOT_OLLAMA_URL?: string;

  @IsOptional()
  @IsString()
  DESKPILOT_MODEL?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  DESKPILOT_TEMPERATURE?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  DESKPILOT_TOP_P?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  DESKPILOT_INFERENCE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_COMMAND_DELAY_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_POLLING_INTERVAL_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_ERROR_BACKOFF_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_MIN_ACTION_INTERVAL_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_SETTLE_DELAY_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_TYPE_INTERVAL_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  DESKPILOT_MAX_TEXT_LENGTH?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_MAX_WAIT_SECONDS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_BOTTOM_MARGIN?: number;

  @IsOptional()
  @IsString()
  DESKPILOT_EXCLUSION_ZONES?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  DESKPILOT_CONNECTIVITY_URL?: string;

  @IsOptional()
  @IsNumber()
  @Min(1)
  DESKPILOT_CONNECTIVITY_TIMEOUT_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_STARTUP_CONNECTIVITY_WAIT_MS?: number;

  @IsOptional()
  @IsBooleanString()
  DESKPILOT_REQUIRE_NETWORK_AT_STARTUP?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  DESKPILOT_PRE_DECISION_WAIT_MS?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  DESKPILOT_LOG_LEVEL?: string;
}

/**
 * `validate` hook for ConfigModule. Numbers arrive as strings and are
 * converted before the checks run.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  const messages = errors.flatMap((error) =>
    Object.values(error.constraints ?? {}),
  );

  if (typeof config.DESKPILOT_EXCLUSION_ZONES === 'string') {
    try {
      parseExclusionZones(config.DESKPILOT_EXCLUSION_ZONES);
    } catch (error) {
      messages.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (messages.length > 0) {
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }

  return config;
}
