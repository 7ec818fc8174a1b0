import { registerAs } from '@nestjs/config';
import * as os from 'os';
import * as path from 'path';
import { ExclusionZone } from '@deskpilot/shared';

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === 'true' || raw === '1';
}

function readCorner(entry: object, key: keyof ExclusionZone): number | null {
  const value: unknown = Reflect.get(entry, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Parses `[{"x1":0,"y1":0,"x2":100,"y2":40}, ...]`. Throws on anything else.
 */
export function parseExclusionZones(raw: string | undefined): ExclusionZone[] {
  if (!raw || !raw.trim()) {
    return [];
  }

  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('DESKPILOT_EXCLUSION_ZONES must be a JSON array');
  }

  return parsed.map((entry: unknown, index) => {
    if (!entry || typeof entry !== 'object') {
      throw new Error(`Exclusion zone #${index} is not an object`);
    }
    const x1 = readCorner(entry, 'x1');
    const y1 = readCorner(entry, 'y1');
    const x2 = readCorner(entry, 'x2');
    const y2 = readCorner(entry, 'y2');
    if (x1 === null || y1 === null || x2 === null || y2 === null) {
      throw new Error(
        `Exclusion zone #${index} needs numeric x1, y1, x2 and y2`,
      );
    }
    return { x1, y1, x2, y2 };
  });
}

export function buildAgentConfig(env: Env) {
  const dataDir = env.DESKPILOT_DATA_DIR || 'data';

  return {
    inference: {
      baseUrl: (env.DESKPILOT_OLLAMA_URL || 'http://localhost:11434').replace(
        /\/+$/,
        '',
      ),
      model: env.DESKPILOT_MODEL || 'llava',
      temperature: readNumber(env, 'DESKPILOT_TEMPERATURE', 0.1),
      topP: readNumber(env, 'DESKPILOT_TOP_P', 0.9),
      timeoutMs: readNumber(env, 'DESKPILOT_INFERENCE_TIMEOUT_MS', 60_000),
    },
    files: {
      commandsFile:
        env.DESKPILOT_COMMANDS_FILE || path.join(dataDir, 'commands.txt'),
      processedFile:
        env.DESKPILOT_PROCESSED_FILE ||
        path.join(dataDir, 'processed_commands.txt'),
      rulesFile: env.DESKPILOT_RULES_FILE || path.join(dataDir, 'rules.txt'),
      screenshotDir:
        env.DESKPILOT_SCREENSHOT_DIR ||
        path.join(os.tmpdir(), 'deskpilot-screenshots'),
    },
    loop: {
      commandDelayMs: readNumber(env, 'DESKPILOT_COMMAND_DELAY_MS', 2000),
      pollingIntervalMs: readNumber(env, 'DESKPILOT_POLLING_INTERVAL_MS', 1000),
      errorBackoffMs: readNumber(env, 'DESKPILOT_ERROR_BACKOFF_MS', 5000),
    },
    executor: {
      minActionIntervalMs: readNumber(
        env,
        'DESKPILOT_MIN_ACTION_INTERVAL_MS',
        100,
      ),
      settleDelayMs: readNumber(env, 'DESKPILOT_SETTLE_DELAY_MS', 100),
      typeIntervalMs: readNumber(env, 'DESKPILOT_TYPE_INTERVAL_MS', 10),
    },
    safety: {
      maxTextLength: readNumber(env, 'DESKPILOT_MAX_TEXT_LENGTH', 10_000),
      maxWaitSeconds: readNumber(env, 'DESKPILOT_MAX_WAIT_SECONDS', 30),
      bottomMargin: readNumber(env, 'DESKPILOT_BOTTOM_MARGIN', 50),
      exclusionZones: parseExclusionZones(env.DESKPILOT_EXCLUSION_ZONES),
    },
    connectivity: {
      checkUrl: env.DESKPILOT_CONNECTIVITY_URL || 'http://www.google.com',
      checkTimeoutMs: readNumber(env, 'DESKPILOT_CONNECTIVITY_TIMEOUT_MS', 5000),
      startupWaitMs: readNumber(
        env,
        'DESKPILOT_STARTUP_CONNECTIVITY_WAIT_MS',
        60_000,
      ),
      requireAtStartup: readBoolean(
        env,
        'DESKPILOT_REQUIRE_NETWORK_AT_STARTUP',
        true,
      ),
      preDecisionWaitMs: readNumber(env, 'DESKPILOT_PRE_DECISION_WAIT_MS', 0),
    },
    logging: {
      dir: env.DESKPILOT_LOG_DIR || 'logs',
      level: env.DESKPILOT_LOG_LEVEL || 'info',
    },
  };
}

export type AgentConfig = ReturnType<typeof buildAgentConfig>;

export const agentConfig = registerAs(
  'agent',
  (): AgentConfig => buildAgentConfig(process.env),
);
