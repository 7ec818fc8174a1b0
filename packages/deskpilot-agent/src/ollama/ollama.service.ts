import { Inject, Injectable, Logger } from '@nestjs/common';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { errorMessage, InferenceError } from '../common/pipeline.errors';

export interface OllamaHealth {
  reachable: boolean;
  version: string | null;
  modelAvailable: boolean;
  models: string[];
}

const HEALTH_TIMEOUT_MS = 5000;

function readString(value: unknown, key: string): string | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : null;
}

function readModelNames(body: unknown): string[] {
  if (typeof body !== 'object' || body === null) {
    return [];
  }
  const models: unknown = Reflect.get(body, 'models');
  if (!Array.isArray(models)) {
    return [];
  }
  return models
    .map((model: unknown) => readString(model, 'name'))
    .filter((name): name is string => name !== null);
}

// "llava" matches "llava:latest"; a tagged name must match exactly
function isModelListed(model: string, names: string[]): boolean {
  return names.some(
    (name) =>
      name === model || (!model.includes(':') && name.split(':')[0] === model),
  );
}

/**
 * Reads the whole body as text, rejecting once `signal` aborts even when the
 * stream itself never settles.
 */
async function readBody(
  response: Response,
  signal: AbortSignal,
): Promise<string> {
  let detach = (): void => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    const onAbort = () => reject(new Error('Body read aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    detach = () => signal.removeEventListener('abort', onAbort);
  });

  try {
    return await Promise.race([response.text(), aborted]);
  } finally {
    detach();
  }
}

/**
 * Thin client for an Ollama-compatible inference server.
 */
@Injectable()
export class OllamaService {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly topP: number;
  private readonly timeout: number;

  constructor(@Inject(agentConfig.KEY) config: AgentConfig) {
    this.baseUrl = config.inference.baseUrl;
    this.model = config.inference.model;
    this.temperature = config.inference.temperature;
    this.topP = config.inference.topP;
    this.timeout = config.inference.timeoutMs;
  }

  get modelName(): string {
    return this.model;
  }

  /**
   * Sends one non-streaming generation request with the screenshot attached
   * and returns the raw `response` text. The timeout covers the body read.
   */
  async generate(prompt: string, imageBase64: string): Promise<string> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt,
          images: [imageBase64],
          stream: false,
          options: {
            temperature: this.temperature,
            top_p: this.topP,
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await readBody(response, controller.signal).catch(
          (error: unknown) => {
            this.logger.debug(
              `Could not read error body: ${errorMessage(error)}`,
            );
            return '';
          },
        );
        throw new InferenceError(
          'http_status',
          `Inference request failed: ${response.status} ${errorText}`.trim(),
        );
      }

      const raw = await readBody(response, controller.signal);
      let body: unknown;
      try {
        body = JSON.parse(raw);
      } catch (error) {
        throw new InferenceError(
          'malformed',
          'Inference service returned a non-JSON body',
          { cause: error },
        );
      }

      const text = readString(body, 'response');
      if (text === null) {
        throw new InferenceError(
          'malformed',
          'Inference service reply has no "response" text',
        );
      }

      this.logger.debug(
        `Model ${this.model} answered in ${Date.now() - startTime}ms (${text.length} chars)`,
      );
      return text;
    } catch (error) {
      if (error instanceof InferenceError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new InferenceError(
          'timeout',
          `Inference request timed out after ${this.timeout}ms`,
          { cause: error },
        );
      }
      throw new InferenceError(
        'transport',
        `Inference request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Probes `/api/version` and `/api/tags`. Never throws.
   */
  async checkHealth(): Promise<OllamaHealth> {
    const health: OllamaHealth = {
      reachable: false,
      version: null,
      modelAvailable: false,
      models: [],
    };

    try {
      const versionBody = await this.getJson('/api/version');
      health.reachable = true;
      health.version = readString(versionBody, 'version');

      health.models = readModelNames(await this.getJson('/api/tags'));
      health.modelAvailable = isModelListed(this.model, health.models);
    } catch (error) {
      this.logger.debug(`Health check failed: ${errorMessage(error)}`);
    }

    return health;
  }

  private async getJson(endpoint: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), HEALTH_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.baseUrl}${endpoint}`, {
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`${endpoint} returned ${response.status}`);
      }
      return JSON.parse(await readBody(response, controller.signal));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
