import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { errorMessage } from '../common/pipeline.errors';

export interface BackoffOptions {
  initialDelayMs?: number;
  maxDelayMs?: number;
}

@Injectable()
export class ConnectivityService {
  private readonly logger = new Logger(ConnectivityService.name);
  private readonly checkUrl: string;
  private readonly checkTimeout: number;

  constructor(@Inject(agentConfig.KEY) config: AgentConfig) {
    this.checkUrl = config.connectivity.checkUrl;
    this.checkTimeout = config.connectivity.checkTimeoutMs;
  }

  async isOnline(): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.checkTimeout);
    try {
      const response = await fetch(this.checkUrl, {
        method: 'GET',
        signal: controller.signal,
      });
      const online = response.ok;
      await response.body?.cancel();
      return online;
    } catch (error) {
      this.logger.debug(`Connectivity probe failed: ${errorMessage(error)}`);
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Probes until the network answers or `timeoutMs` elapses. The delay
   * between probes doubles up to `maxDelayMs` and never overshoots the
   * deadline.
   */
  async waitForConnectivity(
    timeoutMs: number,
    { initialDelayMs = 1000, maxDelayMs = 10_000 }: BackoffOptions = {},
  ): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    let nextDelay = initialDelayMs;
    let attempt = 0;

    for (;;) {
      attempt++;
      if (await this.isOnline()) {
        if (attempt > 1) {
          this.logger.log(`Network available after ${attempt} attempts`);
        }
        return true;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn(
          `Network unavailable after ${attempt} attempts (${timeoutMs}ms)`,
        );
        return false;
      }

      this.logger.debug(`Network unavailable, retrying in ${nextDelay}ms`);
      await delay(Math.min(nextDelay, remaining));
      nextDelay = Math.min(nextDelay * 2, maxDelayMs);
    }
  }
}
