import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { CommandSourceService } from '../commands/command-source.service';
import { errorMessage, errorStack } from '../common/pipeline.errors';
import { AgentProcessor } from './agent.processor';
import { PipelineResult } from './agent.types';

@Injectable()
export class AgentScheduler {
  private readonly logger = new Logger(AgentScheduler.name);
  private readonly shutdown = new AbortController();
  private running = false;

  constructor(
    private readonly commandSource: CommandSourceService,
    private readonly agentProcessor: AgentProcessor,
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Stops the loop after the current instruction. Pending delays end at once.
   */
  requestShutdown(): void {
    if (!this.shutdown.signal.aborted) {
      this.logger.log('Shutdown requested');
      this.shutdown.abort();
    }
  }

  get shutdownRequested(): boolean {
    return this.shutdown.signal.aborted;
  }

  async run(): Promise<void> {
    const { commandDelayMs, pollingIntervalMs, errorBackoffMs } =
      this.config.loop;
    this.running = true;
    this.logger.log('Monitoring for new commands');

    try {
      while (!this.shutdownRequested) {
        try {
          await this.runCycle(commandDelayMs);
          await this.pause(pollingIntervalMs);
        } catch (error) {
          this.logger.error(
            `Unexpected error in main loop: ${errorMessage(error)}`,
            errorStack(error),
          );
          await this.pause(errorBackoffMs);
        }
      }
    } finally {
      this.running = false;
      this.logger.log('Agent loop stopped');
    }
  }

  /**
   * Polls once and processes the batch in file order.
   */
  async runCycle(commandDelayMs: number): Promise<PipelineResult[]> {
    const instructions = await this.commandSource.poll();
    const results: PipelineResult[] = [];

    for (const instruction of instructions) {
      if (this.shutdownRequested) {
        this.logger.log(
          `Skipping ${instructions.length - results.length} queued commands on shutdown`,
        );
        break;
      }
      results.push(await this.agentProcessor.processInstruction(instruction));
      await this.pause(commandDelayMs);
    }

    return results;
  }

  private async pause(ms: number): Promise<void> {
    if (ms <= 0 || this.shutdownRequested) {
      return;
    }
    try {
      await delay(ms, undefined, { signal: this.shutdown.signal });
    } catch (error) {
      if (!this.shutdownRequested) {
        throw error;
      }
    }
  }
}
