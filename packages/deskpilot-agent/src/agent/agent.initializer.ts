import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InputInjector,
  ScreenCapturer,
  ScreenSize,
} from '@deskpilot/shared';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { ConnectivityService } from '../connectivity/connectivity.service';
import { OllamaService } from '../ollama/ollama.service';
import { INPUT_INJECTOR, SCREEN_CAPTURER } from '../nut/nut.constants';
import { CaptureError, errorMessage } from '../common/pipeline.errors';

/**
 * Startup checks run before the loop begins. Throws when the agent cannot
 * work.
 */
@Injectable()
export class AgentInitializer {
  private readonly logger = new Logger(AgentInitializer.name);

  constructor(
    private readonly connectivityService: ConnectivityService,
    private readonly ollamaService: OllamaService,
    @Inject(SCREEN_CAPTURER) private readonly capturer: ScreenCapturer,
    @Inject(INPUT_INJECTOR) private readonly injector: InputInjector,
    @Inject(agentConfig.KEY) private readonly config: AgentConfig,
  ) {}

  async initialize(): Promise<ScreenSize> {
    const { startupWaitMs, requireAtStartup } = this.config.connectivity;

    this.logger.log('Checking network connectivity');
    const online =
      await this.connectivityService.waitForConnectivity(startupWaitMs);
    if (!online) {
      if (requireAtStartup) {
        throw new Error(
          `Network connectivity not available after ${startupWaitMs}ms`,
        );
      }
      this.logger.warn('Starting without network connectivity');
    }

    const health = await this.ollamaService.checkHealth();
    if (!health.reachable) {
      throw new Error(
        `Inference service unreachable at ${this.config.inference.baseUrl}`,
      );
    }
    if (!health.modelAvailable) {
      throw new Error(
        `Model "${this.ollamaService.modelName}" is not available (found: ${health.models.join(', ') || 'none'})`,
      );
    }
    this.logger.log(
      `Inference service ready (version ${health.version ?? 'unknown'}, model ${this.ollamaService.modelName})`,
    );

    const screen = await this.injector.getScreenSize();
    try {
      await this.capturer.capture();
    } catch (error) {
      throw new CaptureError(
        `Screen capture test failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    this.logger.log(`Screen ready: ${screen.width}x${screen.height}`);

    return screen;
  }
}
