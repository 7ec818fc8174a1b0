import {
  Inject,
  Injectable,
  Logger,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { promises as fs } from 'fs';
import {
  Decision,
  describeDecision,
  Instruction,
  Screenshot,
} from '@deskpilot/shared';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { errorCode, errorMessage } from '../common/pipeline.errors';
import { ConnectivityService } from '../connectivity/connectivity.service';
import { OllamaService } from '../ollama/ollama.service';
import {
  extractJsonObject,
  JSON_EXTRACTOR,
  JsonExtractor,
} from './decision-extractor';
import { parseDecision } from './decision-validator';
import {
  buildDecisionPrompt,
  DEFAULT_RULES,
  needsNetwork,
} from './decision.prompts';

/**
 * Turns one screenshot and one instruction into a validated Decision.
 * Fails with `InferenceError` or `ValidationError`; never returns a partial
 * decision.
 */
@Injectable()
export class DecisionService implements OnModuleInit {
  private readonly logger = new Logger(DecisionService.name);
  private readonly rulesFile: string;
  private readonly preDecisionWaitMs: number;
  private readonly extractJson: JsonExtractor;
  private rules = DEFAULT_RULES;

  constructor(
    private readonly ollamaService: OllamaService,
    private readonly connectivityService: ConnectivityService,
    @Inject(agentConfig.KEY) config: AgentConfig,
    @Optional() @Inject(JSON_EXTRACTOR) extractJson?: JsonExtractor,
  ) {
    this.extractJson = extractJson ?? extractJsonObject;
    this.rulesFile = config.files.rulesFile;
    this.preDecisionWaitMs = config.connectivity.preDecisionWaitMs;
  }

  async onModuleInit(): Promise<void> {
    await this.loadRules();
  }

  async loadRules(): Promise<string> {
    try {
      const content = (await fs.readFile(this.rulesFile, 'utf-8')).trim();
      if (content) {
        this.rules = content;
        this.logger.log(`Loaded rules from ${this.rulesFile}`);
      }
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.error(
          `Error loading rules, using defaults: ${errorMessage(error)}`,
        );
      }
      this.rules = DEFAULT_RULES;
    }
    return this.rules;
  }

  async decide(
    screenshot: Screenshot,
    instruction: Instruction,
  ): Promise<Decision> {
    const online = needsNetwork(instruction.text)
      ? await this.probeNetwork()
      : undefined;

    const prompt = buildDecisionPrompt({
      rules: this.rules,
      instruction: instruction.text,
      online,
    });

    const reply = await this.ollamaService.generate(prompt, screenshot.base64);
    this.logger.debug(`Model reply: ${reply.substring(0, 500)}`);

    const decision = parseDecision(this.extractJson(reply));
    this.logger.log(
      `Decision for "${instruction.text}": ${describeDecision(decision)}`,
    );
    return decision;
  }

  private async probeNetwork(): Promise<boolean> {
    const online =
      this.preDecisionWaitMs > 0
        ? await this.connectivityService.waitForConnectivity(
            this.preDecisionWaitMs,
          )
        : await this.connectivityService.isOnline();
    if (!online) {
      this.logger.warn('Instruction needs the network, which is unavailable');
    }
    return online;
  }
}
