import { Module } from '@nestjs/common';
import { CommandsModule } from '../commands/commands.module';
import { ConnectivityModule } from '../connectivity/connectivity.module';
import { DecisionModule } from '../decision/decision.module';
import { ExecutorModule } from '../executor/executor.module';
import { NutModule } from '../nut/nut.module';
import { OllamaModule } from '../ollama/ollama.module';
import { SafetyModule } from '../safety/safety.module';
import { AgentInitializer } from './agent.initializer';
import { AgentProcessor } from './agent.processor';
import { AgentScheduler } from './agent.scheduler';

@Module({
  imports: [
    CommandsModule,
    ConnectivityModule,
    DecisionModule,
    ExecutorModule,
    NutModule,
    OllamaModule,
    SafetyModule,
  ],
  providers: [AgentProcessor, AgentScheduler, AgentInitializer],
  exports: [AgentScheduler, AgentInitializer],
})
export class AgentModule {}
