import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AgentModule } from './agent/agent.module';
import { agentConfig } from './config/agent.config';
import { validateEnvironment } from './config/env.validation';
import { LoggerModule } from './logger/logger.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [agentConfig],
      validate: validateEnvironment,
    }),
    LoggerModule,
    AgentModule,
  ],
})
export class AppModule {}
