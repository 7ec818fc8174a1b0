import { Module } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import { agentConfig, AgentConfig } from '../config/agent.config';
import { createWinstonLogger } from './winston-logger.service';

@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [agentConfig.KEY],
      useFactory: (config: AgentConfig) => ({
        instance: createWinstonLogger({
          logDir: config.logging.dir,
          level: config.logging.level,
        }),
      }),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
