import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { AgentInitializer } from './agent/agent.initializer';
import { AgentScheduler } from './agent/agent.scheduler';
import { errorMessage, errorStack } from './common/pipeline.errors';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  logger.log('Starting desktop automation agent...');

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  const scheduler = app.get(AgentScheduler);
  const onSignal = (signal: NodeJS.Signals) => {
    logger.log(`Received ${signal}, finishing current command`);
    scheduler.requestShutdown();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await app.get(AgentInitializer).initialize();
    await scheduler.run();
  } finally {
    await app.close();
  }

  logger.log('Agent stopped');
}

bootstrap().catch((error: unknown) => {
  logger.error(
    `Failed to start agent: ${errorMessage(error)}`,
    errorStack(error),
  );
  process.exit(1);
});
