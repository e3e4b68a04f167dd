import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { botConfig, BotConfig } from './config/bot.config';
import { configureDebugLogger } from './common/utils/debug-logger';

function logLevels(config: BotConfig): LogLevel[] {
  return config.debug ? ['log', 'warn', 'error', 'debug', 'verbose'] : ['log', 'warn', 'error'];
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const config = app.get<BotConfig>(botConfig.KEY);
  app.useLogger(logLevels(config));
  configureDebugLogger({ minLevel: config.debug ? 'debug' : 'info' });

  app.enableShutdownHooks();

  await app.listen(config.port, '0.0.0.0');
  Logger.log(`🚀 Relay listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  // ConfigError lists every invalid variable in its message
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
