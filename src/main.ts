import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app = await NestFactory.create(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');

  // SIGTERM/SIGINT stop the poll loop and the dashboard ticker through onModuleDestroy.
  app.enableShutdownHooks();

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, alertMode=${appConfigService.alertMode}, networks=${appConfigService.enabledNetworks.join(',')}, pollIntervalSec=${String(appConfigService.pollIntervalSec)}, database=${appConfigService.databaseUrl === null ? 'memory' : 'postgres'}`,
  );
  const swaggerConfig = new DocumentBuilder()
    .setTitle('Multichain Transaction Monitor')
    .setDescription('Health and metrics endpoints of the large transaction monitor')
    .setVersion(appConfigService.appVersion)
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(appConfigService.port);
  logger.log(`Transaction monitor is listening on port ${appConfigService.port}.`);
};

bootstrap().catch((error: unknown): void => {
  const errorMessage: string = error instanceof Error ? error.message : String(error);
  new Logger('Bootstrap').error(`Bootstrap failed: ${errorMessage}`);
  process.exit(1);
});
