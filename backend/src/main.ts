import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { CustomLoggerService } from './common/logging/custom-logger.service';
import { winstonLogger } from './common/logging/logger.config';
import { getErrorMessage } from './common/utils/error.util';
import { SystemEventType } from './entities/system-log.entity';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  // Get custom logger
  const logger = app.get(CustomLoggerService);
  app.useLogger(logger);

  const config = app.get(ConfigService);

  // Enable CORS for the presentation layer
  const origins = ['http://localhost:3000', config.get<string>('FRONTEND_URL')].filter(
    (origin): origin is string => Boolean(origin),
  );
  app.enableCors({
    origin: origins,
    credentials: true,
  });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Closes the stats HTTP agent and the database pool on SIGTERM
  app.enableShutdownHooks();

  // Start server
  const port = config.get<string>('PORT') || 3001;
  await app.listen(port);

  // Log system start
  await logger.logSystem({
    level: 'info',
    eventType: SystemEventType.SYSTEM_START,
    message: `Lotto weighted picker started on port ${port}`,
    component: 'Main',
    metadata: {
      port,
      nodeEnv: process.env.NODE_ENV,
    },
  });

  logger.log(`Application is running on: http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  winstonLogger.error('Failed to start application', { error: getErrorMessage(error) });
  process.exit(1);
});
