import { INestApplication, LogLevel, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { logLevelsFor } from './config/env.validation';
import { AllExceptionsFilter } from './logging/all-exceptions.filter';
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { JsonLogger } from './logging/json-logger.service';

/** Global logger, pipes, filters and middleware shared by main.ts and the e2e suite. */
export function setupApp(app: INestApplication): JsonLogger {
  const logger = app.get(JsonLogger);
  const config = app.get(ConfigService);
  logger.setLogLevels(logLevelsFor(config.get<LogLevel>('LOG_LEVEL') ?? 'log'));
  app.useLogger(logger);

  app.use(createHttpLoggingMiddleware(logger));
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new AllExceptionsFilter(logger));
  app.enableShutdownHooks();

  return logger;
}
