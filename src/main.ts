import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import { JsonLogger } from './logging/json-logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    logger: new JsonLogger('bootstrap'),
  });

  const logger = setupApp(app);
  const config = app.get(ConfigService);
  const port = config.get<number>('PORT') ?? 5000;
  const env = config.get<string>('NODE_ENV') ?? 'development';

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Course Catalog API')
      .setDescription('Specializations and course items. Obtain a token from POST /login and send it as `Authorization: Bearer <token>`.')
      .setVersion('1.0.0')
      .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT' })
      .build(),
  );
  SwaggerModule.setup('swagger', app, document, {
    swaggerOptions: { persistAuthorization: true },
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandledRejection', {
      reason: reason instanceof Error ? (reason.stack ?? reason.message) : String(reason),
    });
  });

  await app.listen(port);
  logger.log('course catalog listening', { port, env });
}

bootstrap().catch((error) => {
  console.error(JSON.stringify({ level: 'error', msg: 'bootstrap failed', error: String(error) }));
  process.exit(1);
});
