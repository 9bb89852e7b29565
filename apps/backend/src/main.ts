import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { resolveLogLevels } from './common/services/app-logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const configService = app.get(ConfigService);
  app.useLogger(resolveLogLevels(configService.get<string>('logging.level', 'log')));
  const logger = new Logger('Bootstrap');

  configureApp(app);

  // Swagger Documentation
  if (process.env.NODE_ENV !== 'production') {
    const config = new DocumentBuilder()
      .setTitle('Campus Identity & Authorization API')
      .setDescription(
        'Login, token revocation, permission resolution and menus for the campus backend',
      )
      .setVersion('1.0')
      .addBearerAuth()
      .addBasicAuth()
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api/docs', app, document);

    logger.log('Swagger documentation available at /api/docs');
  }

  const port = configService.get<number>('app.port', 3001);
  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
}
void bootstrap();
