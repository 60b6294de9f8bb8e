import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { swaggerInit } from './utils/swaggerInit';
import { createValidationPipe } from './utils/validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(createValidationPipe());
  swaggerInit(app);
  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, 'Bootstrap');
}
bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start application', error, 'Bootstrap');
  process.exit(1);
});
