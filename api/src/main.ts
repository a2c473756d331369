import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Workspace Service')
      .addBearerAuth({ type: 'http', scheme: 'bearer' }, 'jwt-auth')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  const port = Number(app.get(ConfigService).get('PORT', 3000));
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`Workspace service running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? error.message : String(error),
  );
  process.exit(1);
});
