import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { json, text } from 'express';
import { AppModule } from './app.module';

async function bootstrap() {
  // body parsing is set up below: channel webhooks need the raw text
  const app = await NestFactory.create(AppModule, { bodyParser: false });

  const cfg = app.get(ConfigService);
  const corsOrigins = (cfg.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  app.enableCors({
    origin: corsOrigins.length ? corsOrigins : true,
    credentials: true,
  });

  // handlers decode /c bodies themselves, whatever the content type
  app.use('/c', text({ type: () => true, limit: '1mb' }));
  app.use(json({ limit: '1mb' }));

  // DTO validation for the internal API (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const port = Number(cfg.get<string>('PORT') ?? 3000);
  await app.listen(port, '0.0.0.0');
  const baseUrl = cfg.get<string>('APP_BASE_URL') ?? `http://localhost:${port}`;
  new Logger('Bootstrap').log(`Gateway listening on ${baseUrl}`);
}
bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
