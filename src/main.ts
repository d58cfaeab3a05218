import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { cors: false });

  // localhost on any port, IPv4 or IPv6
  const localhostOrigin = /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // No Origin header: curl or server-to-server
      if (origin == null || localhostOrigin.test(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error(`CORS: origin not allowed: ${origin}`));
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: false,
    maxAge: 86_400,
  });

  configureApp(app);
  app.enableShutdownHooks();

  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on port ${port}`);
}

void bootstrap();
