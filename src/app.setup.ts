import { ValidationPipe, type INestApplication } from '@nestjs/common';

/** HTTP behaviour shared by the server entry point and the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
  return app;
}
