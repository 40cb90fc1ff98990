import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  const logger = app.get(Logger);

  app.useLogger(logger);

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"], // Swagger UI
          scriptSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
          fontSrc: ["'self'", 'data:'],
          objectSrc: ["'none'"],
          frameSrc: ["'self'"],
        },
      },
      crossOriginEmbedderPolicy: false,
    }),
  );

  app.use(compression({ level: 6 }));

  const allowedOrigins = configService
    .get<string>('cors.origins', 'http://localhost:3000')
    .split(',')
    .map((origin) => origin.trim());

  app.enableCors({
    origin: allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    maxAge: 86400,
  });

  app.useGlobalFilters(
    new HttpExceptionFilter(configService.get<string>('auth.loginUrl', '/login')),
  );

  // money fields are converted by the DTOs themselves, no implicit conversion
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Drinks Ledger API')
    .setDescription(`
## Drinks Ledger

Tracks what members and their prepaid guests owe for drinks.

- **Postpaid users**: members billed against a running balance, created on first login
- **Prepaid users**: pre-funded accounts owned by a member, identified by a secret user key
- **Admins**: settle cash payments (payup), set balances, activate users

### Authentication
Members send a bearer token from the identity provider (groups claim decides
member/admin). Prepaid users exchange their user key at POST /auth/prepaid.

### Money
Amounts are sent in currency units ("1.50" or "1,50") and returned both as a
formatted string and as integer cents.
    `)
    .setVersion('1.0.0')
    .addBearerAuth()
    .addTag('Drinks', 'Point of sale')
    .addTag('Users', 'Own balance and prepaid users')
    .addTag('Admin', 'Ledger administration')
    .addTag('Auth', 'Prepaid key login')
    .addTag('Health', 'Service health checks')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'none',
    },
    customSiteTitle: 'Drinks Ledger API Documentation',
  });

  app.enableShutdownHooks();

  const port = configService.get<number>('port', 3000);
  await app.listen(port);

  logger.log(`Drinks ledger is running on: http://localhost:${port}`);
  logger.log(`Swagger API docs available at: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  // nestjs-pino may not be up yet
  console.error('Failed to start drinks ledger', error);
  process.exit(1);
});
