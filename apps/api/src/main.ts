import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();

import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import helmet from 'helmet';
import { rateLimit } from 'express-rate-limit';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, AppConfig } from './config/app-config';

/**
 * Bootstrap the NestJS application
 * Configures security middleware, global pipes, CORS, and starts the server
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });
    const config = app.get<AppConfig>(APP_CONFIG);
    app.useLogger(config.logLevels);

    // Security middleware
    app.use(helmet());

    // Rate limiting
    app.use(
      rateLimit({
        windowMs: 15 * 60 * 1000,
        limit: 1000,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: { code: 'Too Many Requests', message: 'Too many requests from this IP' } },
      }),
    );

    configureApp(app);

    app.enableCors({
      origin: config.corsOrigin,
      methods: ['GET'],
    });

    app.enableShutdownHooks();

    await app.listen(config.port, '0.0.0.0');

    logger.log(`Exchange rate service listening on http://0.0.0.0:${config.port}`);
    logger.log(`Environment: ${config.env}, cache store: ${config.cache.store}`);
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Failed to start application: ${err.message}`, err.stack);
    process.exit(1);
  }
}

void bootstrap();
