// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import cookieParser from 'cookie-parser';
import express from 'express';
import { AppModule } from './app.module';
import { HtmlExceptionFilter } from './common/filters/html-exception.filter';
import { AppConfigService } from './config/config.service';
import { reportSecretKeyUsage } from './config/secret-key.check';

const logger = new Logger('Bootstrap');

async function bootstrap() {
    const app = await NestFactory.create(AppModule);

    const configService = app.get(AppConfigService);
    reportSecretKeyUsage(configService, logger);

    // Signed cookies carry the form tokens
    app.use(cookieParser(configService.secretKey));
    app.use(express.urlencoded({ limit: '1mb', extended: true }));

    app.useGlobalFilters(new HtmlExceptionFilter());

    // Closes the MySQL pool on SIGINT/SIGTERM
    app.enableShutdownHooks();

    await app.listen(configService.port);
    logger.log(`Job tracker listening on http://localhost:${configService.port}`);
}

bootstrap().catch((error: unknown) => {
    logger.error('Fatal startup error', error instanceof Error ? error.stack : String(error));
    process.exit(1);
});
