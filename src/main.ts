import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { Client } from 'pg';
import { resolveStorageDriver } from './modules/config/forecast.config';
import { RequestTimingInterceptor } from './modules/utils/request-timing.interceptor';

async function createDatabaseIfNotExists(): Promise<void> {
  const logger = new Logger('DatabaseSetup');

  // Load environment variables manually
  const dbHost = process.env.DB_HOST || 'localhost';
  const dbPort = parseInt(process.env.DB_PORT || '5432', 10);
  const dbUser = process.env.DB_USER || 'postgres';
  const dbPass = process.env.DB_PASS || 'postgres';
  const dbName = process.env.DB_NAME || 'forecast';

  const client = new Client({
    host: dbHost,
    port: dbPort,
    user: dbUser,
    password: dbPass,
    database: 'postgres', // Connect to default postgres database first
  });

  try {
    await client.connect();
    logger.log('Connected to PostgreSQL server');

    const result = await client.query(
      'SELECT 1 FROM pg_database WHERE datname = $1',
      [dbName],
    );

    if (result.rows.length === 0) {
      await client.query(`CREATE DATABASE "${dbName}"`);
      logger.log(`Database '${dbName}' created successfully`);
    } else {
      logger.log(`Database '${dbName}' already exists`);
    }
  } catch (error) {
    logger.error(
      `Failed to create database: ${error instanceof Error ? error.message : String(error)}`,
    );
    throw error;
  } finally {
    await client.end();
  }
}

async function bootstrap(): Promise<void> {
  if (resolveStorageDriver() === 'database') {
    // Create database BEFORE starting the NestJS app
    await createDatabaseIfNotExists();
  }

  const logLevel = process.env.LOG_LEVEL || 'log';
  const logLevels: LogLevel[] =
    logLevel === 'debug'
      ? ['log', 'error', 'warn', 'debug', 'verbose']
      : ['log', 'error', 'warn'];

  const app = await NestFactory.create(AppModule, {
    logger: logLevels,
  });
  const port = process.env.PORT || 3000;

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );
  app.useGlobalInterceptors(new RequestTimingInterceptor());

  const logger = new Logger('Bootstrap');
  logger.log('Global validation pipe enabled with transformation');

  await app.listen(port);
  logger.log(`Forecast API listening on port ${port}`);
}

void bootstrap();
