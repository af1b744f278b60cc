#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DataSource } from 'typeorm';
import { AppModule } from './app.module';
import { resolveLogLevels } from './common/log-level';

async function bootstrap() {
  const command = process.argv[2] ?? 'migrate';
  if (command !== 'migrate') {
    console.error('Usage: roomchat-store migrate');
    process.exitCode = 2;
    return;
  }

  // Pending migrations run (migrationsRun) and the foreign key check
  // happens while the context boots
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const logger = new Logger('RoomchatStore');

  try {
    const dataSource = app.get(DataSource);
    const pending = await dataSource.showMigrations();
    if (pending) {
      throw new Error('Migrations are still pending after boot');
    }
    logger.log(`Schema up to date on ${dataSource.options.type}`);
  } finally {
    await app.close();
  }
}
bootstrap().catch((error) => {
  console.error('Failed to prepare the database:', error);
  process.exit(1);
});
