import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DataSourceOptions } from 'typeorm';
import type Database from 'better-sqlite3';
import { ENTITIES } from '../entities';
import { InitialSchema1732252800000 } from './migrations/1732252800000-InitialSchema';
import { parseDatabaseUrl, resolveDataDir } from './database-url';

export interface DatabaseSettings {
  databaseUrl?: string;
  dataDir: string;
  nodeEnv?: string;
}

export const MIGRATIONS = [InitialSchema1732252800000];

/**
 * Options shared by the Nest module and the standalone TypeORM data source.
 * Migrations always own the schema; `synchronize` would drop the
 * case-insensitive collation and the CHECK constraints.
 */
export const buildDataSourceOptions = (settings: DatabaseSettings): DataSourceOptions => {
  const target = parseDatabaseUrl(settings.databaseUrl, settings.dataDir);
  const common = {
    entities: ENTITIES,
    migrations: MIGRATIONS,
    migrationsRun: true,
    synchronize: false,
    logging: settings.nodeEnv === 'development',
  };

  if (target.kind === 'sqlite') {
    if (target.database !== ':memory:') {
      mkdirSync(dirname(target.database), { recursive: true });
    }
    return {
      ...common,
      type: 'better-sqlite3',
      database: target.database,
      // Cascading deletes depend on this pragma; it is per-connection in SQLite
      prepareDatabase: (db: Database.Database) => {
        db.pragma('foreign_keys = ON');
      },
    };
  }

  return {
    ...common,
    type: 'postgres',
    host: target.host,
    port: target.port,
    username: target.username,
    password: target.password,
    database: target.database,
    ssl: settings.nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
    extra: {
      // Connection pool settings
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };
};

export const getTypeOrmConfig = (configService: ConfigService): TypeOrmModuleOptions => {
  return buildDataSourceOptions({
    databaseUrl: configService.get<string>('DATABASE_URL'),
    dataDir: resolveDataDir(configService.get<string>('ROOMCHAT_HOME')),
    nodeEnv: configService.get<string>('NODE_ENV'),
  });
};
