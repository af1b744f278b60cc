import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { buildDataSourceOptions } from './src/database/typeorm.config';
import { resolveDataDir } from './src/database/database-url';

// Load environment variables
config();

// Used by the TypeORM CLI (npm run typeorm -- migration:show)
export const AppDataSource = new DataSource({
  ...buildDataSourceOptions({
    databaseUrl: process.env.DATABASE_URL,
    dataDir: resolveDataDir(process.env.ROOMCHAT_HOME),
    nodeEnv: process.env.NODE_ENV,
  }),
  migrationsRun: false,
});
