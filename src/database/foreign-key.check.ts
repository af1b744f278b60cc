import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

/**
 * Refuses to start when the SQLite connection has foreign keys switched off.
 * Cascading deletes are the only thing that keeps rooms, memberships and
 * messages from being orphaned.
 */
@Injectable()
export class ForeignKeyCheck implements OnModuleInit {
  private readonly logger = new Logger(ForeignKeyCheck.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    const enabled = await this.isEnforced();
    if (!enabled) {
      throw new Error('Foreign key enforcement is disabled on the database connection');
    }
    this.logger.log(`Foreign key enforcement active (${this.dataSource.options.type})`);
  }

  async isEnforced(): Promise<boolean> {
    // PostgreSQL always enforces declared foreign keys
    if (this.dataSource.options.type !== 'better-sqlite3') {
      return true;
    }

    const rows: unknown = await this.dataSource.query('PRAGMA foreign_keys');
    if (!Array.isArray(rows)) {
      return false;
    }
    return rows.some(
      (row: unknown) =>
        typeof row === 'object' && row !== null && 'foreign_keys' in row && row.foreign_keys === 1,
    );
  }
}
