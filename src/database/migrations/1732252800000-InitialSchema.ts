import { MigrationInterface, QueryRunner } from 'typeorm';

interface Dialect {
  primaryKey: string;
  /** Inline column suffix for case-insensitive uniqueness, if the engine has one */
  caseInsensitiveUnique: string;
  /** Engines without a NOCASE collation get a unique index on LOWER(column) */
  needsLowerIndex: boolean;
}

// NOCASE folds ASCII letters only, while LOWER() on PostgreSQL folds Unicode:
// 'Émile' and 'émile' collide on PostgreSQL but not on SQLite.
const SQLITE: Dialect = {
  primaryKey: 'INTEGER PRIMARY KEY AUTOINCREMENT',
  caseInsensitiveUnique: 'UNIQUE COLLATE NOCASE',
  needsLowerIndex: false,
};

const POSTGRES: Dialect = {
  primaryKey: 'SERIAL PRIMARY KEY',
  caseInsensitiveUnique: '',
  needsLowerIndex: true,
};

/**
 * Initial schema for the chat store
 *
 * - users: accounts, username unique regardless of case
 * - rooms: channels, each owned by exactly one user
 * - rooms_users: membership pairs
 * - messages: append-only room timelines
 *
 * Every foreign key cascades on delete, so removing a user or a room
 * removes everything that depends on it in the same statement.
 */
export class InitialSchema1732252800000 implements MigrationInterface {
  name = 'InitialSchema1732252800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    const dialect = queryRunner.connection.options.type === 'postgres' ? POSTGRES : SQLITE;

    await queryRunner.query(`
      CREATE TABLE "users" (
        "id" ${dialect.primaryKey},
        "username" TEXT NOT NULL ${dialect.caseInsensitiveUnique},
        "password_hash" TEXT NOT NULL,
        "created_at" TEXT NOT NULL,
        "avatar_hash" TEXT,
        CONSTRAINT "chk_users_username" CHECK (length("username") > 0)
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "rooms" (
        "id" ${dialect.primaryKey},
        "name" TEXT NOT NULL ${dialect.caseInsensitiveUnique},
        "owner_id" INTEGER NOT NULL,
        "created_at" TEXT NOT NULL,
        "icon_hash" TEXT,
        "password_hash" TEXT,
        CONSTRAINT "chk_rooms_name" CHECK (length("name") > 0),
        CONSTRAINT "fk_rooms_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);

    if (dialect.needsLowerIndex) {
      await queryRunner.query(`CREATE UNIQUE INDEX "uq_users_username" ON "users" (LOWER("username"))`);
      await queryRunner.query(`CREATE UNIQUE INDEX "uq_rooms_name" ON "rooms" (LOWER("name"))`);
    }

    await queryRunner.query(`
      CREATE TABLE "rooms_users" (
        "room_id" INTEGER NOT NULL,
        "user_id" INTEGER NOT NULL,
        CONSTRAINT "pk_rooms_users" PRIMARY KEY ("room_id", "user_id"),
        CONSTRAINT "fk_rooms_users_room" FOREIGN KEY ("room_id")
          REFERENCES "rooms"("id") ON DELETE CASCADE,
        CONSTRAINT "fk_rooms_users_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_rooms_users_user" ON "rooms_users" ("user_id")
    `);

    await queryRunner.query(`
      CREATE TABLE "messages" (
        "id" ${dialect.primaryKey},
        "room_id" INTEGER NOT NULL,
        "user_id" INTEGER NOT NULL,
        "content" TEXT NOT NULL,
        "timestamp" TEXT NOT NULL,
        CONSTRAINT "chk_messages_content" CHECK (length("content") > 0),
        CONSTRAINT "fk_messages_room" FOREIGN KEY ("room_id")
          REFERENCES "rooms"("id") ON DELETE CASCADE,
        CONSTRAINT "fk_messages_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_messages_room_ts" ON "messages" ("room_id", "timestamp")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // Drop in reverse dependency order
    await queryRunner.query(`DROP TABLE IF EXISTS "messages"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "rooms_users"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "rooms"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
