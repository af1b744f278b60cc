export { AppModule } from './app.module';
export { DatabaseModule } from './database/database.module';
export { ForeignKeyCheck } from './database/foreign-key.check';
export {
  ConstraintViolationException,
  ReferentialIntegrityException,
  translateDatabaseError,
} from './database/database-errors';
export { buildDataSourceOptions, getTypeOrmConfig } from './database/typeorm.config';
export type { DatabaseSettings } from './database/typeorm.config';
export { parseDatabaseUrl, resolveDataDir } from './database/database-url';
export type { DatabaseTarget } from './database/database-url';

export * from './entities';

export { UsersModule } from './users/users.module';
export { UsersService } from './users/users.service';
export type { UserId } from './users/users.service';
export * from './users/dto';

export { RoomsModule } from './rooms/rooms.module';
export { RoomsService } from './rooms/rooms.service';
export type { RoomId } from './rooms/rooms.service';
export * from './rooms/dto';

export { MembershipsModule } from './memberships/memberships.module';
export { MembershipsService } from './memberships/memberships.service';
export * from './memberships/dto';

export { MessagesModule } from './messages/messages.module';
export { MessagesService } from './messages/messages.service';
export type { MessageId } from './messages/messages.service';
export * from './messages/dto';
