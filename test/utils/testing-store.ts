import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { AppModule } from '../../src/app.module';
import { UsersService } from '../../src/users/users.service';
import { RoomsService } from '../../src/rooms/rooms.service';
import { MembershipsService } from '../../src/memberships/memberships.service';
import { MessagesService } from '../../src/messages/messages.service';

export interface TestingStore {
  moduleRef: TestingModule;
  dataSource: DataSource;
  users: UsersService;
  rooms: RoomsService;
  memberships: MembershipsService;
  messages: MessagesService;
}

/**
 * Boot the whole application against a fresh in-memory SQLite database,
 * with migrations applied and lifecycle hooks run.
 */
export async function createTestingStore(): Promise<TestingStore> {
  process.env.DATABASE_URL = 'sqlite::memory:';

  const moduleRef = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();
  await moduleRef.init();

  return {
    moduleRef,
    dataSource: moduleRef.get(DataSource),
    users: moduleRef.get(UsersService),
    rooms: moduleRef.get(RoomsService),
    memberships: moduleRef.get(MembershipsService),
    messages: moduleRef.get(MessagesService),
  };
}
