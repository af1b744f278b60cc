import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RoomMember } from '../entities/room-member.entity';
import { Room } from '../entities/room.entity';
import { User } from '../entities/user.entity';
import { MembershipsService } from './memberships.service';

@Module({
  imports: [TypeOrmModule.forFeature([RoomMember, Room, User])],
  providers: [MembershipsService],
  exports: [MembershipsService],
})
export class MembershipsModule {}
