import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RoomMember } from '../entities/room-member.entity';
import { Room } from '../entities/room.entity';
import { User } from '../entities/user.entity';
import { translateDatabaseError } from '../database/database-errors';
import { validateInput } from '../common/validate-input';
import { RoomDetailsDto } from '../rooms/dto';
import { toRoomDetails } from '../rooms/rooms.service';
import { UserProfileDto } from '../users/dto';
import { toUserProfile } from '../users/users.service';
import { MembershipDto } from './dto';

@Injectable()
export class MembershipsService {
  private readonly logger = new Logger(MembershipsService.name);

  constructor(
    @InjectRepository(RoomMember)
    private readonly roomMemberRepository: Repository<RoomMember>,
    @InjectRepository(Room)
    private readonly roomRepository: Repository<Room>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  /**
   * Plain insert, not an upsert: joining twice fails on the primary key with
   * ConstraintViolationException, which callers may read as "already a member".
   */
  async addMembership(roomId: number, userId: number): Promise<void> {
    const membership = await validateInput(MembershipDto, { roomId, userId });

    try {
      await this.roomMemberRepository.insert({ roomId: membership.roomId, userId: membership.userId });
    } catch (error) {
      throw translateDatabaseError(error, `membership of user ${userId} in room ${roomId}`);
    }

    this.logger.log(`User ${userId} joined room ${roomId}`);
  }

  /**
   * Remove a membership. Removing a pair that does not exist is a no-op.
   *
   * @returns whether a row was removed
   */
  async removeMembership(roomId: number, userId: number): Promise<boolean> {
    const result = await this.roomMemberRepository.delete({ roomId, userId });
    const removed = (result.affected ?? 0) > 0;

    if (removed) {
      this.logger.log(`User ${userId} left room ${roomId}`);
    } else {
      this.logger.debug(`No membership of user ${userId} in room ${roomId} to remove`);
    }
    return removed;
  }

  async isMember(roomId: number, userId: number): Promise<boolean> {
    const count = await this.roomMemberRepository.count({ where: { roomId, userId } });
    return count > 0;
  }

  /**
   * Rooms the user belongs to, resolved through idx_rooms_users_user.
   */
  async fetchUserRooms(userId: number): Promise<RoomDetailsDto[]> {
    const userCount = await this.userRepository.count({ where: { id: userId } });
    if (userCount === 0) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    const rooms = await this.roomRepository
      .createQueryBuilder('room')
      .innerJoin('room.members', 'membership')
      .where('membership.userId = :userId', { userId })
      .orderBy('room.id', 'ASC')
      .getMany();

    return rooms.map(toRoomDetails);
  }

  async fetchRoomMembers(roomId: number): Promise<UserProfileDto[]> {
    const roomCount = await this.roomRepository.count({ where: { id: roomId } });
    if (roomCount === 0) {
      throw new NotFoundException(`Room ${roomId} not found`);
    }

    const users = await this.userRepository
      .createQueryBuilder('account')
      .innerJoin('account.roomMemberships', 'membership')
      .where('membership.roomId = :roomId', { roomId })
      .orderBy('account.id', 'ASC')
      .getMany();

    return users.map(toUserProfile);
  }
}
