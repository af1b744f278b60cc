import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Room } from '../entities/room.entity';
import { translateDatabaseError } from '../database/database-errors';
import { nowTimestamp } from '../common/time';
import { validateInput } from '../common/validate-input';
import { CreateRoomDto, RoomDetailsDto } from './dto';

export type RoomId = number;

/**
 * Map a Room entity to the shape handed to the application layer.
 * The password hash itself stays inside the store.
 */
export function toRoomDetails(room: Room): RoomDetailsDto {
  return {
    id: room.id,
    name: room.name,
    ownerId: room.ownerId,
    createdAt: room.createdAt,
    iconHash: room.iconHash,
    isPasswordProtected: room.passwordHash !== null,
  };
}

@Injectable()
export class RoomsService {
  private readonly logger = new Logger(RoomsService.name);

  constructor(
    @InjectRepository(Room)
    private readonly roomRepository: Repository<Room>,
  ) {}

  /**
   * Create a room owned by `ownerId`. Name collisions (ignoring case) raise
   * ConstraintViolationException; an unknown owner raises
   * ReferentialIntegrityException.
   */
  async createRoom(createRoomDto: CreateRoomDto): Promise<RoomId> {
    const { name, ownerId, iconHash, passwordHash } = await validateInput(CreateRoomDto, createRoomDto);

    const room = this.roomRepository.create({
      name,
      ownerId,
      iconHash: iconHash ?? null,
      passwordHash: passwordHash ?? null,
      createdAt: nowTimestamp(),
    });

    try {
      await this.roomRepository.insert(room);
    } catch (error) {
      throw translateDatabaseError(error, `room "${name}"`);
    }

    this.logger.log(`Created room ${room.id} (${name}) owned by user ${ownerId}`);
    return room.id;
  }

  async getRoom(roomId: RoomId): Promise<RoomDetailsDto> {
    const room = await this.findRoomOrFail(roomId);
    return toRoomDetails(room);
  }

  async findByName(name: string): Promise<RoomDetailsDto | null> {
    const room = await this.roomRepository
      .createQueryBuilder('room')
      .where('LOWER(room.name) = LOWER(:name)', { name })
      .getOne();

    return room ? toRoomDetails(room) : null;
  }

  /**
   * Stored password hash for the entry check done by the application layer.
   * `null` means the room has no password gate.
   */
  async getRoomCredential(roomId: RoomId): Promise<string | null> {
    const room = await this.findRoomOrFail(roomId);
    return room.passwordHash;
  }

  /**
   * Delete a room together with its memberships and messages.
   */
  async deleteRoom(roomId: RoomId): Promise<void> {
    const result = await this.roomRepository.delete({ id: roomId });
    if (!result.affected) {
      throw new NotFoundException(`Room ${roomId} not found`);
    }
    this.logger.log(`Deleted room ${roomId}`);
  }

  private async findRoomOrFail(roomId: RoomId): Promise<Room> {
    const room = await this.roomRepository.findOne({ where: { id: roomId } });
    if (!room) {
      throw new NotFoundException(`Room ${roomId} not found`);
    }
    return room;
  }
}
