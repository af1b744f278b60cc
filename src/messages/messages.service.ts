import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Message } from '../entities/message.entity';
import { Room } from '../entities/room.entity';
import { translateDatabaseError } from '../database/database-errors';
import { normalizeTimestamp } from '../common/time';
import { validateInput } from '../common/validate-input';
import {
  DEFAULT_TIMELINE_LIMIT,
  MessageDto,
  PostMessageDto,
  TimelineQueryDto,
} from './dto';

export type MessageId = number;

/**
 * Append-only message history: no update, no standalone delete.
 * Messages disappear only with their room or author.
 */
@Injectable()
export class MessagesService {
  private readonly logger = new Logger(MessagesService.name);

  constructor(
    @InjectRepository(Message)
    private readonly messageRepository: Repository<Message>,
    @InjectRepository(Room)
    private readonly roomRepository: Repository<Room>,
  ) {}

  async postMessage(postMessageDto: PostMessageDto): Promise<MessageId> {
    const { roomId, userId, content, timestamp } = await validateInput(PostMessageDto, postMessageDto);

    const message = this.messageRepository.create({
      roomId,
      userId,
      content,
      timestamp: normalizeTimestamp(timestamp),
    });

    try {
      await this.messageRepository.insert(message);
    } catch (error) {
      throw translateDatabaseError(error, `message from user ${userId} in room ${roomId}`);
    }

    this.logger.debug(`Stored message ${message.id} in room ${roomId}`);
    return message.id;
  }

  /**
   * Page through a room's timeline, oldest first unless `order` is 'desc'.
   * Messages sharing a timestamp are ordered by id.
   */
  async fetchRoomTimeline(roomId: number, query: TimelineQueryDto = {}): Promise<MessageDto[]> {
    const { order, limit, offset, since, until } = await validateInput(TimelineQueryDto, query);
    await this.assertRoomExists(roomId);

    const direction = order === 'desc' ? 'DESC' : 'ASC';
    const builder = this.messageRepository
      .createQueryBuilder('message')
      .leftJoinAndSelect('message.user', 'author')
      .where('message.roomId = :roomId', { roomId });

    if (since) {
      builder.andWhere('message.timestamp >= :since', { since: normalizeTimestamp(since) });
    }
    if (until) {
      builder.andWhere('message.timestamp < :until', { until: normalizeTimestamp(until) });
    }

    const messages = await builder
      .orderBy('message.timestamp', direction)
      .addOrderBy('message.id', direction)
      .offset(offset ?? 0)
      .limit(limit ?? DEFAULT_TIMELINE_LIMIT)
      .getMany();

    return messages.map((message) => ({
      id: message.id,
      roomId: message.roomId,
      userId: message.userId,
      username: message.user?.username ?? '',
      content: message.content,
      timestamp: message.timestamp,
    }));
  }

  async countRoomMessages(roomId: number): Promise<number> {
    await this.assertRoomExists(roomId);
    return this.messageRepository.count({ where: { roomId } });
  }

  private async assertRoomExists(roomId: number): Promise<void> {
    const count = await this.roomRepository.count({ where: { id: roomId } });
    if (count === 0) {
      throw new NotFoundException(`Room ${roomId} not found`);
    }
  }
}
