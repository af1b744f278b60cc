import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Message } from '../entities/message.entity';
import { Room } from '../entities/room.entity';
import { MessagesService } from './messages.service';

@Module({
  imports: [TypeOrmModule.forFeature([Message, Room])],
  providers: [MessagesService],
  exports: [MessagesService],
})
export class MessagesModule {}
