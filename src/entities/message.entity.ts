import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { Room } from './room.entity';

@Entity('messages')
@Index('idx_messages_room_ts', ['roomId', 'timestamp'])
export class Message {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'room_id' })
  roomId!: number;

  @ManyToOne(() => Room, (room) => room.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'room_id' })
  room?: Room;

  @Column({ type: 'integer', name: 'user_id' })
  userId!: number;

  @ManyToOne(() => User, (user) => user.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: User;

  @Column({ type: 'text' })
  content!: string;

  // UTC ISO-8601, so text order is chronological order
  @Column({ type: 'varchar' })
  timestamp!: string;
}
