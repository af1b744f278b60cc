import { Entity, PrimaryColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { User } from './user.entity';
import { Room } from './room.entity';

/**
 * Membership association. The (room, user) pair is the whole identity,
 * so a user belongs to a room at most once.
 */
@Entity('rooms_users')
@Index('idx_rooms_users_user', ['userId'])
export class RoomMember {
  @PrimaryColumn({ type: 'integer', name: 'room_id' })
  roomId!: number;

  @PrimaryColumn({ type: 'integer', name: 'user_id' })
  userId!: number;

  @ManyToOne(() => Room, (room) => room.members, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'room_id' })
  room?: Room;

  @ManyToOne(() => User, (user) => user.roomMemberships, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: User;
}
