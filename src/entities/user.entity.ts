import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from 'typeorm';
import { Room } from './room.entity';
import { RoomMember } from './room-member.entity';
import { Message } from './message.entity';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  // Case-insensitive uniqueness lives in the migration (NOCASE / LOWER index)
  @Column({ type: 'varchar', unique: true })
  username!: string;

  @Column({ type: 'varchar', name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'varchar', name: 'created_at' })
  createdAt!: string;

  @Column({ type: 'varchar', nullable: true, name: 'avatar_hash' })
  avatarHash!: string | null;

  // Relations
  @OneToMany(() => Room, (room) => room.owner)
  ownedRooms?: Room[];

  @OneToMany(() => RoomMember, (roomMember) => roomMember.user)
  roomMemberships?: RoomMember[];

  @OneToMany(() => Message, (message) => message.user)
  messages?: Message[];
}
