import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
} from 'typeorm';
import { User } from './user.entity';
import { RoomMember } from './room-member.entity';
import { Message } from './message.entity';

@Entity('rooms')
export class Room {
  @PrimaryGeneratedColumn()
  id!: number;

  // Case-insensitive uniqueness lives in the migration (NOCASE / LOWER index)
  @Column({ type: 'varchar', unique: true })
  name!: string;

  @Column({ type: 'integer', name: 'owner_id' })
  ownerId!: number;

  @ManyToOne(() => User, (user) => user.ownedRooms, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'owner_id' })
  owner?: User;

  @Column({ type: 'varchar', name: 'created_at' })
  createdAt!: string;

  @Column({ type: 'varchar', nullable: true, name: 'icon_hash' })
  iconHash!: string | null;

  /** `null` means the room has no password gate. */
  @Column({ type: 'varchar', nullable: true, name: 'password_hash' })
  passwordHash!: string | null;

  // Relations
  @OneToMany(() => RoomMember, (roomMember) => roomMember.room)
  members?: RoomMember[];

  @OneToMany(() => Message, (message) => message.room)
  messages?: Message[];
}
