import { User } from './user.entity';
import { Room } from './room.entity';
import { RoomMember } from './room-member.entity';
import { Message } from './message.entity';

export { User, Room, RoomMember, Message };

export const ENTITIES = [User, Room, RoomMember, Message];
