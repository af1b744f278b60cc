export * from './create-room.dto';
export * from './room-details.dto';
