export class MessageDto {
  id!: number;
  roomId!: number;
  userId!: number;
  username!: string;
  content!: string;
  timestamp!: string;
}
