import { IsString, IsNotEmpty, IsInt, IsISO8601 } from 'class-validator';

export class PostMessageDto {
  @IsInt()
  roomId!: number;

  @IsInt()
  userId!: number;

  @IsString()
  @IsNotEmpty()
  content!: string;

  /** Send time supplied by the caller, e.g. `2024-05-01T12:00:00Z` */
  @IsISO8601()
  timestamp!: string;
}
