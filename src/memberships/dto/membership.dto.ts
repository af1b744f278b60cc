import { IsInt } from 'class-validator';

export class MembershipDto {
  @IsInt()
  roomId!: number;

  @IsInt()
  userId!: number;
}
