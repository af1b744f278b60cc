import { IsString, IsNotEmpty, IsOptional, IsInt } from 'class-validator';

export class CreateRoomDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  ownerId!: number;

  @IsString()
  @IsOptional()
  @IsNotEmpty()
  iconHash?: string;

  /** Hash of the room password; leave unset for a room anyone may enter. */
  @IsString()
  @IsOptional()
  @IsNotEmpty()
  passwordHash?: string;
}
