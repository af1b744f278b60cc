import { IsString, IsNotEmpty, IsOptional } from 'class-validator';

export class CreateUserDto {
  @IsString()
  @IsNotEmpty()
  username!: string;

  /** Already hashed by the caller; plaintext never reaches this layer. */
  @IsString()
  @IsNotEmpty()
  passwordHash!: string;

  @IsString()
  @IsOptional()
  @IsNotEmpty()
  avatarHash?: string;
}
