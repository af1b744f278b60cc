import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '../entities/user.entity';
import { translateDatabaseError } from '../database/database-errors';
import { nowTimestamp } from '../common/time';
import { validateInput } from '../common/validate-input';
import { CreateUserDto, UserProfileDto } from './dto';

export type UserId = number;

export function toUserProfile(user: User): UserProfileDto {
  return {
    id: user.id,
    username: user.username,
    createdAt: user.createdAt,
    avatarHash: user.avatarHash,
  };
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  /**
   * Register an account. A username that differs from an existing one only
   * in case is rejected by the store with ConstraintViolationException.
   */
  async createUser(createUserDto: CreateUserDto): Promise<UserId> {
    const { username, passwordHash, avatarHash } = await validateInput(CreateUserDto, createUserDto);

    const user = this.userRepository.create({
      username,
      passwordHash,
      avatarHash: avatarHash ?? null,
      createdAt: nowTimestamp(),
    });

    try {
      await this.userRepository.insert(user);
    } catch (error) {
      throw translateDatabaseError(error, `user "${username}"`);
    }

    this.logger.log(`Created user ${user.id} (${username})`);
    return user.id;
  }

  async getUser(userId: UserId): Promise<UserProfileDto> {
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    return toUserProfile(user);
  }

  /**
   * Case-insensitive lookup, matching the uniqueness rule.
   */
  async findByUsername(username: string): Promise<UserProfileDto | null> {
    const user = await this.userRepository
      .createQueryBuilder('account')
      .where('LOWER(account.username) = LOWER(:username)', { username })
      .getOne();

    return user ? toUserProfile(user) : null;
  }

  /**
   * Delete an account. Owned rooms, memberships and authored messages go
   * with it (and the memberships and messages of those rooms), all in the
   * single cascading DELETE.
   */
  async deleteUser(userId: UserId): Promise<void> {
    const result = await this.userRepository.delete({ id: userId });
    if (!result.affected) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    this.logger.log(`Deleted user ${userId}`);
  }
}
