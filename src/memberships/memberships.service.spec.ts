import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { MembershipsService } from './memberships.service';
import { RoomMember } from '../entities/room-member.entity';
import { Room } from '../entities/room.entity';
import { User } from '../entities/user.entity';
import {
  ConstraintViolationException,
  ReferentialIntegrityException,
} from '../database/database-errors';

const driverFailure = (code: string) =>
  new QueryFailedError('INSERT INTO "rooms_users" ...', [], Object.assign(new Error(code), { code }));

describe('MembershipsService', () => {
  let service: MembershipsService;

  const mockRoomQueryBuilder = {
    innerJoin: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    orderBy: jest.fn().mockReturnThis(),
    getMany: jest.fn(),
  };

  const mockUserQueryBuilder = {
    innerJoin: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    orderBy: jest.fn().mockReturnThis(),
    getMany: jest.fn(),
  };

  const mockRoomMemberRepository = {
    insert: jest.fn(),
    delete: jest.fn(),
    count: jest.fn(),
  };

  const mockRoomRepository = {
    count: jest.fn(),
    createQueryBuilder: jest.fn(() => mockRoomQueryBuilder),
  };

  const mockUserRepository = {
    count: jest.fn(),
    createQueryBuilder: jest.fn(() => mockUserQueryBuilder),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MembershipsService,
        {
          provide: getRepositoryToken(RoomMember),
          useValue: mockRoomMemberRepository,
        },
        {
          provide: getRepositoryToken(Room),
          useValue: mockRoomRepository,
        },
        {
          provide: getRepositoryToken(User),
          useValue: mockUserRepository,
        },
      ],
    }).compile();

    service = module.get<MembershipsService>(MembershipsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('addMembership', () => {
    it('should insert the pair', async () => {
      mockRoomMemberRepository.insert.mockResolvedValue(undefined);

      await service.addMembership(1, 2);

      expect(mockRoomMemberRepository.insert).toHaveBeenCalledWith({ roomId: 1, userId: 2 });
    });

    it('should surface a duplicate pair as ConstraintViolationException', async () => {
      mockRoomMemberRepository.insert.mockRejectedValue(driverFailure('SQLITE_CONSTRAINT_PRIMARYKEY'));

      await expect(service.addMembership(1, 2)).rejects.toBeInstanceOf(ConstraintViolationException);
    });

    it('should surface a dangling reference as ReferentialIntegrityException', async () => {
      mockRoomMemberRepository.insert.mockRejectedValue(driverFailure('23503'));

      await expect(service.addMembership(1, 99)).rejects.toBeInstanceOf(ReferentialIntegrityException);
    });

    it('should reject identifiers that are not integers', async () => {
      await expect(service.addMembership(1.5, 2)).rejects.toBeInstanceOf(BadRequestException);
      expect(mockRoomMemberRepository.insert).not.toHaveBeenCalled();
    });
  });

  describe('removeMembership', () => {
    it('should report true when a row was removed', async () => {
      mockRoomMemberRepository.delete.mockResolvedValue({ affected: 1, raw: {} });

      await expect(service.removeMembership(1, 2)).resolves.toBe(true);
      expect(mockRoomMemberRepository.delete).toHaveBeenCalledWith({ roomId: 1, userId: 2 });
    });

    it('should treat a missing pair as a no-op', async () => {
      mockRoomMemberRepository.delete.mockResolvedValue({ affected: 0, raw: {} });

      await expect(service.removeMembership(1, 2)).resolves.toBe(false);
    });
  });

  describe('isMember', () => {
    it('should count the pair', async () => {
      mockRoomMemberRepository.count.mockResolvedValue(1);

      await expect(service.isMember(1, 2)).resolves.toBe(true);
      expect(mockRoomMemberRepository.count).toHaveBeenCalledWith({ where: { roomId: 1, userId: 2 } });
    });
  });

  describe('fetchUserRooms', () => {
    it('should join through the membership table', async () => {
      mockUserRepository.count.mockResolvedValue(1);
      mockRoomQueryBuilder.getMany.mockResolvedValue([
        {
          id: 3,
          name: 'random',
          ownerId: 4,
          createdAt: '2024-01-01T00:00:00.000Z',
          iconHash: 'icon-sha',
          passwordHash: null,
        },
      ]);

      const rooms = await service.fetchUserRooms(2);

      expect(rooms).toEqual([
        {
          id: 3,
          name: 'random',
          ownerId: 4,
          createdAt: '2024-01-01T00:00:00.000Z',
          iconHash: 'icon-sha',
          isPasswordProtected: false,
        },
      ]);
      expect(mockRoomQueryBuilder.innerJoin).toHaveBeenCalledWith('room.members', 'membership');
      expect(mockRoomQueryBuilder.where).toHaveBeenCalledWith('membership.userId = :userId', { userId: 2 });
    });

    it('should throw NotFoundException for an unknown user', async () => {
      mockUserRepository.count.mockResolvedValue(0);

      await expect(service.fetchUserRooms(2)).rejects.toBeInstanceOf(NotFoundException);
      expect(mockRoomRepository.createQueryBuilder).not.toHaveBeenCalled();
    });
  });

  describe('fetchRoomMembers', () => {
    it('should throw NotFoundException for an unknown room', async () => {
      mockRoomRepository.count.mockResolvedValue(0);

      await expect(service.fetchRoomMembers(8)).rejects.toBeInstanceOf(NotFoundException);
    });

    it('should map members to profiles', async () => {
      mockRoomRepository.count.mockResolvedValue(1);
      mockUserQueryBuilder.getMany.mockResolvedValue([
        {
          id: 2,
          username: 'Bob',
          passwordHash: 'hash-1',
          createdAt: '2024-01-01T00:00:00.000Z',
          avatarHash: null,
        },
      ]);

      await expect(service.fetchRoomMembers(1)).resolves.toEqual([
        { id: 2, username: 'Bob', createdAt: '2024-01-01T00:00:00.000Z', avatarHash: null },
      ]);
    });
  });
});
