import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import {
  EMAIL_TAKEN,
  USERNAME_RESERVED,
  USERNAME_TAKEN,
  UsersService,
} from '../users.service';
import { User } from '../../../entities/user.entity';
import {
  QueryBuilderMock,
  createQueryBuilderMock,
  createRepoMock,
} from '../../../../test/repo-mocks';

function user(over: Partial<User> = {}): User {
  return Object.assign(new User(), {
    id: 1,
    username: 'alice',
    email: 'alice@example.com',
    first_name: '',
    last_name: '',
    bio: null,
    role: 'user',
    is_superuser: false,
    confirmation_code: '',
    ...over,
  });
}

async function rejection(p: Promise<unknown>): Promise<unknown> {
  return p.then(
    () => {
      throw new Error('expected rejection');
    },
    (e: unknown) => e,
  );
}

function errorsOf(e: unknown): unknown {
  if (!(e instanceof BadRequestException)) throw e;
  const body = e.getResponse();
  return typeof body === 'object' && 'errors' in body ? body.errors : undefined;
}

describe('UsersService', () => {
  let service: UsersService;
  const repo = createRepoMock<User>();
  let byName: QueryBuilderMock;
  let byEmail: QueryBuilderMock;

  beforeEach(async () => {
    jest.clearAllMocks();
    byName = createQueryBuilderMock();
    byEmail = createQueryBuilderMock();
    // the service looks up by username before email
    repo.createQueryBuilder
      .mockReset()
      .mockReturnValueOnce(byName)
      .mockReturnValueOnce(byEmail);
    repo.create.mockImplementation((v) => Object.assign(new User(), v));
    repo.save.mockImplementation(async (u) => Object.assign(u, { id: u.id ?? 10 }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: getRepositoryToken(User), useValue: repo },
      ],
    }).compile();
    service = module.get(UsersService);
  });

  describe('findOrCreateForSignup', () => {
    it('creates a new user with role user', async () => {
      const created = await service.findOrCreateForSignup('bob', 'bob@example.com');
      expect(created).toMatchObject({
        id: 10,
        username: 'bob',
        email: 'bob@example.com',
        role: 'user',
      });
      expect(byName.where).toHaveBeenCalledWith(
        'LOWER(u.username) = LOWER(:username)',
        { username: 'bob' },
      );
    });

    it('returns the existing user when both values match it', async () => {
      const existing = user();
      byName.getOne.mockResolvedValue(existing);
      byEmail.getOne.mockResolvedValue(existing);
      await expect(
        service.findOrCreateForSignup('alice', 'alice@example.com'),
      ).resolves.toBe(existing);
      expect(repo.save).not.toHaveBeenCalled();
    });

    it('reports a username owned by someone else', async () => {
      byName.getOne.mockResolvedValue(user());
      const e = await rejection(
        service.findOrCreateForSignup('alice', 'new@example.com'),
      );
      expect(errorsOf(e)).toEqual({ username: [USERNAME_TAKEN] });
    });

    it('reports both fields when they belong to different users', async () => {
      byName.getOne.mockResolvedValue(user({ id: 1 }));
      byEmail.getOne.mockResolvedValue(user({ id: 2, username: 'carol' }));
      const e = await rejection(
        service.findOrCreateForSignup('alice', 'carol@example.com'),
      );
      expect(errorsOf(e)).toEqual({
        username: [USERNAME_TAKEN],
        email: [EMAIL_TAKEN],
      });
    });

    it.each(['me', 'ME', 'Me'])('refuses the reserved name %s', async (name) => {
      const e = await rejection(service.findOrCreateForSignup(name, 'x@example.com'));
      expect(errorsOf(e)).toEqual({ username: [USERNAME_RESERVED] });
      expect(repo.createQueryBuilder).not.toHaveBeenCalled();
    });

    it('maps a unique index violation to 400', async () => {
      repo.save.mockRejectedValue(
        new QueryFailedError('INSERT', [], Object.assign(new Error('unique violation'), { code: '23505' })),
      );
      const e = await rejection(service.findOrCreateForSignup('bob', 'bob@example.com'));
      expect(errorsOf(e)).toEqual({
        username: [USERNAME_TAKEN],
        email: [EMAIL_TAKEN],
      });
    });
  });

  describe('list', () => {
    it('pages and filters by username', async () => {
      const qb = createQueryBuilderMock();
      qb.getManyAndCount.mockResolvedValue([[user()], 1]);
      repo.createQueryBuilder.mockReset().mockReturnValue(qb);

      const page = await service.list({ search: 'AL', limit: 500, offset: -3 });

      expect(qb.take).toHaveBeenCalledWith(100);
      expect(qb.skip).toHaveBeenCalledWith(0);
      expect(qb.where).toHaveBeenCalledWith('LOWER(u.username) LIKE :search', {
        search: '%al%',
      });
      expect(page).toEqual({
        total: 1,
        limit: 100,
        offset: 0,
        items: [
          {
            username: 'alice',
            email: 'alice@example.com',
            first_name: '',
            last_name: '',
            bio: null,
            role: 'user',
          },
        ],
      });
    });
  });

  describe('update', () => {
    it('changes the role when an admin asks', async () => {
      const existing = user();
      byName.getOne.mockResolvedValue(existing);
      const updated = await service.update('alice', { role: 'moderator' });
      expect(updated.role).toBe('moderator');
    });

    it('answers 404 for an unknown username', async () => {
      await expect(service.update('ghost', { bio: 'x' })).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });

    it('refuses renaming to "me"', async () => {
      byName.getOne.mockResolvedValue(user());
      const e = await rejection(service.update('alice', { username: 'me' }));
      expect(errorsOf(e)).toEqual({ username: [USERNAME_RESERVED] });
    });
  });

  describe('updateProfile', () => {
    it('keeps its own username and email available to itself', async () => {
      const existing = user();
      repo.findOne.mockResolvedValue(existing);
      byName.getOne.mockResolvedValue(existing);
      byEmail.getOne.mockResolvedValue(existing);

      const updated = await service.updateProfile(1, {
        username: 'alice',
        email: 'alice@example.com',
        bio: 'hello',
      });
      expect(updated.bio).toBe('hello');
    });

    it('rejects an email taken by another account', async () => {
      repo.findOne.mockResolvedValue(user());
      // no username in the body: the first builder serves the email lookup
      byName.getOne.mockResolvedValue(user({ id: 2, email: 'bob@example.com' }));
      const e = await rejection(
        service.updateProfile(1, { email: 'bob@example.com' }),
      );
      expect(errorsOf(e)).toEqual({ email: [EMAIL_TAKEN] });
    });
  });

  describe('remove', () => {
    it('deletes by username', async () => {
      const existing = user();
      byName.getOne.mockResolvedValue(existing);
      await service.remove('alice');
      expect(repo.remove).toHaveBeenCalledWith(existing);
    });
  });
});
