import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { JwtStrategy } from '../jwt.strategy';
import { UsersService } from '../../users/users.service';
import { User } from '../../../entities/user.entity';
import { createRepoMock } from '../../../../test/repo-mocks';

describe('JwtStrategy', () => {
  const repo = createRepoMock<User>();
  let strategy: JwtStrategy;

  beforeAll(async () => {
    const module = await Test.createTestingModule({
      providers: [
        JwtStrategy,
        UsersService,
        { provide: ConfigService, useValue: new ConfigService() },
        { provide: getRepositoryToken(User), useValue: repo },
      ],
    }).compile();
    strategy = module.get(JwtStrategy);
  });

  it('resolves the current role from the store', async () => {
    repo.findOne.mockResolvedValue(
      Object.assign(new User(), {
        id: 5,
        username: 'mod',
        role: 'moderator',
        is_superuser: false,
      }),
    );
    await expect(strategy.validate({ sub: 5, username: 'mod' })).resolves.toEqual({
      userId: 5,
      username: 'mod',
      role: 'moderator',
      isSuperuser: false,
    });
    expect(repo.findOne).toHaveBeenCalledWith({ where: { id: 5 } });
  });

  it('rejects tokens of deleted users', async () => {
    repo.findOne.mockResolvedValue(null);
    await expect(
      strategy.validate({ sub: 9, username: 'gone' }),
    ).rejects.toBeInstanceOf(UnauthorizedException);
  });
});
