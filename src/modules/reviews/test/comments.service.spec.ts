import { Test, TestingModule } from '@nestjs/testing';
import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CommentsService } from '../comments.service';
import { ReviewsService } from '../reviews.service';
import { AccessPolicy } from '../../access/access-policy.service';
import { Actor } from '../../access/access.rules';
import { Comment } from '../../../entities/comment.entity';
import { Review } from '../../../entities/review.entity';
import { User } from '../../../entities/user.entity';
import { createRepoMock } from '../../../../test/repo-mocks';

const PUB = new Date('2024-02-03T04:05:06Z');

const owner: Actor = { userId: 1, username: 'alice', role: 'user', isSuperuser: false };
const other: Actor = { userId: 2, username: 'bob', role: 'user', isSuperuser: false };
const admin: Actor = { userId: 3, username: 'boss', role: 'admin', isSuperuser: false };

const review = Object.assign(new Review(), { id: 100 });
const comment = () =>
  Object.assign(new Comment(), {
    id: 500,
    text: 'Agreed',
    pub_date: PUB,
    review,
    author: Object.assign(new User(), { id: 1, username: 'alice' }),
  });

describe('CommentsService', () => {
  let service: CommentsService;
  const comments = createRepoMock<Comment>();
  const reviews = { getScoped: jest.fn<Promise<Review>, [number, number]>() };

  beforeEach(async () => {
    jest.clearAllMocks();
    reviews.getScoped.mockReset().mockResolvedValue(review);
    comments.findOne.mockReset().mockResolvedValue(comment());
    comments.create.mockImplementation((v) => Object.assign(new Comment(), v));
    comments.save.mockImplementation(async (c) =>
      Object.assign(c, { id: c.id ?? 501, pub_date: PUB }),
    );

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CommentsService,
        AccessPolicy,
        { provide: ReviewsService, useValue: reviews },
        { provide: getRepositoryToken(Comment), useValue: comments },
      ],
    }).compile();
    service = module.get(CommentsService);
  });

  it('creates a comment on a scoped review', async () => {
    await expect(service.create(10, 100, other, { text: 'Nope' })).resolves.toEqual({
      id: 501,
      text: 'Nope',
      author: 'bob',
      pub_date: PUB,
      review: 100,
    });
    expect(reviews.getScoped).toHaveBeenCalledWith(10, 100);
  });

  it('propagates 404 for a review outside the title', async () => {
    reviews.getScoped.mockRejectedValue(new NotFoundException('Review not found'));
    await expect(service.list(11, 100, {})).rejects.toBeInstanceOf(NotFoundException);
    expect(comments.findAndCount).not.toHaveBeenCalled();
  });

  it('scopes single lookups by review and title', async () => {
    await service.findOne(10, 100, 500);
    expect(comments.findOne).toHaveBeenCalledWith({
      where: { id: 500, review: { id: 100, title: { id: 10 } } },
      relations: ['author', 'review'],
    });
  });

  it('answers 404 for an unknown comment', async () => {
    comments.findOne.mockResolvedValue(null);
    await expect(service.findOne(10, 100, 999)).rejects.toThrow(
      new NotFoundException('Comment not found'),
    );
  });

  it('lets the author and staff edit, nobody else', async () => {
    await expect(
      service.update(10, 100, 500, owner, { text: 'Mine' }),
    ).resolves.toMatchObject({ text: 'Mine' });
    await expect(
      service.update(10, 100, 500, admin, { text: 'Admin' }),
    ).resolves.toMatchObject({ text: 'Admin' });
    await expect(
      service.update(10, 100, 500, other, { text: 'Hijack' }),
    ).rejects.toBeInstanceOf(ForbiddenException);
  });

  it("forbids deleting another user's comment", async () => {
    await expect(service.remove(10, 100, 500, other)).rejects.toBeInstanceOf(
      ForbiddenException,
    );
    await service.remove(10, 100, 500, owner);
    expect(comments.remove).toHaveBeenCalledTimes(1);
  });
});
