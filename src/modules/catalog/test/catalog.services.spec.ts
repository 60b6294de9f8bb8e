import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { CategoriesService } from '../categories.service';
import { GenresService } from '../genres.service';
import { Category } from '../../../entities/category.entity';
import { Genre } from '../../../entities/genre.entity';
import {
  createQueryBuilderMock,
  createRepoMock,
} from '../../../../test/repo-mocks';

const category = (id: number, name: string, slug: string) =>
  Object.assign(new Category(), { id, name, slug });

describe('CategoriesService', () => {
  let service: CategoriesService;
  const repo = createRepoMock<Category>();

  beforeEach(async () => {
    jest.clearAllMocks();
    repo.findOne.mockReset().mockResolvedValue(null);
    repo.create.mockImplementation((v) => Object.assign(new Category(), v));
    repo.save.mockImplementation(async (c) => Object.assign(c, { id: c.id ?? 1 }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CategoriesService,
        { provide: getRepositoryToken(Category), useValue: repo },
      ],
    }).compile();
    service = module.get(CategoriesService);
  });

  it('lists by name ascending with a case-insensitive search', async () => {
    const qb = createQueryBuilderMock();
    qb.getManyAndCount.mockResolvedValue([[category(1, 'Book', 'book')], 1]);
    repo.createQueryBuilder.mockReturnValue(qb);

    await expect(service.list({ search: 'BO' })).resolves.toEqual({
      total: 1,
      limit: 20,
      offset: 0,
      items: [{ name: 'Book', slug: 'book' }],
    });
    expect(qb.orderBy).toHaveBeenCalledWith('category.name', 'ASC');
    expect(qb.where).toHaveBeenCalledWith('LOWER(category.name) LIKE :search', {
      search: '%bo%',
    });
  });

  it('creates a category', async () => {
    await expect(service.create({ name: 'Movie', slug: 'movie' })).resolves.toMatchObject({
      id: 1,
      name: 'Movie',
      slug: 'movie',
    });
  });

  it('rejects duplicate name and slug with field errors', async () => {
    repo.findOne.mockResolvedValue(category(3, 'Movie', 'movie'));
    const error = await service
      .create({ name: 'Movie', slug: 'movie' })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BadRequestException);
    if (!(error instanceof BadRequestException)) return;
    expect(error.getResponse()).toMatchObject({
      errors: {
        name: ['Category with this name already exists.'],
        slug: ['Category with this slug already exists.'],
      },
    });
  });

  it('lets an update keep its own name but not take a foreign slug', async () => {
    const existing = category(3, 'Movie', 'movie');
    // lookups: by slug (target), by name, by new slug
    repo.findOne
      .mockResolvedValueOnce(existing)
      .mockResolvedValueOnce(existing)
      .mockResolvedValueOnce(category(4, 'Film', 'film'));
    await expect(
      service.update('movie', { name: 'Movie', slug: 'film' }),
    ).rejects.toBeInstanceOf(BadRequestException);

    repo.findOne
      .mockResolvedValueOnce(existing)
      .mockResolvedValueOnce(existing)
      .mockResolvedValueOnce(null);
    await expect(
      service.update('movie', { name: 'Movie', slug: 'film' }),
    ).resolves.toMatchObject({ id: 3, name: 'Movie', slug: 'film' });
  });

  it('answers 404 for an unknown slug', async () => {
    await expect(service.findBySlug('nope')).rejects.toThrow(
      new NotFoundException('Category nope not found'),
    );
  });

  it('removes by slug', async () => {
    const existing = category(3, 'Movie', 'movie');
    repo.findOne.mockResolvedValue(existing);
    await service.remove('movie');
    expect(repo.remove).toHaveBeenCalledWith(existing);
  });
});

describe('GenresService', () => {
  let service: GenresService;
  const repo = createRepoMock<Genre>();

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [GenresService, { provide: getRepositoryToken(Genre), useValue: repo }],
    }).compile();
    service = module.get(GenresService);
  });

  it('lists by name descending', async () => {
    const qb = createQueryBuilderMock();
    repo.createQueryBuilder.mockReturnValue(qb);
    await service.list({ limit: 5, offset: 10 });
    expect(qb.orderBy).toHaveBeenCalledWith('genre.name', 'DESC');
    expect(qb.take).toHaveBeenCalledWith(5);
    expect(qb.skip).toHaveBeenCalledWith(10);
    expect(qb.where).not.toHaveBeenCalled();
  });

  it('answers 404 for an unknown slug', async () => {
    repo.findOne.mockResolvedValue(null);
    await expect(service.findBySlug('drama')).rejects.toBeInstanceOf(NotFoundException);
  });
});
