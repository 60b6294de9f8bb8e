import type { DeepPartial, ObjectLiteral, SelectQueryBuilder } from 'typeorm';

type Fn<Args extends unknown[], Ret> = jest.MockedFunction<
  (...args: Args) => Ret
>;

export interface RepoMock<T extends ObjectLiteral> {
  find: Fn<[object?], Promise<T[]>>;
  findOne: Fn<[object?], Promise<T | null>>;
  save: Fn<[T], Promise<T>>;
  remove: Fn<[T], Promise<T>>;
  create: Fn<[DeepPartial<T>], T>;
  count: Fn<[object?], Promise<number>>;
  findAndCount: Fn<[object?], Promise<[T[], number]>>;
  createQueryBuilder: Fn<[string?], Partial<SelectQueryBuilder<T>>>;
}

export function createRepoMock<T extends ObjectLiteral>(
  overrides?: Partial<RepoMock<T>>,
): RepoMock<T> {
  const repo: RepoMock<T> = {
    find: jest.fn<Promise<T[]>, [object?]>(),
    findOne: jest.fn<Promise<T | null>, [object?]>(),
    save: jest.fn<Promise<T>, [T]>(),
    remove: jest.fn<Promise<T>, [T]>(),
    create: jest.fn<T, [DeepPartial<T>]>(),
    count: jest.fn<Promise<number>, [object?]>(),
    findAndCount: jest.fn<Promise<[T[], number]>, [object?]>(),
    createQueryBuilder: jest.fn<Partial<SelectQueryBuilder<T>>, [string?]>(),
  };
  if (overrides) Object.assign(repo, overrides);
  return repo;
}

const CHAIN_METHODS = [
  'select',
  'addSelect',
  'where',
  'andWhere',
  'leftJoinAndSelect',
  'innerJoin',
  'orderBy',
  'addOrderBy',
  'groupBy',
  'take',
  'skip',
] as const;

export type QueryBuilderMock = Record<
  (typeof CHAIN_METHODS)[number] | 'getOne' | 'getMany' | 'getManyAndCount' | 'getRawMany',
  jest.Mock
>;

// every builder step returns the builder; terminal calls resolve empty
export function createQueryBuilderMock(): QueryBuilderMock {
  const qb: QueryBuilderMock = {
    select: jest.fn(),
    addSelect: jest.fn(),
    where: jest.fn(),
    andWhere: jest.fn(),
    leftJoinAndSelect: jest.fn(),
    innerJoin: jest.fn(),
    orderBy: jest.fn(),
    addOrderBy: jest.fn(),
    groupBy: jest.fn(),
    take: jest.fn(),
    skip: jest.fn(),
    getOne: jest.fn().mockResolvedValue(null),
    getMany: jest.fn().mockResolvedValue([]),
    getManyAndCount: jest.fn().mockResolvedValue([[], 0]),
    getRawMany: jest.fn().mockResolvedValue([]),
  };
  for (const name of CHAIN_METHODS) qb[name].mockReturnValue(qb);
  return qb;
}
