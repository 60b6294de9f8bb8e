import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Title } from '../../entities/title.entity';
import { Category } from '../../entities/category.entity';
import { Genre } from '../../entities/genre.entity';
import { Review } from '../../entities/review.entity';
import { fieldError } from '../../utils/validation';
import { Page, normalizePage } from '../../utils/pagination';
import { CreateTitleDto, UpdateTitleDto } from './dto/create-title.dto';
import { TitleFilterDto } from './dto/title-filter.dto';
import { TitleResponseDto, toTitleResponse } from './dto/title-response.dto';

@Injectable()
export class TitlesService {
  constructor(
    @InjectRepository(Title)
    private titleRepository: Repository<Title>,
    @InjectRepository(Category)
    private categoryRepository: Repository<Category>,
    @InjectRepository(Genre)
    private genreRepository: Repository<Genre>,
    @InjectRepository(Review)
    private reviewRepository: Repository<Review>,
  ) {}

  async findAll(filter: TitleFilterDto): Promise<Page<TitleResponseDto>> {
    const page = normalizePage(filter);
    const qb = this.titleRepository
      .createQueryBuilder('title')
      .leftJoinAndSelect('title.category', 'category')
      .leftJoinAndSelect('title.genres', 'genre')
      .orderBy('title.id', 'ASC')
      .take(page.limit)
      .skip(page.offset);
    if (filter.genre) {
      // separate alias so that the selected genres are not narrowed to the filter
      qb.innerJoin('title.genres', 'genre_filter', 'genre_filter.slug = :genreSlug', {
        genreSlug: filter.genre,
      });
    }
    if (filter.category) {
      qb.andWhere('category.slug = :categorySlug', {
        categorySlug: filter.category,
      });
    }
    if (filter.name) {
      qb.andWhere('LOWER(title.name) LIKE :name', {
        name: `%${filter.name.toLowerCase()}%`,
      });
    }
    if (filter.year !== undefined) {
      qb.andWhere('title.year = :year', { year: filter.year });
    }
    const [titles, total] = await qb.getManyAndCount();
    const ratings = await this.ratings(titles.map((t) => t.id));
    return {
      total,
      limit: page.limit,
      offset: page.offset,
      items: titles.map((t) => toTitleResponse(t, ratings.get(t.id) ?? null)),
    };
  }

  async findOne(id: number): Promise<TitleResponseDto> {
    const title = await this.getTitle(id);
    const ratings = await this.ratings([id]);
    return toTitleResponse(title, ratings.get(id) ?? null);
  }

  async create(dto: CreateTitleDto): Promise<TitleResponseDto> {
    this.assertYear(dto.year);
    const title = this.titleRepository.create({
      name: dto.name,
      year: dto.year,
      description: dto.description ?? null,
      category: dto.category ? await this.resolveCategory(dto.category) : null,
      genres: dto.genre ? await this.resolveGenres(dto.genre) : [],
    });
    const saved = await this.titleRepository.save(title);
    return this.findOne(saved.id);
  }

  async update(id: number, dto: UpdateTitleDto): Promise<TitleResponseDto> {
    const title = await this.getTitle(id);
    if (dto.year !== undefined) {
      this.assertYear(dto.year);
      title.year = dto.year;
    }
    if (dto.name !== undefined) title.name = dto.name;
    if (dto.description !== undefined) title.description = dto.description;
    if (dto.category !== undefined) {
      title.category = dto.category
        ? await this.resolveCategory(dto.category)
        : null;
    }
    if (dto.genre !== undefined) {
      title.genres = await this.resolveGenres(dto.genre);
    }
    await this.titleRepository.save(title);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    const title = await this.getTitle(id);
    await this.titleRepository.remove(title);
  }

  /**
   * Checked at request time: the column constraint cannot express a bound
   * that moves with the calendar.
   */
  assertYear(year: number, now: Date = new Date()): void {
    const current = now.getFullYear();
    if (year > current) {
      throw fieldError('year', `Year must not be greater than ${current}.`);
    }
  }

  private async getTitle(id: number): Promise<Title> {
    const title = await this.titleRepository.findOne({
      where: { id },
      relations: ['category', 'genres'],
    });
    if (!title) {
      throw new NotFoundException(`Title with ID ${id} not found`);
    }
    return title;
  }

  private async resolveCategory(slug: string): Promise<Category> {
    const category = await this.categoryRepository.findOne({ where: { slug } });
    if (!category) {
      throw fieldError('category', `Category "${slug}" does not exist.`);
    }
    return category;
  }

  private async resolveGenres(slugs: string[]): Promise<Genre[]> {
    if (slugs.length === 0) return [];
    const genres = await this.genreRepository.find({
      where: { slug: In(slugs) },
    });
    const found = new Set(genres.map((g) => g.slug));
    const missing = slugs.filter((s) => !found.has(s));
    if (missing.length > 0) {
      throw fieldError('genre', `Genre "${missing[0]}" does not exist.`);
    }
    return genres;
  }

  // average review score per title, truncated to an integer
  private async ratings(titleIds: number[]): Promise<Map<number, number>> {
    const result = new Map<number, number>();
    if (titleIds.length === 0) return result;
    const rows = await this.reviewRepository
      .createQueryBuilder('review')
      .select('review.title_id', 'titleId')
      .addSelect('AVG(review.score)', 'avg')
      .where('review.title_id IN (:...titleIds)', { titleIds })
      .groupBy('review.title_id')
      .getRawMany<{ titleId: number | string; avg: number | string | null }>();
    for (const row of rows) {
      if (row.avg === null) continue;
      result.set(Number(row.titleId), Math.trunc(Number(row.avg)));
    }
    return result;
  }
}
