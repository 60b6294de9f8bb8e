import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Genre } from '../../entities/genre.entity';
import { isUniqueViolation } from '../../utils/db-errors';
import { FieldErrors, validationFailed } from '../../utils/validation';
import { Page, normalizePage, toPage } from '../../utils/pagination';
import type { SearchQueryDto } from '../../utils/paginate-query.dto';
import {
  CreateSlugEntityDto,
  SlugEntityResponseDto,
  UpdateSlugEntityDto,
  toSlugEntity,
} from './dto/slug-entity.dto';

@Injectable()
export class GenresService {
  constructor(
    @InjectRepository(Genre)
    private readonly genreRepository: Repository<Genre>,
  ) {}

  async list(query: SearchQueryDto): Promise<Page<SlugEntityResponseDto>> {
    const page = normalizePage(query);
    const qb = this.genreRepository
      .createQueryBuilder('genre')
      .orderBy('genre.name', 'DESC')
      .take(page.limit)
      .skip(page.offset);
    if (query.search) {
      qb.where('LOWER(genre.name) LIKE :search', {
        search: `%${query.search.toLowerCase()}%`,
      });
    }
    return toPage(await qb.getManyAndCount(), page, toSlugEntity);
  }

  async findBySlug(slug: string): Promise<Genre> {
    const genre = await this.genreRepository.findOne({ where: { slug } });
    if (!genre) {
      throw new NotFoundException(`Genre ${slug} not found`);
    }
    return genre;
  }

  async create(dto: CreateSlugEntityDto): Promise<Genre> {
    await this.assertUnique(dto.name, dto.slug);
    return this.persist(
      this.genreRepository.create({ name: dto.name, slug: dto.slug }),
    );
  }

  async update(slug: string, dto: UpdateSlugEntityDto): Promise<Genre> {
    const genre = await this.findBySlug(slug);
    await this.assertUnique(dto.name, dto.slug, genre.id);
    if (dto.name !== undefined) genre.name = dto.name;
    if (dto.slug !== undefined) genre.slug = dto.slug;
    return this.persist(genre);
  }

  async remove(slug: string): Promise<void> {
    const genre = await this.findBySlug(slug);
    await this.genreRepository.remove(genre);
  }

  private async assertUnique(
    name: string | undefined,
    slug: string | undefined,
    exceptId?: number,
  ): Promise<void> {
    const errors: FieldErrors = {};
    if (name !== undefined) {
      const other = await this.genreRepository.findOne({ where: { name } });
      if (other && other.id !== exceptId) {
        errors.name = ['Genre with this name already exists.'];
      }
    }
    if (slug !== undefined) {
      const other = await this.genreRepository.findOne({ where: { slug } });
      if (other && other.id !== exceptId) {
        errors.slug = ['Genre with this slug already exists.'];
      }
    }
    if (Object.keys(errors).length > 0) throw validationFailed(errors);
  }

  private async persist(genre: Genre): Promise<Genre> {
    try {
      return await this.genreRepository.save(genre);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw validationFailed({
          slug: ['Genre with this name or slug already exists.'],
        });
      }
      throw error;
    }
  }
}
