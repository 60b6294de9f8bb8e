import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Category } from '../../entities/category.entity';
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
export class CategoriesService {
  constructor(
    @InjectRepository(Category)
    private readonly categoryRepository: Repository<Category>,
  ) {}

  async list(query: SearchQueryDto): Promise<Page<SlugEntityResponseDto>> {
    const page = normalizePage(query);
    const qb = this.categoryRepository
      .createQueryBuilder('category')
      .orderBy('category.name', 'ASC')
      .take(page.limit)
      .skip(page.offset);
    if (query.search) {
      qb.where('LOWER(category.name) LIKE :search', {
        search: `%${query.search.toLowerCase()}%`,
      });
    }
    return toPage(await qb.getManyAndCount(), page, toSlugEntity);
  }

  async findBySlug(slug: string): Promise<Category> {
    const category = await this.categoryRepository.findOne({ where: { slug } });
    if (!category) {
      throw new NotFoundException(`Category ${slug} not found`);
    }
    return category;
  }

  async create(dto: CreateSlugEntityDto): Promise<Category> {
    await this.assertUnique(dto.name, dto.slug);
    return this.persist(
      this.categoryRepository.create({ name: dto.name, slug: dto.slug }),
    );
  }

  async update(slug: string, dto: UpdateSlugEntityDto): Promise<Category> {
    const category = await this.findBySlug(slug);
    await this.assertUnique(dto.name, dto.slug, category.id);
    if (dto.name !== undefined) category.name = dto.name;
    if (dto.slug !== undefined) category.slug = dto.slug;
    return this.persist(category);
  }

  async remove(slug: string): Promise<void> {
    const category = await this.findBySlug(slug);
    await this.categoryRepository.remove(category);
  }

  private async assertUnique(
    name: string | undefined,
    slug: string | undefined,
    exceptId?: number,
  ): Promise<void> {
    const errors: FieldErrors = {};
    if (name !== undefined) {
      const other = await this.categoryRepository.findOne({ where: { name } });
      if (other && other.id !== exceptId) {
        errors.name = ['Category with this name already exists.'];
      }
    }
    if (slug !== undefined) {
      const other = await this.categoryRepository.findOne({ where: { slug } });
      if (other && other.id !== exceptId) {
        errors.slug = ['Category with this slug already exists.'];
      }
    }
    if (Object.keys(errors).length > 0) throw validationFailed(errors);
  }

  private async persist(category: Category): Promise<Category> {
    try {
      return await this.categoryRepository.save(category);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw validationFailed({
          slug: ['Category with this name or slug already exists.'],
        });
      }
      throw error;
    }
  }
}
