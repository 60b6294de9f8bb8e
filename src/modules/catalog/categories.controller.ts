import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { OptionalJwtAuthGuard } from '../auth/guards/optional-jwt-auth.guard';
import { AccessGuard } from '../access/access.guard';
import { Access } from '../access/access.decorator';
import { SearchQueryDto } from '../../utils/paginate-query.dto';
import { CategoriesService } from './categories.service';
import {
  CreateSlugEntityDto,
  SlugEntityResponseDto,
  UpdateSlugEntityDto,
  toSlugEntity,
} from './dto/slug-entity.dto';

@ApiTags('categories')
@Controller('categories')
@UseGuards(OptionalJwtAuthGuard, AccessGuard)
@Access('category')
export class CategoriesController {
  constructor(private readonly categoriesService: CategoriesService) {}

  @Get()
  @ApiOperation({ summary: 'List categories (public, search by name)' })
  @ApiResponse({ status: 200, description: 'Paged categories' })
  list(@Query() query: SearchQueryDto) {
    return this.categoriesService.list(query);
  }

  @Get(':slug')
  @ApiOperation({ summary: 'Get category by slug (public)' })
  @ApiResponse({ status: 200, type: SlugEntityResponseDto })
  @ApiResponse({ status: 404, description: 'Category not found' })
  async findOne(@Param('slug') slug: string) {
    return toSlugEntity(await this.categoriesService.findBySlug(slug));
  }

  @Post()
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Create category (admin)' })
  @ApiResponse({ status: 201, type: SlugEntityResponseDto })
  @ApiResponse({ status: 400, description: 'Name or slug already used' })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async create(@Body() dto: CreateSlugEntityDto) {
    return toSlugEntity(await this.categoriesService.create(dto));
  }

  @Patch(':slug')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Rename category (admin)' })
  @ApiResponse({ status: 200, type: SlugEntityResponseDto })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async update(@Param('slug') slug: string, @Body() dto: UpdateSlugEntityDto) {
    return toSlugEntity(await this.categoriesService.update(slug, dto));
  }

  @Delete(':slug')
  @HttpCode(204)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({
    summary: 'Delete category (admin); its titles keep existing without one',
  })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async remove(@Param('slug') slug: string): Promise<void> {
    await this.categoriesService.remove(slug);
  }
}
