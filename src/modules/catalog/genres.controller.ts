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
import { GenresService } from './genres.service';
import {
  CreateSlugEntityDto,
  SlugEntityResponseDto,
  UpdateSlugEntityDto,
  toSlugEntity,
} from './dto/slug-entity.dto';

@ApiTags('genres')
@Controller('genres')
@UseGuards(OptionalJwtAuthGuard, AccessGuard)
@Access('genre')
export class GenresController {
  constructor(private readonly genresService: GenresService) {}

  @Get()
  @ApiOperation({ summary: 'List genres (public, search by name)' })
  @ApiResponse({ status: 200, description: 'Paged genres' })
  list(@Query() query: SearchQueryDto) {
    return this.genresService.list(query);
  }

  @Get(':slug')
  @ApiOperation({ summary: 'Get genre by slug (public)' })
  @ApiResponse({ status: 200, type: SlugEntityResponseDto })
  @ApiResponse({ status: 404, description: 'Genre not found' })
  async findOne(@Param('slug') slug: string) {
    return toSlugEntity(await this.genresService.findBySlug(slug));
  }

  @Post()
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Create genre (admin)' })
  @ApiResponse({ status: 201, type: SlugEntityResponseDto })
  @ApiResponse({ status: 400, description: 'Name or slug already used' })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async create(@Body() dto: CreateSlugEntityDto) {
    return toSlugEntity(await this.genresService.create(dto));
  }

  @Patch(':slug')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Rename genre (admin)' })
  @ApiResponse({ status: 200, type: SlugEntityResponseDto })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async update(@Param('slug') slug: string, @Body() dto: UpdateSlugEntityDto) {
    return toSlugEntity(await this.genresService.update(slug, dto));
  }

  @Delete(':slug')
  @HttpCode(204)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Delete genre (admin)' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async remove(@Param('slug') slug: string): Promise<void> {
    await this.genresService.remove(slug);
  }
}
