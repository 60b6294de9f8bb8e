import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
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
import { TitlesService } from './titles.service';
import { CreateTitleDto, UpdateTitleDto } from './dto/create-title.dto';
import { TitleFilterDto } from './dto/title-filter.dto';
import { TitleResponseDto } from './dto/title-response.dto';

@ApiTags('titles')
@Controller('titles')
@UseGuards(OptionalJwtAuthGuard, AccessGuard)
@Access('title')
export class TitlesController {
  constructor(private readonly titlesService: TitlesService) {}

  @Get()
  @ApiOperation({
    summary: 'List titles with their rating (public)',
    description: 'Filters: genre slug, category slug, name substring, year.',
  })
  @ApiResponse({ status: 200, description: 'Paged titles' })
  findAll(@Query() filter: TitleFilterDto) {
    return this.titlesService.findAll(filter);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get title by ID (public)' })
  @ApiResponse({ status: 200, type: TitleResponseDto })
  @ApiResponse({ status: 404, description: 'Title not found' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.titlesService.findOne(id);
  }

  @Post()
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Create title (admin); genre and category by slug' })
  @ApiResponse({ status: 201, type: TitleResponseDto })
  @ApiResponse({
    status: 400,
    description: 'Year in the future or unknown genre/category slug',
    schema: {
      example: {
        statusCode: 400,
        error: 'Bad Request',
        message: 'Year must not be greater than 2026.',
        errors: { year: ['Year must not be greater than 2026.'] },
      },
    },
  })
  @ApiResponse({ status: 403, description: 'Admin only' })
  create(@Body() dto: CreateTitleDto) {
    return this.titlesService.create(dto);
  }

  @Patch(':id')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Update title (admin)' })
  @ApiResponse({ status: 200, type: TitleResponseDto })
  @ApiResponse({ status: 403, description: 'Admin only' })
  @ApiResponse({ status: 404, description: 'Title not found' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateTitleDto) {
    return this.titlesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Delete title with its reviews (admin)' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 403, description: 'Admin only' })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.titlesService.remove(id);
  }
}
