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
  Req,
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
import { PaginateQueryDto } from '../../utils/paginate-query.dto';
import type { AuthenticatedRequest } from '../../types/request.interface';
import { ReviewsService } from './reviews.service';
import {
  CreateReviewDto,
  ReviewResponseDto,
  UpdateReviewDto,
} from './dto/review.dto';

@ApiTags('reviews')
@Controller('titles/:titleId/reviews')
@UseGuards(OptionalJwtAuthGuard, AccessGuard)
@Access('review')
export class ReviewsController {
  constructor(private readonly reviewsService: ReviewsService) {}

  @Get()
  @ApiOperation({ summary: 'List reviews of a title (public)' })
  @ApiResponse({ status: 200, description: 'Paged reviews' })
  @ApiResponse({ status: 404, description: 'Title not found' })
  list(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Query() query: PaginateQueryDto,
  ) {
    return this.reviewsService.list(titleId, query);
  }

  @Get(':reviewId')
  @ApiOperation({ summary: 'Get a review of a title (public)' })
  @ApiResponse({ status: 200, type: ReviewResponseDto })
  @ApiResponse({ status: 404, description: 'Review not found for this title' })
  findOne(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
  ) {
    return this.reviewsService.findOne(titleId, reviewId);
  }

  @Post()
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Review a title; one review per user and title' })
  @ApiResponse({ status: 201, type: ReviewResponseDto })
  @ApiResponse({ status: 400, description: 'Already reviewed or score out of 1-10' })
  @ApiResponse({ status: 403, description: 'Authentication required' })
  @ApiResponse({ status: 404, description: 'Title not found' })
  create(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Body() dto: CreateReviewDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return this.reviewsService.create(titleId, req.user, dto);
  }

  @Patch(':reviewId')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Edit a review (author, moderator or admin)' })
  @ApiResponse({ status: 200, type: ReviewResponseDto })
  @ApiResponse({
    status: 403,
    description: 'Not the author and not staff',
    schema: {
      example: {
        statusCode: 403,
        message:
          'This action is allowed only for administrators, moderators or the author.',
        error: 'Forbidden',
      },
    },
  })
  update(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Body() dto: UpdateReviewDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return this.reviewsService.update(titleId, reviewId, req.user, dto);
  }

  @Delete(':reviewId')
  @HttpCode(204)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Delete a review and its comments (author, moderator or admin)' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 403, description: 'Not the author and not staff' })
  async remove(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Req() req: AuthenticatedRequest,
  ): Promise<void> {
    await this.reviewsService.remove(titleId, reviewId, req.user);
  }
}
