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
import { CommentsService } from './comments.service';
import {
  CommentResponseDto,
  CreateCommentDto,
  UpdateCommentDto,
} from './dto/comment.dto';

@ApiTags('comments')
@Controller('titles/:titleId/reviews/:reviewId/comments')
@UseGuards(OptionalJwtAuthGuard, AccessGuard)
@Access('comment')
export class CommentsController {
  constructor(private readonly commentsService: CommentsService) {}

  @Get()
  @ApiOperation({ summary: 'List comments of a review (public)' })
  @ApiResponse({ status: 200, description: 'Paged comments' })
  @ApiResponse({ status: 404, description: 'Review not found for this title' })
  list(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Query() query: PaginateQueryDto,
  ) {
    return this.commentsService.list(titleId, reviewId, query);
  }

  @Get(':commentId')
  @ApiOperation({ summary: 'Get a comment (public)' })
  @ApiResponse({ status: 200, type: CommentResponseDto })
  @ApiResponse({ status: 404, description: 'Comment not found' })
  findOne(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Param('commentId', ParseIntPipe) commentId: number,
  ) {
    return this.commentsService.findOne(titleId, reviewId, commentId);
  }

  @Post()
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Comment on a review' })
  @ApiResponse({ status: 201, type: CommentResponseDto })
  @ApiResponse({ status: 403, description: 'Authentication required' })
  @ApiResponse({ status: 404, description: 'Review not found for this title' })
  create(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Body() dto: CreateCommentDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return this.commentsService.create(titleId, reviewId, req.user, dto);
  }

  @Patch(':commentId')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Edit a comment (author, moderator or admin)' })
  @ApiResponse({ status: 200, type: CommentResponseDto })
  @ApiResponse({ status: 403, description: 'Not the author and not staff' })
  update(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Param('commentId', ParseIntPipe) commentId: number,
    @Body() dto: UpdateCommentDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return this.commentsService.update(titleId, reviewId, commentId, req.user, dto);
  }

  @Delete(':commentId')
  @HttpCode(204)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Delete a comment (author, moderator or admin)' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 403, description: 'Not the author and not staff' })
  async remove(
    @Param('titleId', ParseIntPipe) titleId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Param('commentId', ParseIntPipe) commentId: number,
    @Req() req: AuthenticatedRequest,
  ): Promise<void> {
    await this.commentsService.remove(titleId, reviewId, commentId, req.user);
  }
}
