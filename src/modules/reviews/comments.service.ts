import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Comment } from '../../entities/comment.entity';
import { Page, normalizePage, toPage } from '../../utils/pagination';
import type { PaginateQueryDto } from '../../utils/paginate-query.dto';
import { AccessPolicy } from '../access/access-policy.service';
import type { Actor } from '../access/access.rules';
import { ReviewsService } from './reviews.service';
import {
  CommentResponseDto,
  CreateCommentDto,
  UpdateCommentDto,
  toCommentResponse,
} from './dto/comment.dto';

@Injectable()
export class CommentsService {
  constructor(
    @InjectRepository(Comment)
    private commentRepository: Repository<Comment>,
    private reviews: ReviewsService,
    private policy: AccessPolicy,
  ) {}

  async list(
    titleId: number,
    reviewId: number,
    query: PaginateQueryDto,
  ): Promise<Page<CommentResponseDto>> {
    const review = await this.reviews.getScoped(titleId, reviewId);
    const page = normalizePage(query);
    const result = await this.commentRepository.findAndCount({
      where: { review: { id: review.id } },
      relations: ['author', 'review'],
      order: { pub_date: 'DESC', id: 'DESC' },
      take: page.limit,
      skip: page.offset,
    });
    return toPage(result, page, toCommentResponse);
  }

  async findOne(
    titleId: number,
    reviewId: number,
    commentId: number,
  ): Promise<CommentResponseDto> {
    return toCommentResponse(await this.getScoped(titleId, reviewId, commentId));
  }

  async create(
    titleId: number,
    reviewId: number,
    actor: Actor,
    dto: CreateCommentDto,
  ): Promise<CommentResponseDto> {
    const review = await this.reviews.getScoped(titleId, reviewId);
    const comment = this.commentRepository.create({
      text: dto.text,
      review,
      author: { id: actor.userId, username: actor.username },
    });
    return toCommentResponse(await this.commentRepository.save(comment));
  }

  async update(
    titleId: number,
    reviewId: number,
    commentId: number,
    actor: Actor,
    dto: UpdateCommentDto,
  ): Promise<CommentResponseDto> {
    const comment = await this.getScoped(titleId, reviewId, commentId);
    this.policy.assert('comment', 'update', actor, { authorId: comment.author.id });
    if (dto.text !== undefined) comment.text = dto.text;
    return toCommentResponse(await this.commentRepository.save(comment));
  }

  async remove(
    titleId: number,
    reviewId: number,
    commentId: number,
    actor: Actor,
  ): Promise<void> {
    const comment = await this.getScoped(titleId, reviewId, commentId);
    this.policy.assert('comment', 'delete', actor, { authorId: comment.author.id });
    await this.commentRepository.remove(comment);
  }

  private async getScoped(
    titleId: number,
    reviewId: number,
    commentId: number,
  ): Promise<Comment> {
    const comment = await this.commentRepository.findOne({
      where: { id: commentId, review: { id: reviewId, title: { id: titleId } } },
      relations: ['author', 'review'],
    });
    if (!comment) throw new NotFoundException('Comment not found');
    return comment;
  }
}
