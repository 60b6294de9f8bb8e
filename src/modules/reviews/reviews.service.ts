import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Review } from '../../entities/review.entity';
import { Title } from '../../entities/title.entity';
import { isUniqueViolation } from '../../utils/db-errors';
import { validationFailed } from '../../utils/validation';
import { Page, normalizePage, toPage } from '../../utils/pagination';
import type { PaginateQueryDto } from '../../utils/paginate-query.dto';
import { AccessPolicy } from '../access/access-policy.service';
import type { Actor } from '../access/access.rules';
import {
  CreateReviewDto,
  ReviewResponseDto,
  UpdateReviewDto,
  toReviewResponse,
} from './dto/review.dto';

export const DUPLICATE_REVIEW = 'You have already reviewed this title.';

@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    @InjectRepository(Review)
    private reviewRepository: Repository<Review>,
    @InjectRepository(Title)
    private titleRepository: Repository<Title>,
    private policy: AccessPolicy,
  ) {}

  async list(
    titleId: number,
    query: PaginateQueryDto,
  ): Promise<Page<ReviewResponseDto>> {
    await this.getTitle(titleId);
    const page = normalizePage(query);
    const result = await this.reviewRepository.findAndCount({
      where: { title: { id: titleId } },
      relations: ['author', 'title'],
      order: { pub_date: 'DESC', id: 'DESC' },
      take: page.limit,
      skip: page.offset,
    });
    return toPage(result, page, toReviewResponse);
  }

  async findOne(titleId: number, reviewId: number): Promise<ReviewResponseDto> {
    return toReviewResponse(await this.getScoped(titleId, reviewId));
  }

  /**
   * Loads a review only through its title, so a review id paired with a
   * different title is a 404 rather than a leak.
   */
  async getScoped(titleId: number, reviewId: number): Promise<Review> {
    const review = await this.reviewRepository.findOne({
      where: { id: reviewId, title: { id: titleId } },
      relations: ['author', 'title'],
    });
    if (!review) throw new NotFoundException('Review not found');
    return review;
  }

  async create(
    titleId: number,
    actor: Actor,
    dto: CreateReviewDto,
  ): Promise<ReviewResponseDto> {
    const title = await this.getTitle(titleId);
    const existing = await this.reviewRepository.count({
      where: { title: { id: titleId }, author: { id: actor.userId } },
    });
    if (existing > 0) throw this.duplicate();

    const review = this.reviewRepository.create({
      text: dto.text,
      score: dto.score,
      title,
      author: { id: actor.userId, username: actor.username },
    });
    try {
      const saved = await this.reviewRepository.save(review);
      this.logger.log(`Review ${saved.id} on title ${titleId} by user ${actor.userId}`);
      return toReviewResponse(saved);
    } catch (error) {
      // the unique index settles a race the count above cannot see
      if (isUniqueViolation(error)) throw this.duplicate();
      throw error;
    }
  }

  async update(
    titleId: number,
    reviewId: number,
    actor: Actor,
    dto: UpdateReviewDto,
  ): Promise<ReviewResponseDto> {
    const review = await this.getScoped(titleId, reviewId);
    this.policy.assert('review', 'update', actor, { authorId: review.author.id });
    if (dto.text !== undefined) review.text = dto.text;
    if (dto.score !== undefined) review.score = dto.score;
    return toReviewResponse(await this.reviewRepository.save(review));
  }

  // comments go with the review (FK cascade)
  async remove(titleId: number, reviewId: number, actor: Actor): Promise<void> {
    const review = await this.getScoped(titleId, reviewId);
    this.policy.assert('review', 'delete', actor, { authorId: review.author.id });
    await this.reviewRepository.remove(review);
    this.logger.log(`Review ${reviewId} removed by user ${actor.userId}`);
  }

  private async getTitle(titleId: number): Promise<Title> {
    const title = await this.titleRepository.findOne({ where: { id: titleId } });
    if (!title) throw new NotFoundException(`Title with ID ${titleId} not found`);
    return title;
  }

  private duplicate() {
    return validationFailed({ non_field_errors: [DUPLICATE_REVIEW] }, DUPLICATE_REVIEW);
  }
}
