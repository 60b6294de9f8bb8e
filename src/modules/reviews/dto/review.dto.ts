import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsString, Max, Min } from 'class-validator';
import { Review } from '../../../entities/review.entity';
import { IsOmittable } from '../../../utils/validation';

export class CreateReviewDto {
  @ApiProperty({ example: 'Slow, cold and unforgettable.' })
  @IsNotEmpty()
  @IsString()
  text!: string;

  @ApiProperty({ description: 'Score between 1 and 10', minimum: 1, maximum: 10, example: 9 })
  @IsInt()
  @Min(1, { message: 'score must be between 1 and 10' })
  @Max(10, { message: 'score must be between 1 and 10' })
  score!: number;
}

export class UpdateReviewDto {
  @ApiPropertyOptional({ example: 'Slow, cold and unforgettable.' })
  @IsOmittable()
  @IsNotEmpty()
  @IsString()
  text?: string;

  @ApiPropertyOptional({ description: 'Score between 1 and 10', minimum: 1, maximum: 10 })
  @IsOmittable()
  @IsInt()
  @Min(1, { message: 'score must be between 1 and 10' })
  @Max(10, { message: 'score must be between 1 and 10' })
  score?: number;
}

export class ReviewResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'Slow, cold and unforgettable.' })
  text!: string;

  @ApiProperty({ description: 'Author username', example: 'alice' })
  author!: string;

  @ApiProperty({ example: 9 })
  score!: number;

  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' })
  pub_date!: Date;

  @ApiProperty({ description: 'Title ID', example: 1 })
  title!: number;
}

export function toReviewResponse(review: Review): ReviewResponseDto {
  return {
    id: review.id,
    text: review.text,
    author: review.author.username,
    score: review.score,
    pub_date: review.pub_date,
    title: review.title.id,
  };
}
