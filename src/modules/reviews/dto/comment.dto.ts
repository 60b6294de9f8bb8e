import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import { Comment } from '../../../entities/comment.entity';
import { IsOmittable } from '../../../utils/validation';

export class CreateCommentDto {
  @ApiProperty({ example: 'Agreed, the ending stays with you.' })
  @IsNotEmpty()
  @IsString()
  text!: string;
}

export class UpdateCommentDto {
  @ApiPropertyOptional({ example: 'Agreed, the ending stays with you.' })
  @IsOmittable()
  @IsNotEmpty()
  @IsString()
  text?: string;
}

export class CommentResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'Agreed, the ending stays with you.' })
  text!: string;

  @ApiProperty({ description: 'Author username', example: 'bob' })
  author!: string;

  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' })
  pub_date!: Date;

  @ApiProperty({ description: 'Review ID', example: 1 })
  review!: number;
}

export function toCommentResponse(comment: Comment): CommentResponseDto {
  return {
    id: comment.id,
    text: comment.text,
    author: comment.author.username,
    pub_date: comment.pub_date,
    review: comment.review.id,
  };
}
