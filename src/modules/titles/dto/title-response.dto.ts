import { ApiProperty } from '@nestjs/swagger';
import { Title } from '../../../entities/title.entity';
import {
  SlugEntityResponseDto,
  toSlugEntity,
} from '../../catalog/dto/slug-entity.dto';

export class TitleResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'Solaris' })
  name!: string;

  @ApiProperty({ example: 1972 })
  year!: number;

  @ApiProperty({
    description: 'Integer part of the average review score; null without reviews',
    nullable: true,
    example: 8,
  })
  rating!: number | null;

  @ApiProperty({ nullable: true })
  description!: string | null;

  @ApiProperty({ type: [SlugEntityResponseDto] })
  genre!: SlugEntityResponseDto[];

  @ApiProperty({ type: SlugEntityResponseDto, nullable: true })
  category!: SlugEntityResponseDto | null;
}

export function toTitleResponse(
  title: Title,
  rating: number | null,
): TitleResponseDto {
  return {
    id: title.id,
    name: title.name,
    year: title.year,
    rating,
    description: title.description,
    genre: (title.genres ?? []).map(toSlugEntity),
    category: title.category ? toSlugEntity(title.category) : null,
  };
}
