import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { IsOmittable } from '../../../utils/validation';

export const SLUG_PATTERN = /^[-a-zA-Z0-9_]+$/;

/** Request body shared by categories and genres. */
export class CreateSlugEntityDto {
  @ApiProperty({ example: 'Movie', maxLength: 256 })
  @IsNotEmpty()
  @IsString()
  @MaxLength(256)
  name!: string;

  @ApiProperty({ example: 'movie', maxLength: 50, pattern: SLUG_PATTERN.source })
  @IsNotEmpty()
  @IsString()
  @MaxLength(50)
  @Matches(SLUG_PATTERN, {
    message: 'slug may contain only latin letters, digits, "-" and "_"',
  })
  slug!: string;
}

export class UpdateSlugEntityDto {
  @ApiPropertyOptional({ example: 'Movie', maxLength: 256 })
  @IsOmittable()
  @IsNotEmpty()
  @IsString()
  @MaxLength(256)
  name?: string;

  @ApiPropertyOptional({ example: 'movie', maxLength: 50, pattern: SLUG_PATTERN.source })
  @IsOmittable()
  @IsNotEmpty()
  @IsString()
  @MaxLength(50)
  @Matches(SLUG_PATTERN, {
    message: 'slug may contain only latin letters, digits, "-" and "_"',
  })
  slug?: string;
}

export class SlugEntityResponseDto {
  @ApiProperty({ example: 'Movie' })
  name!: string;

  @ApiProperty({ example: 'movie' })
  slug!: string;
}

export function toSlugEntity(item: { name: string; slug: string }): SlugEntityResponseDto {
  return { name: item.name, slug: item.slug };
}
