import {
  ArrayUnique,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOmittable } from '../../../utils/validation';

export class CreateTitleDto {
  @ApiProperty({ example: 'Solaris' })
  @IsNotEmpty()
  @IsString()
  name!: string;

  @ApiProperty({
    description: 'Release year, not later than the current year',
    example: 1972,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  year!: number;

  @ApiProperty({ required: false, example: 'A psychologist is sent to a station...' })
  @IsOptional()
  @IsString()
  description?: string;

  @ApiProperty({
    description: 'Genre slugs',
    required: false,
    type: [String],
    example: ['drama', 'sci-fi'],
  })
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  genre?: string[];

  @ApiProperty({
    description: 'Category slug; null detaches the category',
    required: false,
    nullable: true,
    example: 'movie',
  })
  @IsOptional()
  @IsString()
  category?: string | null;
}

// category and description may be cleared with null; the rest may only be left out
export class UpdateTitleDto {
  @ApiPropertyOptional({ example: 'Solaris' })
  @IsOmittable()
  @IsNotEmpty()
  @IsString()
  name?: string;

  @ApiPropertyOptional({ example: 1972, minimum: 0 })
  @IsOmittable()
  @IsInt()
  @Min(0)
  year?: number;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  description?: string | null;

  @ApiPropertyOptional({ description: 'Genre slugs', type: [String] })
  @IsOmittable()
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  genre?: string[];

  @ApiPropertyOptional({
    description: 'Category slug; null detaches the category',
    nullable: true,
  })
  @IsOptional()
  @IsString()
  category?: string | null;
}
