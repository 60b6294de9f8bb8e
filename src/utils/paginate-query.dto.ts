import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsInt, IsString, MaxLength } from 'class-validator';
import { Type } from 'class-transformer';

export class PaginateQueryDto {
  @ApiProperty({
    description: 'Page size (1-100). Values <= 0 reset to 20; > 100 clamp to 100.',
    required: false,
    example: 20,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  limit?: number;

  @ApiProperty({
    description: 'Offset (>= 0). Negative values reset to 0.',
    required: false,
    example: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  offset?: number;
}

export class SearchQueryDto extends PaginateQueryDto {
  @ApiProperty({
    description: 'Case-insensitive substring match',
    required: false,
  })
  @IsOptional()
  @IsString()
  @MaxLength(256)
  search?: string;
}
