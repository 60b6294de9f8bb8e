import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString } from 'class-validator';
import { Type } from 'class-transformer';
import { PaginateQueryDto } from '../../../utils/paginate-query.dto';

export class TitleFilterDto extends PaginateQueryDto {
  @ApiProperty({ required: false, description: 'Genre slug' })
  @IsOptional()
  @IsString()
  genre?: string;

  @ApiProperty({ required: false, description: 'Category slug' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiProperty({ required: false, description: 'Case-insensitive substring of the name' })
  @IsOptional()
  @IsString()
  name?: string;

  @ApiProperty({ required: false, example: 1972 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  year?: number;
}
