import { ApiPropertyOptional, OmitType } from '@nestjs/swagger';
import {
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { USER_ROLES, UserRole } from '../../../entities/user.entity';
import { IsOmittable } from '../../../utils/validation';
import { USERNAME_PATTERN } from '../../auth/dto/signup.dto';

// only bio may be cleared with null
export class UpdateUserDto {
  @ApiPropertyOptional({ example: 'john_doe' })
  @IsOmittable()
  @IsNotEmpty()
  @IsString()
  @MaxLength(150)
  @Matches(USERNAME_PATTERN, {
    message: 'username may contain only letters, digits and @/./+/-/_',
  })
  username?: string;

  @ApiPropertyOptional({ example: 'john@example.com', format: 'email' })
  @IsOmittable()
  @IsEmail()
  @MaxLength(254)
  email?: string;

  @ApiPropertyOptional({ example: 'John' })
  @IsOmittable()
  @IsString()
  @MaxLength(150)
  first_name?: string;

  @ApiPropertyOptional({ example: 'Doe' })
  @IsOmittable()
  @IsString()
  @MaxLength(150)
  last_name?: string;

  @ApiPropertyOptional({ nullable: true, example: 'Watches everything twice' })
  @IsOptional()
  @IsString()
  bio?: string | null;

  @ApiPropertyOptional({ enum: USER_ROLES })
  @IsOmittable()
  @IsIn(USER_ROLES)
  role?: UserRole;
}

// no `role`: the validation pipe whitelists it away, so a submitted role is ignored
export class UpdateProfileDto extends OmitType(UpdateUserDto, ['role'] as const) {}
