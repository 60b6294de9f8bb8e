import {
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { USER_ROLES, UserRole } from '../../../entities/user.entity';
import { USERNAME_PATTERN } from '../../auth/dto/signup.dto';

export class CreateUserDto {
  @ApiProperty({ description: 'Username for the user', example: 'john_doe' })
  @IsNotEmpty()
  @IsString()
  @MaxLength(150)
  @Matches(USERNAME_PATTERN, {
    message: 'username may contain only letters, digits and @/./+/-/_',
  })
  username!: string;

  @ApiProperty({
    description: 'Email address of the user',
    example: 'john@example.com',
    format: 'email',
  })
  @IsEmail()
  @MaxLength(254)
  email!: string;

  @ApiProperty({ required: false, example: 'John' })
  @IsOptional()
  @IsString()
  @MaxLength(150)
  first_name?: string;

  @ApiProperty({ required: false, example: 'Doe' })
  @IsOptional()
  @IsString()
  @MaxLength(150)
  last_name?: string;

  @ApiProperty({ required: false, example: 'Watches everything twice' })
  @IsOptional()
  @IsString()
  bio?: string;

  @ApiProperty({ required: false, enum: USER_ROLES, default: 'user' })
  @IsOptional()
  @IsIn(USER_ROLES)
  role?: UserRole;
}
