import { ApiProperty } from '@nestjs/swagger';
import { USER_ROLES, User, UserRole } from '../../../entities/user.entity';

export class UserResponseDto {
  @ApiProperty({ example: 'john_doe' })
  username!: string;

  @ApiProperty({ example: 'john@example.com' })
  email!: string;

  @ApiProperty({ example: 'John' })
  first_name!: string;

  @ApiProperty({ example: 'Doe' })
  last_name!: string;

  @ApiProperty({ nullable: true, example: null })
  bio!: string | null;

  @ApiProperty({ enum: USER_ROLES, example: 'user' })
  role!: UserRole;
}

export function toUserResponse(user: User): UserResponseDto {
  return {
    username: user.username,
    email: user.email,
    first_name: user.first_name,
    last_name: user.last_name,
    bio: user.bio,
    role: user.role,
  };
}
