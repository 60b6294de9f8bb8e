import { IsEmail, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export const USERNAME_PATTERN = /^[\w.@+-]+$/;

export class SignupDto {
  @ApiProperty({
    description: 'Letters, digits and @/./+/-/_ only; "me" is reserved',
    example: 'alice',
    maxLength: 150,
  })
  @IsNotEmpty()
  @IsString()
  @MaxLength(150)
  @Matches(USERNAME_PATTERN, {
    message: 'username may contain only letters, digits and @/./+/-/_',
  })
  username!: string;

  @ApiProperty({ example: 'alice@example.com', format: 'email', maxLength: 254 })
  @IsEmail()
  @MaxLength(254)
  email!: string;
}
