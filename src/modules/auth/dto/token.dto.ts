import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class TokenDto {
  @ApiProperty({ example: 'alice' })
  @IsNotEmpty()
  @IsString()
  username!: string;

  @ApiProperty({
    description: 'Code received by email after signup',
    example: 'sk3b0w-4f1c...',
  })
  @IsNotEmpty()
  @IsString()
  confirmation_code!: string;
}
