import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { SignupDto } from './dto/signup.dto';
import { TokenDto } from './dto/token.dto';
import { SignupResponseDto, TokenResponseDto } from './dto/auth-responses.dto';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(private authService: AuthService) {}

  @Post('signup')
  @HttpCode(200)
  @ApiOperation({ summary: 'Register and receive a confirmation code by email' })
  @ApiResponse({ status: 200, type: SignupResponseDto })
  @ApiResponse({
    status: 400,
    description: 'Username or email taken by another user, or username "me"',
    schema: {
      example: {
        statusCode: 400,
        error: 'Bad Request',
        message: 'Validation failed',
        errors: { username: ['A user with that username already exists.'] },
      },
    },
  })
  signup(@Body() dto: SignupDto) {
    return this.authService.signup(dto);
  }

  @Post('token')
  @HttpCode(200)
  @ApiOperation({ summary: 'Exchange username + confirmation code for a JWT' })
  @ApiResponse({ status: 200, type: TokenResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid or expired confirmation code' })
  @ApiResponse({ status: 404, description: 'User not found' })
  token(@Body() dto: TokenDto) {
    return this.authService.exchange(dto);
  }
}
