import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Patch,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { OptionalJwtAuthGuard } from '../auth/guards/optional-jwt-auth.guard';
import { AccessGuard } from '../access/access.guard';
import { Access } from '../access/access.decorator';
import { SearchQueryDto } from '../../utils/paginate-query.dto';
import type { AuthenticatedRequest } from '../../types/request.interface';
import { UsersService } from './users.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateProfileDto, UpdateUserDto } from './dto/update-user.dto';
import { UserResponseDto, toUserResponse } from './dto/user-response.dto';

@ApiTags('users')
@ApiBearerAuth('JWT-auth')
@Controller('users')
@UseGuards(OptionalJwtAuthGuard, AccessGuard)
@Access('user')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @ApiOperation({ summary: 'List users (admin)' })
  @ApiResponse({ status: 200, description: 'Paged users' })
  @ApiResponse({ status: 403, description: 'Admin only' })
  list(@Query() query: SearchQueryDto) {
    return this.usersService.list(query);
  }

  @Post()
  @ApiOperation({ summary: 'Create a user (admin)' })
  @ApiResponse({ status: 201, type: UserResponseDto })
  @ApiResponse({ status: 400, description: 'Username/email taken or reserved' })
  async create(@Body() dto: CreateUserDto) {
    return toUserResponse(await this.usersService.create(dto));
  }

  // declared before :username so that "me" never reaches the admin lookup
  @Get('me')
  @Access('profile')
  @ApiOperation({ summary: 'Get own profile' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  async me(@Req() req: AuthenticatedRequest) {
    return toUserResponse(await this.usersService.getById(req.user.userId));
  }

  @Patch('me')
  @Access('profile')
  @ApiOperation({ summary: 'Edit own profile; role cannot be changed here' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  async updateMe(
    @Req() req: AuthenticatedRequest,
    @Body() dto: UpdateProfileDto,
  ) {
    return toUserResponse(
      await this.usersService.updateProfile(req.user.userId, dto),
    );
  }

  @Get(':username')
  @ApiOperation({ summary: 'Get a user by username (admin)' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  @ApiResponse({ status: 404, description: 'User not found' })
  async findOne(@Param('username') username: string) {
    return toUserResponse(await this.usersService.getByUsername(username));
  }

  @Patch(':username')
  @ApiOperation({ summary: 'Update a user, including role (admin)' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  async update(
    @Param('username') username: string,
    @Body() dto: UpdateUserDto,
  ) {
    return toUserResponse(await this.usersService.update(username, dto));
  }

  @Delete(':username')
  @HttpCode(204)
  @ApiOperation({ summary: 'Delete a user (admin)' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  async remove(@Param('username') username: string): Promise<void> {
    await this.usersService.remove(username);
  }
}
