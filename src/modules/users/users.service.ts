import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RESERVED_USERNAME, User } from '../../entities/user.entity';
import { isUniqueViolation } from '../../utils/db-errors';
import { FieldErrors, fieldError, validationFailed } from '../../utils/validation';
import { Page, normalizePage, toPage } from '../../utils/pagination';
import type { SearchQueryDto } from '../../utils/paginate-query.dto';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateProfileDto, UpdateUserDto } from './dto/update-user.dto';
import { UserResponseDto, toUserResponse } from './dto/user-response.dto';

export const USERNAME_TAKEN = 'A user with that username already exists.';
export const EMAIL_TAKEN = 'A user with that email already exists.';
export const USERNAME_RESERVED = `Username "${RESERVED_USERNAME}" is reserved.`;

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  // usernames are unique regardless of case
  async findByUsername(username: string): Promise<User | null> {
    return this.userRepository
      .createQueryBuilder('u')
      .where('LOWER(u.username) = LOWER(:username)', { username })
      .getOne();
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.userRepository
      .createQueryBuilder('u')
      .where('LOWER(u.email) = LOWER(:email)', { email })
      .getOne();
  }

  async save(user: User): Promise<User> {
    return this.userRepository.save(user);
  }

  /**
   * Returns the user that owns both the username and the email, or creates
   * one when neither is taken. Either value belonging to someone else is a
   * validation error.
   */
  async findOrCreateForSignup(username: string, email: string): Promise<User> {
    this.assertNotReserved(username);
    const [byName, byEmail] = await Promise.all([
      this.findByUsername(username),
      this.findByEmail(email),
    ]);
    if (byName && byEmail && byName.id === byEmail.id) return byName;

    const errors: FieldErrors = {};
    if (byName) errors.username = [USERNAME_TAKEN];
    if (byEmail) errors.email = [EMAIL_TAKEN];
    if (byName || byEmail) throw validationFailed(errors);

    const user = this.userRepository.create({ username, email, role: 'user' });
    const saved = await this.persist(user);
    this.logger.log(`User ${saved.id} (${saved.username}) signed up`);
    return saved;
  }

  async list(query: SearchQueryDto): Promise<Page<UserResponseDto>> {
    const page = normalizePage(query);
    const qb = this.userRepository
      .createQueryBuilder('u')
      .orderBy('u.id', 'ASC')
      .take(page.limit)
      .skip(page.offset);
    if (query.search) {
      qb.where('LOWER(u.username) LIKE :search', {
        search: `%${query.search.toLowerCase()}%`,
      });
    }
    return toPage(await qb.getManyAndCount(), page, toUserResponse);
  }

  async create(dto: CreateUserDto): Promise<User> {
    this.assertNotReserved(dto.username);
    await this.assertAvailable(dto.username, dto.email);
    const user = this.userRepository.create({
      username: dto.username,
      email: dto.email,
      first_name: dto.first_name ?? '',
      last_name: dto.last_name ?? '',
      bio: dto.bio ?? null,
      role: dto.role ?? 'user',
    });
    return this.persist(user);
  }

  async getByUsername(username: string): Promise<User> {
    const user = await this.findByUsername(username);
    if (!user) {
      throw new NotFoundException(`User ${username} not found`);
    }
    return user;
  }

  async getById(id: number): Promise<User> {
    const user = await this.findById(id);
    if (!user) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }
    return user;
  }

  async update(username: string, dto: UpdateUserDto): Promise<User> {
    const user = await this.getByUsername(username);
    return this.applyChanges(user, dto);
  }

  async updateProfile(userId: number, dto: UpdateProfileDto): Promise<User> {
    const user = await this.getById(userId);
    return this.applyChanges(user, dto);
  }

  async remove(username: string): Promise<void> {
    const user = await this.getByUsername(username);
    await this.userRepository.remove(user);
    this.logger.log(`User ${username} removed`);
  }

  private async applyChanges(user: User, dto: UpdateUserDto): Promise<User> {
    if (dto.username !== undefined) this.assertNotReserved(dto.username);
    await this.assertAvailable(dto.username, dto.email, user.id);

    if (dto.username !== undefined) user.username = dto.username;
    if (dto.email !== undefined) user.email = dto.email;
    if (dto.first_name !== undefined) user.first_name = dto.first_name;
    if (dto.last_name !== undefined) user.last_name = dto.last_name;
    if (dto.bio !== undefined) user.bio = dto.bio;
    if (dto.role !== undefined && dto.role !== user.role) {
      this.logger.log(`User ${user.id} role ${user.role} -> ${dto.role}`);
      user.role = dto.role;
    }
    return this.persist(user);
  }

  private assertNotReserved(username: string): void {
    if (username.toLowerCase() === RESERVED_USERNAME) {
      throw fieldError('username', USERNAME_RESERVED);
    }
  }

  private async assertAvailable(
    username: string | undefined,
    email: string | undefined,
    exceptId?: number,
  ): Promise<void> {
    const errors: FieldErrors = {};
    if (username !== undefined) {
      const other = await this.findByUsername(username);
      if (other && other.id !== exceptId) errors.username = [USERNAME_TAKEN];
    }
    if (email !== undefined) {
      const other = await this.findByEmail(email);
      if (other && other.id !== exceptId) errors.email = [EMAIL_TAKEN];
    }
    if (Object.keys(errors).length > 0) throw validationFailed(errors);
  }

  // a concurrent insert can still hit the unique index after the pre-check
  private async persist(user: User): Promise<User> {
    try {
      return await this.userRepository.save(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw validationFailed({
          username: [USERNAME_TAKEN],
          email: [EMAIL_TAKEN],
        });
      }
      throw error;
    }
  }
}
