import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { UsersService } from '../users/users.service';
import { MailService } from '../mail/mail.service';
import { fieldError } from '../../utils/validation';
import { ConfirmationCodeService } from './confirmation-code.service';
import type { JwtPayload } from './jwt.strategy';
import type { SignupDto } from './dto/signup.dto';
import type { TokenDto } from './dto/token.dto';
import type { SignupResponseDto, TokenResponseDto } from './dto/auth-responses.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private usersService: UsersService,
    private jwtService: JwtService,
    private codes: ConfirmationCodeService,
    private mail: MailService,
  ) {}

  /**
   * Creates the account on first call, re-issues a code when the same
   * username/email pair signs up again. Earlier codes stop working because
   * the nonce they were bound to is replaced.
   */
  async signup(dto: SignupDto): Promise<SignupResponseDto> {
    const user = await this.usersService.findOrCreateForSignup(
      dto.username,
      dto.email,
    );
    user.confirmation_code = this.codes.newNonce();
    const saved = await this.usersService.save(user);
    const code = this.codes.make(saved);

    // delivery failures are logged; the account and code stay valid
    const delivered = await this.mail.send(
      saved.email,
      'Registration',
      `Confirmation code: ${code}`,
    );
    if (!delivered) {
      this.logger.error(
        `Confirmation code for user ${saved.id} could not be delivered`,
      );
    }
    this.logger.log(`Confirmation code issued for user ${saved.id}`);
    return { username: saved.username, email: saved.email };
  }

  async exchange(dto: TokenDto): Promise<TokenResponseDto> {
    const user = await this.usersService.findByUsername(dto.username);
    if (!user) {
      throw new NotFoundException(`User ${dto.username} not found`);
    }
    if (!this.codes.check(user, dto.confirmation_code)) {
      this.logger.warn(`Rejected confirmation code for user ${user.id}`);
      throw fieldError('confirmation_code', 'Invalid or expired confirmation code');
    }
    // single use: clearing the nonce invalidates this and any older code
    user.confirmation_code = '';
    await this.usersService.save(user);

    const payload: JwtPayload = { sub: user.id, username: user.username };
    return { token: await this.jwtService.signAsync(payload) };
  }
}
