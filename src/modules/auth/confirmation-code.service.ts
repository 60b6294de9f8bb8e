import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, randomBytes, timingSafeEqual } from 'crypto';
import type { User } from '../../entities/user.entity';

export const DEFAULT_CODE_TTL_SECONDS = 3 * 24 * 60 * 60;

type CodeSubject = Pick<
  User,
  'id' | 'username' | 'email' | 'role' | 'confirmation_code'
>;

/**
 * Stateless confirmation codes of the form `<issued-at base36>-<hmac>`.
 *
 * The HMAC covers the user's identity fields and the nonce stored in
 * `user.confirmation_code`, so a code stops verifying as soon as any of them
 * changes: rotating the nonce on re-registration, clearing it on exchange, or
 * editing the username, email or role.
 */
@Injectable()
export class ConfirmationCodeService {
  private readonly secret: string;
  private readonly ttlSeconds: number;

  constructor(config: ConfigService) {
    this.secret =
      config.get<string>('CONFIRMATION_CODE_SECRET') ||
      config.getOrThrow<string>('JWT_SECRET');
    const ttl = Number(config.get<string>('CONFIRMATION_CODE_TTL_SECONDS'));
    this.ttlSeconds =
      Number.isInteger(ttl) && ttl > 0 ? ttl : DEFAULT_CODE_TTL_SECONDS;
  }

  newNonce(): string {
    return randomBytes(16).toString('hex');
  }

  make(user: CodeSubject, now: number = Date.now()): string {
    const issuedAt = Math.floor(now / 1000);
    return `${issuedAt.toString(36)}-${this.digest(user, issuedAt)}`;
  }

  check(user: CodeSubject, code: string, now: number = Date.now()): boolean {
    if (!user.confirmation_code) return false;
    const parts = code.split('-');
    if (parts.length !== 2) return false;
    const [stamp, mac] = parts;
    if (!/^[0-9a-z]+$/.test(stamp)) return false;
    const issuedAt = parseInt(stamp, 36);
    const nowSeconds = Math.floor(now / 1000);
    if (issuedAt > nowSeconds || nowSeconds - issuedAt > this.ttlSeconds) {
      return false;
    }
    const expected = Buffer.from(this.digest(user, issuedAt));
    const given = Buffer.from(mac);
    return expected.length === given.length && timingSafeEqual(expected, given);
  }

  private digest(user: CodeSubject, issuedAt: number): string {
    return createHmac('sha256', this.secret)
      .update(
        [
          user.id,
          user.username,
          user.email,
          user.role,
          user.confirmation_code,
          issuedAt,
        ].join('\u0000'),
      )
      .digest('hex')
      .slice(0, 32);
  }
}
