import {
  Injectable,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { describeAuthFailure } from './jwt-auth.guard';

// No Authorization header: the request continues anonymously.
// A header that fails verification is still a 401.
@Injectable()
export class OptionalJwtAuthGuard extends AuthGuard('jwt') {
  handleRequest<TUser = unknown>(
    err: unknown,
    user: TUser | false,
    info: unknown,
    context: ExecutionContext,
  ): TUser {
    if (user) return user;
    const request = context.switchToHttp().getRequest<Request>();
    if (request.headers.authorization) {
      throw new UnauthorizedException(describeAuthFailure(err, info));
    }
    return undefined as TUser;
  }
}
