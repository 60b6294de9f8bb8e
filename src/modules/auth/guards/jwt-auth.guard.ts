import {
  Injectable,
  UnauthorizedException,
  ExecutionContext,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

export function describeAuthFailure(err: unknown, info: unknown): string {
  for (const source of [info, err]) {
    if (typeof source === 'string' && source) return source;
    if (
      source &&
      typeof source === 'object' &&
      'message' in source &&
      typeof source.message === 'string'
    ) {
      return source.message;
    }
  }
  return 'Unauthorized';
}

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  // 401 for a missing or invalid token, with passport's reason as message
  handleRequest<TUser = unknown>(
    err: unknown,
    user: TUser | false,
    info: unknown,
    context: ExecutionContext,
  ): TUser {
    void context;
    if (err || !user) {
      throw new UnauthorizedException(describeAuthFailure(err, info));
    }
    return user;
  }
}
