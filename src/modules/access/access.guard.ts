import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ACCESS_KEY, AccessMeta } from './access.decorator';
import { AccessPolicy } from './access-policy.service';
import { methodToAction } from './access.rules';
import type { MaybeAuthenticatedRequest } from '../../types/request.interface';

// Collection-level phase. Must run after OptionalJwtAuthGuard so that
// req.user is populated for callers presenting a token.
@Injectable()
export class AccessGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly policy: AccessPolicy,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const meta = this.reflector.getAllAndOverride<AccessMeta | undefined>(
      ACCESS_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!meta) return true;
    const request = context.switchToHttp().getRequest<MaybeAuthenticatedRequest>();
    const action = meta.action ?? methodToAction(request.method);
    const actor = request.user ?? null;
    const decision = this.policy.decide(meta.resource, action, actor);
    if (!decision.allowed) {
      Logger.warn(
        `Access denied: ${request.method} ${request.path} (${meta.resource}/${action}) for ${actor ? `user ${actor.userId}` : 'anonymous'}`,
        AccessGuard.name,
      );
      throw new ForbiddenException(decision.reason);
    }
    return true;
  }
}
