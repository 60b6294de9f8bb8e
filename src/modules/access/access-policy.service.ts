import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import {
  ACCESS_RULES,
  ACTION_NOT_ALLOWED,
  AccessAction,
  Actor,
  Capability,
  DENY_REASONS,
  OwnedResource,
  ResourceKind,
} from './access.rules';

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

export function isAdmin(actor: Actor | null): boolean {
  return !!actor && (actor.isSuperuser || actor.role === 'admin');
}

export function isStaff(actor: Actor | null): boolean {
  return isAdmin(actor) || actor?.role === 'moderator';
}

/**
 * Single evaluator for the rule table in `access.rules.ts`.
 *
 * Collection rules are evaluated by `AccessGuard` from the route metadata;
 * object rules need the loaded resource, so services call `assert` with the
 * target after fetching it.
 */
@Injectable()
export class AccessPolicy {
  private readonly logger = new Logger(AccessPolicy.name);

  decide(
    kind: ResourceKind,
    action: AccessAction,
    actor: Actor | null,
    target?: OwnedResource,
  ): AccessDecision {
    const rule = ACCESS_RULES[kind][action];
    if (!rule) return { allowed: false, reason: ACTION_NOT_ALLOWED };
    if (!this.satisfies(rule.collection, actor)) {
      return { allowed: false, reason: this.reasonFor(rule.collection) };
    }
    if (target && rule.object && !this.satisfies(rule.object, actor, target)) {
      return { allowed: false, reason: this.reasonFor(rule.object) };
    }
    return { allowed: true };
  }

  assert(
    kind: ResourceKind,
    action: AccessAction,
    actor: Actor | null,
    target?: OwnedResource,
  ): void {
    const decision = this.decide(kind, action, actor, target);
    if (decision.allowed) return;
    this.logger.warn(
      `Denied ${action} on ${kind} for ${actor ? `user ${actor.userId}` : 'anonymous'}: ${decision.reason}`,
    );
    throw new ForbiddenException(decision.reason);
  }

  private satisfies(
    capability: Capability,
    actor: Actor | null,
    target?: OwnedResource,
  ): boolean {
    switch (capability) {
      case 'anyone':
        return true;
      case 'authenticated':
        return actor !== null;
      case 'admin':
        return isAdmin(actor);
      case 'staff-or-author':
        return (
          isStaff(actor) ||
          (!!actor && !!target && target.authorId === actor.userId)
        );
    }
  }

  private reasonFor(capability: Capability): string {
    return capability === 'anyone' ? ACTION_NOT_ALLOWED : DENY_REASONS[capability];
  }
}
