import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AccessGuard } from '../access.guard';
import { AccessPolicy } from '../access-policy.service';
import { AccessMeta } from '../access.decorator';
import { Actor, DENY_REASONS } from '../access.rules';

function contextFor(method: string, user?: Actor): ExecutionContext {
  const request = { method, path: '/titles', user };
  const ctx = {
    getHandler: () => contextFor,
    getClass: () => AccessGuard,
    switchToHttp: () => ({ getRequest: () => request }),
  };
  return ctx as unknown as ExecutionContext;
}

describe('AccessGuard', () => {
  const reflector = new Reflector();
  const guard = new AccessGuard(reflector, new AccessPolicy());
  const admin: Actor = {
    userId: 1,
    username: 'boss',
    role: 'admin',
    isSuperuser: false,
  };
  const withMeta = (meta: AccessMeta | undefined) =>
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(meta);

  afterEach(() => jest.restoreAllMocks());

  it('lets undecorated routes through', () => {
    withMeta(undefined);
    expect(guard.canActivate(contextFor('DELETE'))).toBe(true);
  });

  it('derives the action from the HTTP method', () => {
    withMeta({ resource: 'title' });
    expect(guard.canActivate(contextFor('GET'))).toBe(true);
    expect(() => guard.canActivate(contextFor('POST'))).toThrow(
      new ForbiddenException(DENY_REASONS.admin),
    );
    expect(guard.canActivate(contextFor('POST', admin))).toBe(true);
  });

  it('prefers an explicit action', () => {
    withMeta({ resource: 'profile', action: 'read' });
    expect(() => guard.canActivate(contextFor('GET'))).toThrow(
      new ForbiddenException(DENY_REASONS.authenticated),
    );
  });
});
