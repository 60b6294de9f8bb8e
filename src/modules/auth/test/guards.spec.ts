import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { JwtAuthGuard, describeAuthFailure } from '../guards/jwt-auth.guard';
import { OptionalJwtAuthGuard } from '../guards/optional-jwt-auth.guard';

function contextWithHeaders(headers: Record<string, string>): ExecutionContext {
  const ctx = {
    switchToHttp: () => ({ getRequest: () => ({ headers }) }),
  };
  return ctx as unknown as ExecutionContext;
}

describe('describeAuthFailure', () => {
  it('prefers passport info over the error', () => {
    expect(describeAuthFailure(new Error('boom'), new Error('jwt expired'))).toBe(
      'jwt expired',
    );
  });

  it('accepts plain strings', () => {
    expect(describeAuthFailure(null, 'No auth token')).toBe('No auth token');
  });

  it('falls back to Unauthorized', () => {
    expect(describeAuthFailure(null, undefined)).toBe('Unauthorized');
  });
});

describe('JwtAuthGuard.handleRequest', () => {
  const guard = new JwtAuthGuard();
  const ctx = contextWithHeaders({});

  it('returns the user', () => {
    expect(guard.handleRequest(null, { userId: 1 }, undefined, ctx)).toEqual({
      userId: 1,
    });
  });

  it('throws 401 without a user', () => {
    expect(() => guard.handleRequest(null, false, 'No auth token', ctx)).toThrow(
      new UnauthorizedException('No auth token'),
    );
  });
});

describe('OptionalJwtAuthGuard.handleRequest', () => {
  const guard = new OptionalJwtAuthGuard();

  it('lets anonymous requests through', () => {
    expect(
      guard.handleRequest(null, false, 'No auth token', contextWithHeaders({})),
    ).toBeUndefined();
  });

  it('still rejects a bad token', () => {
    const ctx = contextWithHeaders({ authorization: 'Bearer broken' });
    expect(() =>
      guard.handleRequest(null, false, new Error('jwt malformed'), ctx),
    ).toThrow(new UnauthorizedException('jwt malformed'));
  });

  it('passes a verified user on', () => {
    const ctx = contextWithHeaders({ authorization: 'Bearer ok' });
    expect(guard.handleRequest(null, { userId: 2 }, undefined, ctx)).toEqual({
      userId: 2,
    });
  });
});
