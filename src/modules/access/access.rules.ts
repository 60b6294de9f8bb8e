import type { UserRole } from '../../entities/user.entity';

export type ResourceKind =
  | 'user'
  | 'profile'
  | 'category'
  | 'genre'
  | 'title'
  | 'review'
  | 'comment';

export type AccessAction = 'read' | 'create' | 'update' | 'delete';

export type Capability = 'anyone' | 'authenticated' | 'admin' | 'staff-or-author';

/** Caller identity as decoded from a bearer token; `null` when anonymous. */
export interface Actor {
  userId: number;
  username: string;
  role: UserRole;
  isSuperuser: boolean;
}

/** Anything an object-level rule can be checked against. */
export interface OwnedResource {
  authorId: number;
}

export interface AccessRule {
  // checked before the handler runs
  collection: Capability;
  // checked once the target has been loaded
  object?: Capability;
}

const ADMIN_ONLY: AccessRule = { collection: 'admin' };
const ADMIN_WRITES: Partial<Record<AccessAction, AccessRule>> = {
  read: { collection: 'anyone' },
  create: ADMIN_ONLY,
  update: ADMIN_ONLY,
  delete: ADMIN_ONLY,
};
const AUTHORED: Partial<Record<AccessAction, AccessRule>> = {
  read: { collection: 'anyone' },
  create: { collection: 'authenticated' },
  update: { collection: 'authenticated', object: 'staff-or-author' },
  delete: { collection: 'authenticated', object: 'staff-or-author' },
};

export const ACCESS_RULES: Record<
  ResourceKind,
  Partial<Record<AccessAction, AccessRule>>
> = {
  user: {
    read: ADMIN_ONLY,
    create: ADMIN_ONLY,
    update: ADMIN_ONLY,
    delete: ADMIN_ONLY,
  },
  profile: {
    read: { collection: 'authenticated' },
    update: { collection: 'authenticated' },
  },
  category: ADMIN_WRITES,
  genre: ADMIN_WRITES,
  title: ADMIN_WRITES,
  review: AUTHORED,
  comment: AUTHORED,
};

export const DENY_REASONS: Record<Exclude<Capability, 'anyone'>, string> = {
  authenticated: 'Authentication credentials were not provided.',
  admin: 'This action is allowed only for administrators.',
  'staff-or-author':
    'This action is allowed only for administrators, moderators or the author.',
};

export const ACTION_NOT_ALLOWED = 'This action is not allowed on this resource.';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export function methodToAction(method: string): AccessAction {
  const m = method.toUpperCase();
  if (SAFE_METHODS.has(m)) return 'read';
  if (m === 'POST') return 'create';
  if (m === 'DELETE') return 'delete';
  return 'update';
}
