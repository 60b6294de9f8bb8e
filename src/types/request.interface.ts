import { Request } from 'express';
import type { Actor } from '../modules/access/access.rules';

export interface AuthenticatedRequest extends Request {
  user: Actor;
}

export interface MaybeAuthenticatedRequest extends Request {
  user?: Actor;
}
