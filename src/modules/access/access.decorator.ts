import { SetMetadata, applyDecorators } from '@nestjs/common';
import { ApiExtension } from '@nestjs/swagger';
import type { AccessAction, ResourceKind } from './access.rules';

export const ACCESS_KEY = 'resource_access';

export interface AccessMeta {
  resource: ResourceKind;
  // derived from the HTTP method when omitted
  action?: AccessAction;
}

/**
 * Marks a controller or handler with the resource kind whose rules guard it.
 * Also exposes the kind in the swagger document as `x-access`.
 */
export const Access = (resource: ResourceKind, action?: AccessAction) =>
  applyDecorators(
    SetMetadata(ACCESS_KEY, { resource, action } satisfies AccessMeta),
    ApiExtension('x-access', { resource, action }),
  );
