import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import {
  ACCESS_RULES,
  AccessAction,
  ResourceKind,
  methodToAction,
} from '../modules/access/access.rules';

const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'patch',
  'options',
  'head',
  'trace',
] as const;

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null;
}

function isResourceKind(val: unknown): val is ResourceKind {
  return typeof val === 'string' && val in ACCESS_RULES;
}

const ACTIONS: readonly AccessAction[] = ['read', 'create', 'update', 'delete'];

function isAccessAction(val: unknown): val is AccessAction {
  return ACTIONS.some((a) => a === val);
}

/** Human readable rule line for one operation, e.g. `Access: review/update: authenticated, then staff-or-author`. */
export function describeAccess(resource: ResourceKind, action: AccessAction): string {
  const rule = ACCESS_RULES[resource][action];
  if (!rule) return `Access: ${resource}/${action}: not allowed`;
  const parts: string[] = [rule.collection];
  if (rule.object) parts.push(`then ${rule.object}`);
  return `Access: ${resource}/${action}: ${parts.join(', ')}`;
}

export const swaggerInit = (app: INestApplication) => {
  const host = process.env.PUBLIC_HOST_IP;
  const port = process.env.PORT || '3000';

  const config = new DocumentBuilder()
    .setTitle('Media review API')
    .setDescription(
      [
        'Catalog of titles grouped by category and genre, with user reviews and comments.',
        '',
        'Sign up with username and email, then exchange the mailed confirmation code for a bearer token.',
        '',
        'Capabilities:',
        '- anyone: no token needed',
        '- authenticated: any valid token',
        '- admin: role admin or superuser',
        '- staff-or-author: admin, moderator or the author of the object',
      ].join('\n'),
    )
    .setVersion('1.0.0')
    .addServer(host ? `http://${host}:${port}` : `http://localhost:${port}`)
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        name: 'JWT',
        description: 'Token from POST /auth/token',
        in: 'header',
      },
      'JWT-auth',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);

  for (const pathItem of Object.values(document.paths ?? {})) {
    if (!isRecord(pathItem)) continue;
    for (const method of HTTP_METHODS) {
      const op = pathItem[method];
      if (!isRecord(op)) continue;
      const xAccess = op['x-access'];
      if (!isRecord(xAccess) || !isResourceKind(xAccess.resource)) continue;

      const action = isAccessAction(xAccess.action)
        ? xAccess.action
        : methodToAction(method);
      const line = describeAccess(xAccess.resource, action);
      const description = op.description;
      if (typeof description === 'string') {
        if (!description.includes('Access:')) op.description = `${description}\n\n${line}`;
      } else {
        op.description = line;
      }
    }
  }

  SwaggerModule.setup('api', app, document, {
    customSiteTitle: 'Media review API docs',
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'none',
      defaultModelsExpandDepth: 1,
    },
  });
};
