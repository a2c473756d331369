import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { Actor } from '../entities/actor.entity';

function isActor(value: unknown): value is Actor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    'tenantId' in value &&
    typeof value.userId === 'string' &&
    typeof value.tenantId === 'string'
  );
}

/**
 * Injects the actor the JWT strategy attached to the request.
 */
export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Actor => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!isActor(request.user)) {
      throw new UnauthorizedException();
    }
    return request.user;
  },
);
