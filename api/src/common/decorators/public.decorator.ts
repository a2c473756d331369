import { applyDecorators, SetMetadata } from '@nestjs/common';
import { ApiSecurity } from '@nestjs/swagger';

export const IS_PUBLIC_KEY = 'route:public';

/**
 * Lets callers through JwtAuthGuard without a bearer token and clears the
 * jwt-auth requirement from the route's OpenAPI entry.
 */
export function Public() {
  return applyDecorators(SetMetadata(IS_PUBLIC_KEY, true), ApiSecurity({}));
}
