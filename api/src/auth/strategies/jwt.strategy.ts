import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { Actor } from '../../common/entities';

/**
 * Claims issued by the identity provider. `user_id` is accepted as an
 * alias of `sub`.
 */
export interface JwtPayload {
  sub?: string;
  user_id?: string;
  tenant_id?: string;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    const secret = configService.get<string>('JWT_SECRET');
    if (!secret) {
      throw new Error('JWT_SECRET environment variable is required');
    }
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  validate(payload: JwtPayload): Actor {
    const userId = payload.sub ?? payload.user_id;
    if (!userId) {
      throw new UnauthorizedException('Token has no subject');
    }
    if (!payload.tenant_id) {
      throw new UnauthorizedException('Token has no tenant');
    }
    return { userId, tenantId: payload.tenant_id };
  }
}
