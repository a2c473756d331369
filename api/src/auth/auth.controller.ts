import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { Actor } from '../common/entities';

@ApiTags('auth')
@ApiSecurity('jwt-auth')
@Controller('api')
export class AuthController {
  @Get('auth.me')
  @ApiOperation({ summary: 'Identity resolved from the bearer token' })
  me(@CurrentActor() actor: Actor): Actor {
    return actor;
  }
}
