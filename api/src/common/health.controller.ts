import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from './decorators/public.decorator';
import { SkipRateLimit } from './decorators/throttle.decorator';

@ApiTags('health')
@Controller('api')
export class HealthController {
  @Public()
  @SkipRateLimit()
  @Get('health')
  @ApiOperation({ summary: 'Liveness probe' })
  health() {
    return { status: 'ok' };
  }
}
