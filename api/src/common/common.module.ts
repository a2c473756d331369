import { Global, Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { CustomThrottlerGuard } from './throttler/throttler.guard';
import { HealthController } from './health.controller';
import { KeyedMutex } from './utils/keyed-mutex';

@Global()
@Module({
  controllers: [HealthController],
  providers: [
    KeyedMutex,
    // Throttler guard runs before auth
    {
      provide: APP_GUARD,
      useClass: CustomThrottlerGuard,
    },
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
  ],
  exports: [KeyedMutex],
})
export class CommonModule {}
