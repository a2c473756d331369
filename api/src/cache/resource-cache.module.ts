import { Global, Module } from '@nestjs/common';
import { ResourceCacheService } from './resource-cache.service';

@Global()
@Module({
  providers: [ResourceCacheService],
  exports: [ResourceCacheService],
})
export class ResourceCacheModule {}
