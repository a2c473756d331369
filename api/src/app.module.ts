import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerModule } from '@nestjs/throttler';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { ResourceCacheModule } from './cache/resource-cache.module';
import { CommonModule } from './common/common.module';
import { DEFAULT_CACHE_TTL_MS } from './common/limits';
import { validate } from './config/env.validation';
import { ConnectionsModule } from './connections/connections.module';
import { DatabaseModule } from './database/database.module';
import { MembersModule } from './members/members.module';
import { ProjectsModule } from './projects/projects.module';
import { WorkspacesModule } from './workspaces/workspaces.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
    }),
    CacheModule.registerAsync({
      isGlobal: true,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ttl: Number(configService.get('CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS)),
      }),
    }),
    ThrottlerModule.forRoot([{ name: 'default', ttl: 60000, limit: 300 }]),
    ScheduleModule.forRoot(),
    DatabaseModule,
    CommonModule,
    ResourceCacheModule,
    AuthModule,
    AuditModule,
    MembersModule,
    WorkspacesModule,
    ProjectsModule,
    ConnectionsModule,
  ],
})
export class AppModule {}
