import { Global, Module } from '@nestjs/common';
import { MembersModule } from '../members/members.module';
import { AuditRetentionScheduler } from './audit-retention.scheduler';
import { AuditController } from './audit.controller';
import { AuditService } from './audit.service';

@Global()
@Module({
  imports: [MembersModule],
  controllers: [AuditController],
  providers: [AuditService, AuditRetentionScheduler],
  exports: [AuditService],
})
export class AuditModule {}
