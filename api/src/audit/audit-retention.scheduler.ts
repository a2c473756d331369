import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { AuditService } from './audit.service';

const DEFAULT_RETENTION_DAYS = 90;

@Injectable()
export class AuditRetentionScheduler {
  private readonly logger = new Logger(AuditRetentionScheduler.name);

  constructor(
    private readonly auditService: AuditService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Daily purge of expired audit entries at 03:00.
   */
  @Cron('0 0 3 * * *')
  async purgeExpiredEntries(): Promise<void> {
    const days = Number(
      this.configService.get('AUDIT_RETENTION_DAYS', DEFAULT_RETENTION_DAYS),
    );

    try {
      await this.auditService.cleanup(days);
    } catch (error) {
      this.logger.error(
        `Audit retention sweep failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }
}
