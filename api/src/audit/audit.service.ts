import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  Actor,
  AuditAction,
  AuditLog,
  AuditResourceType,
} from '../common/entities';
import { AUDIT_RETENTION_FLOOR_DAYS } from '../common/limits';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import {
  normalizePage,
  paginate,
  Paginated,
} from '../common/utils/pagination.util';
import { WorkspaceAccessService } from '../members/workspace-access.service';
import {
  AUDIT_DEFAULT_PAGE_SIZE,
  AuditLogRepository,
} from './audit-log.repository';
import { ListAuditDto } from './dto/list-audit.dto';

export interface AuditEntry {
  workspace_id: string;
  user_id: string;
  action: AuditAction;
  resource_type: AuditResourceType;
  resource_id: string;
  changes?: Record<string, unknown>;
}

export interface AuditCleanupResult {
  retention_days: number;
  deleted: number;
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    private readonly auditLogs: AuditLogRepository,
    private readonly access: WorkspaceAccessService,
  ) {}

  /**
   * Records an audit entry after a successful mutation.
   * Never rejects: a failed write is logged and dropped.
   */
  async record(entry: AuditEntry): Promise<void> {
    const log: AuditLog = {
      id: randomUUID(),
      workspace_id: entry.workspace_id,
      user_id: entry.user_id,
      action: entry.action,
      resource_type: entry.resource_type,
      resource_id: entry.resource_id,
      changes: entry.changes ?? {},
      created_at: toClickHouseDateTime(),
    };

    try {
      await this.auditLogs.insert(log);
    } catch (error) {
      this.logger.error(
        `Failed to record ${entry.action} for workspace ${entry.workspace_id}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  async getAuditLogs(
    actor: Actor,
    dto: ListAuditDto,
  ): Promise<Paginated<AuditLog>> {
    await this.access.authorize(dto.workspace_id, actor.userId, 'audit.read');

    const page = normalizePage(dto.page, dto.page_size, AUDIT_DEFAULT_PAGE_SIZE);
    const result = await this.auditLogs.list({
      workspace_id: dto.workspace_id,
      user_id: dto.user_id,
      action: dto.action,
      resource_type: dto.resource_type,
      resource_id: dto.resource_id,
      page: page.page,
      page_size: page.pageSize,
    });
    return paginate(result, page);
  }

  /**
   * Purges entries older than the given number of days, never fewer than
   * AUDIT_RETENTION_FLOOR_DAYS. A non-finite value falls back to the floor.
   */
  async cleanup(olderThanDays: number): Promise<AuditCleanupResult> {
    const requested = Number.isFinite(olderThanDays)
      ? Math.floor(olderThanDays)
      : AUDIT_RETENTION_FLOOR_DAYS;
    const retentionDays = Math.max(requested, AUDIT_RETENTION_FLOOR_DAYS);
    const deleted = await this.auditLogs.deleteOlderThan(retentionDays);
    this.logger.log(
      `Purged ${deleted} audit entries older than ${retentionDays} days`,
    );
    return { retention_days: retentionDays, deleted };
  }
}
