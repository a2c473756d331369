import { Injectable } from '@nestjs/common';
import { ClickHouseService, QueryParams } from '../database/clickhouse.service';
import {
  AuditAction,
  AuditLog,
  AuditResourceType,
} from '../common/entities/audit-log.entity';
import { parseJsonObject } from '../common/utils/json.util';
import { ListResult, normalizePage } from '../common/utils/pagination.util';

export const AUDIT_DEFAULT_PAGE_SIZE = 50;

interface AuditLogRow extends Omit<AuditLog, 'changes'> {
  changes: string; // JSON string from ClickHouse
}

export interface AuditLogFilter {
  workspace_id: string;
  user_id?: string;
  action?: AuditAction;
  resource_type?: AuditResourceType;
  resource_id?: string;
  page?: number;
  page_size?: number;
}

function parseAuditLog(row: AuditLogRow): AuditLog {
  return { ...row, changes: parseJsonObject(row.changes) };
}

function serializeAuditLog(log: AuditLog): AuditLogRow {
  return { ...log, changes: JSON.stringify(log.changes) };
}

@Injectable()
export class AuditLogRepository {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async insert(log: AuditLog): Promise<void> {
    await this.clickhouse.insert('workspace_audit_logs', [serializeAuditLog(log)]);
  }

  async list(filter: AuditLogFilter): Promise<ListResult<AuditLog>> {
    const { pageSize, offset } = normalizePage(
      filter.page,
      filter.page_size,
      AUDIT_DEFAULT_PAGE_SIZE,
    );
    const conditions = ['workspace_id = {workspace_id:String}'];
    const params: QueryParams = { workspace_id: filter.workspace_id };

    if (filter.user_id) {
      conditions.push('user_id = {user_id:String}');
      params.user_id = filter.user_id;
    }
    if (filter.action) {
      conditions.push('action = {action:String}');
      params.action = filter.action;
    }
    if (filter.resource_type) {
      conditions.push('resource_type = {resource_type:String}');
      params.resource_type = filter.resource_type;
    }
    if (filter.resource_id) {
      conditions.push('resource_id = {resource_id:String}');
      params.resource_id = filter.resource_id;
    }

    const whereClause = `WHERE ${conditions.join(' AND ')}`;

    const total = await this.clickhouse.count(
      `SELECT count() AS count FROM workspace_audit_logs ${whereClause}`,
      params,
    );
    const rows = await this.clickhouse.query<AuditLogRow>(
      `
      SELECT * FROM workspace_audit_logs
      ${whereClause}
      ORDER BY created_at DESC, id ASC
      LIMIT {limit:UInt32}
      OFFSET {offset:UInt32}
    `,
      { ...params, limit: pageSize, offset },
    );

    return { items: rows.map(parseAuditLog), total };
  }

  /**
   * Removes entries older than `days` days and returns how many were removed.
   */
  async deleteOlderThan(days: number): Promise<number> {
    const cutoff = 'created_at < now64(3) - INTERVAL {days:UInt32} DAY';
    const params = { days };

    const stale = await this.clickhouse.count(
      `SELECT count() AS count FROM workspace_audit_logs WHERE ${cutoff}`,
      params,
    );
    if (stale === 0) {
      return 0;
    }

    await this.clickhouse.command(
      `ALTER TABLE workspace_audit_logs DELETE WHERE ${cutoff}`,
      params,
    );
    return stale;
  }
}
