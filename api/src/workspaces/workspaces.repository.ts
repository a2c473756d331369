import { Injectable } from '@nestjs/common';
import { ClickHouseService, QueryParams } from '../database/clickhouse.service';
import { lifecycleOf } from '../common/entities/lifecycle.entity';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { parseJsonObject } from '../common/utils/json.util';
import {
  ListOptions,
  ListResult,
  normalizePage,
} from '../common/utils/pagination.util';
import {
  Workspace,
  WorkspaceSortField,
  WorkspaceStats,
} from './entities/workspace.entity';

interface WorkspaceRow {
  id: string;
  tenant_id: string;
  name: string;
  description: string;
  settings: string;
  created_by: string;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface WorkspaceFilter extends ListOptions<WorkspaceSortField> {
  tenant_id?: string;
  /** Restricts results to workspaces this user belongs to. */
  member_id?: string;
  created_by?: string;
  search?: string;
  include_deleted?: boolean;
}

const SORT_COLUMNS: Record<WorkspaceSortField, string> = {
  created_at: 'created_at',
  updated_at: 'updated_at',
  name: 'name',
};

function parseWorkspace(row: WorkspaceRow): Workspace {
  return {
    ...row,
    settings: parseJsonObject(row.settings),
    state: lifecycleOf(row.deleted_at),
  };
}

function serializeWorkspace(workspace: Workspace): WorkspaceRow {
  return {
    id: workspace.id,
    tenant_id: workspace.tenant_id,
    name: workspace.name,
    description: workspace.description,
    settings: JSON.stringify(workspace.settings),
    created_by: workspace.created_by,
    deleted_at: workspace.deleted_at,
    created_at: workspace.created_at,
    updated_at: workspace.updated_at,
  };
}

@Injectable()
export class WorkspacesRepository {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async create(workspace: Workspace): Promise<void> {
    await this.clickhouse.insert('workspaces', [serializeWorkspace(workspace)]);
  }

  async findById(id: string): Promise<Workspace | null> {
    const rows = await this.clickhouse.query<WorkspaceRow>(
      `SELECT * FROM workspaces FINAL
       WHERE id = {id:String} AND deleted_at IS NULL
       LIMIT 1`,
      { id },
    );
    return rows.length > 0 ? parseWorkspace(rows[0]) : null;
  }

  /**
   * Writes a new version of the row. Callers bump `updated_at`.
   */
  async update(workspace: Workspace): Promise<void> {
    await this.clickhouse.insert('workspaces', [serializeWorkspace(workspace)]);
  }

  async softDelete(workspace: Workspace): Promise<Workspace> {
    const now = toClickHouseDateTime();
    const deleted: Workspace = {
      ...workspace,
      deleted_at: now,
      state: 'deleted',
      updated_at: now,
    };
    await this.clickhouse.insert('workspaces', [serializeWorkspace(deleted)]);
    return deleted;
  }

  async list(filter: WorkspaceFilter): Promise<ListResult<Workspace>> {
    const { pageSize, offset } = normalizePage(filter.page, filter.page_size);
    const conditions: string[] = [];
    const params: QueryParams = {};

    if (filter.tenant_id) {
      conditions.push('tenant_id = {tenant_id:String}');
      params.tenant_id = filter.tenant_id;
    }
    if (filter.member_id) {
      conditions.push(
        'id IN (SELECT workspace_id FROM workspace_members FINAL WHERE user_id = {member_id:String})',
      );
      params.member_id = filter.member_id;
    }
    if (filter.created_by) {
      conditions.push('created_by = {created_by:String}');
      params.created_by = filter.created_by;
    }
    if (filter.search) {
      conditions.push(
        '(positionCaseInsensitiveUTF8(name, {search:String}) > 0 OR positionCaseInsensitiveUTF8(description, {search:String}) > 0)',
      );
      params.search = filter.search;
    }
    if (!filter.include_deleted) {
      conditions.push('deleted_at IS NULL');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sortColumn = SORT_COLUMNS[filter.sort_by ?? 'created_at'];
    const direction = filter.sort_order === 'asc' ? 'ASC' : 'DESC';

    const total = await this.clickhouse.count(
      `SELECT count() AS count FROM workspaces FINAL ${where}`,
      params,
    );
    const rows = await this.clickhouse.query<WorkspaceRow>(
      `SELECT * FROM workspaces FINAL ${where}
       ORDER BY ${sortColumn} ${direction}, id ASC
       LIMIT {limit:UInt32} OFFSET {offset:UInt32}`,
      { ...params, limit: pageSize, offset },
    );

    return { items: rows.map(parseWorkspace), total };
  }

  async countByTenant(tenantId: string): Promise<number> {
    return this.clickhouse.count(
      `SELECT count() AS count FROM workspaces FINAL
       WHERE tenant_id = {tenant_id:String} AND deleted_at IS NULL`,
      { tenant_id: tenantId },
    );
  }

  async existsByName(
    tenantId: string,
    name: string,
    excludeId?: string,
  ): Promise<boolean> {
    const count = await this.clickhouse.count(
      `SELECT count() AS count FROM workspaces FINAL
       WHERE tenant_id = {tenant_id:String}
         AND name = {name:String}
         AND id != {exclude_id:String}
         AND deleted_at IS NULL`,
      { tenant_id: tenantId, name, exclude_id: excludeId ?? '' },
    );
    return count > 0;
  }

  async getStats(tenantId: string): Promise<WorkspaceStats> {
    const params = { tenant_id: tenantId };
    const activeWorkspaces = `SELECT id FROM workspaces FINAL
      WHERE tenant_id = {tenant_id:String} AND deleted_at IS NULL`;
    const activeProjects = `SELECT id FROM projects FINAL
      WHERE deleted_at IS NULL AND workspace_id IN (${activeWorkspaces})`;

    const totalWorkspaces = await this.countByTenant(tenantId);
    const byStatus = await this.clickhouse.query<{
      status: string;
      count: string | number;
    }>(
      `SELECT status, count() AS count FROM projects FINAL
       WHERE deleted_at IS NULL AND workspace_id IN (${activeWorkspaces})
       GROUP BY status`,
      params,
    );
    const totalConnections = await this.clickhouse.count(
      `SELECT count() AS count FROM airtable_bases FINAL
       WHERE deleted_at IS NULL AND project_id IN (${activeProjects})`,
      params,
    );

    const statusCount = (status: string) =>
      Number(byStatus.find((row) => row.status === status)?.count ?? 0);
    const active = statusCount('active');
    const archived = statusCount('archived');

    return {
      tenant_id: tenantId,
      total_workspaces: totalWorkspaces,
      total_projects: active + archived,
      active_projects: active,
      archived_projects: archived,
      total_connections: totalConnections,
    };
  }
}
