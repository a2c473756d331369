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
  Project,
  ProjectSortField,
  ProjectStatus,
} from './entities/project.entity';

interface ProjectRow extends Omit<Project, 'settings' | 'state'> {
  settings: string;
}

export interface ProjectFilter extends ListOptions<ProjectSortField> {
  workspace_id: string;
  status?: ProjectStatus;
  created_by?: string;
  search?: string;
  include_deleted?: boolean;
}

const SORT_COLUMNS: Record<ProjectSortField, string> = {
  created_at: 'created_at',
  updated_at: 'updated_at',
  name: 'name',
  status: 'status',
};

function parseProject(row: ProjectRow): Project {
  return {
    ...row,
    settings: parseJsonObject(row.settings),
    state: lifecycleOf(row.deleted_at),
  };
}

function serializeProject(project: Project): ProjectRow {
  return {
    id: project.id,
    workspace_id: project.workspace_id,
    name: project.name,
    description: project.description,
    status: project.status,
    settings: JSON.stringify(project.settings),
    created_by: project.created_by,
    deleted_at: project.deleted_at,
    created_at: project.created_at,
    updated_at: project.updated_at,
  };
}

@Injectable()
export class ProjectsRepository {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async create(project: Project): Promise<void> {
    await this.clickhouse.insert('projects', [serializeProject(project)]);
  }

  async findById(id: string): Promise<Project | null> {
    const rows = await this.clickhouse.query<ProjectRow>(
      `SELECT * FROM projects FINAL
       WHERE id = {id:String} AND deleted_at IS NULL
       LIMIT 1`,
      { id },
    );
    return rows.length > 0 ? parseProject(rows[0]) : null;
  }

  async update(project: Project): Promise<void> {
    await this.clickhouse.insert('projects', [serializeProject(project)]);
  }

  async softDelete(project: Project): Promise<Project> {
    const now = toClickHouseDateTime();
    const deleted: Project = {
      ...project,
      deleted_at: now,
      state: 'deleted',
      updated_at: now,
    };
    await this.clickhouse.insert('projects', [serializeProject(deleted)]);
    return deleted;
  }

  async list(filter: ProjectFilter): Promise<ListResult<Project>> {
    const { pageSize, offset } = normalizePage(filter.page, filter.page_size);
    const conditions = ['workspace_id = {workspace_id:String}'];
    const params: QueryParams = { workspace_id: filter.workspace_id };

    if (filter.status) {
      conditions.push('status = {status:String}');
      params.status = filter.status;
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

    const where = `WHERE ${conditions.join(' AND ')}`;
    const sortColumn = SORT_COLUMNS[filter.sort_by ?? 'created_at'];
    const direction = filter.sort_order === 'asc' ? 'ASC' : 'DESC';

    const total = await this.clickhouse.count(
      `SELECT count() AS count FROM projects FINAL ${where}`,
      params,
    );
    const rows = await this.clickhouse.query<ProjectRow>(
      `SELECT * FROM projects FINAL ${where}
       ORDER BY ${sortColumn} ${direction}, id ASC
       LIMIT {limit:UInt32} OFFSET {offset:UInt32}`,
      { ...params, limit: pageSize, offset },
    );

    return { items: rows.map(parseProject), total };
  }

  async countByWorkspace(workspaceId: string): Promise<number> {
    return this.clickhouse.count(
      `SELECT count() AS count FROM projects FINAL
       WHERE workspace_id = {workspace_id:String} AND deleted_at IS NULL`,
      { workspace_id: workspaceId },
    );
  }

  async existsByName(
    workspaceId: string,
    name: string,
    excludeId?: string,
  ): Promise<boolean> {
    const count = await this.clickhouse.count(
      `SELECT count() AS count FROM projects FINAL
       WHERE workspace_id = {workspace_id:String}
         AND name = {name:String}
         AND id != {exclude_id:String}
         AND deleted_at IS NULL`,
      { workspace_id: workspaceId, name, exclude_id: excludeId ?? '' },
    );
    return count > 0;
  }
}
