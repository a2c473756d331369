import { Injectable } from '@nestjs/common';
import { ClickHouseService, QueryParams } from '../database/clickhouse.service';
import { lifecycleOf } from '../common/entities/lifecycle.entity';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import {
  ListOptions,
  ListResult,
  normalizePage,
} from '../common/utils/pagination.util';
import {
  Connection,
  ConnectionSortField,
} from './entities/connection.entity';

type ConnectionRow = Omit<Connection, 'state'>;

export interface ConnectionFilter extends ListOptions<ConnectionSortField> {
  project_id: string;
  sync_enabled?: boolean;
  search?: string;
  include_deleted?: boolean;
}

const SORT_COLUMNS: Record<ConnectionSortField, string> = {
  created_at: 'created_at',
  updated_at: 'updated_at',
  name: 'name',
  last_sync_at: 'last_sync_at',
};

function parseConnection(row: ConnectionRow): Connection {
  return { ...row, state: lifecycleOf(row.deleted_at) };
}

function serializeConnection(connection: Connection): ConnectionRow {
  return {
    id: connection.id,
    project_id: connection.project_id,
    base_id: connection.base_id,
    name: connection.name,
    description: connection.description,
    sync_enabled: connection.sync_enabled,
    last_sync_at: connection.last_sync_at,
    deleted_at: connection.deleted_at,
    created_at: connection.created_at,
    updated_at: connection.updated_at,
  };
}

/**
 * Connections are stored in `airtable_bases`, one row per linked base.
 */
@Injectable()
export class ConnectionsRepository {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async create(connection: Connection): Promise<void> {
    await this.clickhouse.insert('airtable_bases', [
      serializeConnection(connection),
    ]);
  }

  async findById(id: string): Promise<Connection | null> {
    const rows = await this.clickhouse.query<ConnectionRow>(
      `SELECT * FROM airtable_bases FINAL
       WHERE id = {id:String} AND deleted_at IS NULL
       LIMIT 1`,
      { id },
    );
    return rows.length > 0 ? parseConnection(rows[0]) : null;
  }

  async update(connection: Connection): Promise<void> {
    await this.clickhouse.insert('airtable_bases', [
      serializeConnection(connection),
    ]);
  }

  async softDelete(connection: Connection): Promise<Connection> {
    const now = toClickHouseDateTime();
    const deleted: Connection = {
      ...connection,
      deleted_at: now,
      state: 'deleted',
      updated_at: now,
    };
    await this.clickhouse.insert('airtable_bases', [serializeConnection(deleted)]);
    return deleted;
  }

  async markSynced(connection: Connection, at: Date = new Date()): Promise<Connection> {
    const syncedAt = toClickHouseDateTime(at);
    const synced: Connection = {
      ...connection,
      last_sync_at: syncedAt,
      updated_at: syncedAt,
    };
    await this.clickhouse.insert('airtable_bases', [serializeConnection(synced)]);
    return synced;
  }

  async list(filter: ConnectionFilter): Promise<ListResult<Connection>> {
    const { pageSize, offset } = normalizePage(filter.page, filter.page_size);
    const conditions = ['project_id = {project_id:String}'];
    const params: QueryParams = { project_id: filter.project_id };

    if (filter.sync_enabled !== undefined) {
      conditions.push('sync_enabled = {sync_enabled:Bool}');
      params.sync_enabled = filter.sync_enabled;
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
      `SELECT count() AS count FROM airtable_bases FINAL ${where}`,
      params,
    );
    const rows = await this.clickhouse.query<ConnectionRow>(
      `SELECT * FROM airtable_bases FINAL ${where}
       ORDER BY ${sortColumn} ${direction}, id ASC
       LIMIT {limit:UInt32} OFFSET {offset:UInt32}`,
      { ...params, limit: pageSize, offset },
    );

    return { items: rows.map(parseConnection), total };
  }

  async countByProject(projectId: string): Promise<number> {
    return this.clickhouse.count(
      `SELECT count() AS count FROM airtable_bases FINAL
       WHERE project_id = {project_id:String} AND deleted_at IS NULL`,
      { project_id: projectId },
    );
  }

  async existsByExternalId(projectId: string, baseId: string): Promise<boolean> {
    const count = await this.clickhouse.count(
      `SELECT count() AS count FROM airtable_bases FINAL
       WHERE project_id = {project_id:String}
         AND base_id = {base_id:String}
         AND deleted_at IS NULL`,
      { project_id: projectId, base_id: baseId },
    );
    return count > 0;
  }
}
