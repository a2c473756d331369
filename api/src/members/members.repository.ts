import { Injectable } from '@nestjs/common';
import { ClickHouseService } from '../database/clickhouse.service';
import {
  DuplicateResourceException,
  LastOwnerException,
  ResourceNotFoundException,
} from '../common/errors';
import { Role, WorkspaceMembership } from '../common/entities/membership.entity';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { ListResult, normalizePage } from '../common/utils/pagination.util';

/**
 * Membership rows of `workspace_members`, keyed by (workspace_id, user_id).
 *
 * `add` checks for an existing row and `updateRole` and `remove` check the
 * last-owner rule before writing. None of these is atomic in the store, so
 * callers run them under the workspace's `members:<id>` lock.
 */
@Injectable()
export class MembersRepository {
  constructor(private readonly clickhouse: ClickHouseService) {}

  async find(
    workspaceId: string,
    userId: string,
  ): Promise<WorkspaceMembership | null> {
    const rows = await this.clickhouse.query<WorkspaceMembership>(
      `SELECT * FROM workspace_members FINAL
       WHERE workspace_id = {workspace_id:String} AND user_id = {user_id:String}
       LIMIT 1`,
      { workspace_id: workspaceId, user_id: userId },
    );
    return rows.length > 0 ? rows[0] : null;
  }

  async get(workspaceId: string, userId: string): Promise<WorkspaceMembership> {
    const membership = await this.find(workspaceId, userId);
    if (!membership) {
      throw new ResourceNotFoundException('member');
    }
    return membership;
  }

  async add(
    workspaceId: string,
    userId: string,
    role: Role,
  ): Promise<WorkspaceMembership> {
    const existing = await this.find(workspaceId, userId);
    if (existing) {
      throw new DuplicateResourceException(
        'member',
        'User is already a member of this workspace',
      );
    }

    const now = toClickHouseDateTime();
    const membership: WorkspaceMembership = {
      workspace_id: workspaceId,
      user_id: userId,
      role,
      joined_at: now,
      updated_at: now,
    };
    await this.clickhouse.insert('workspace_members', [membership]);
    return membership;
  }

  async updateRole(
    workspaceId: string,
    userId: string,
    role: Role,
  ): Promise<WorkspaceMembership> {
    const membership = await this.get(workspaceId, userId);

    if (role !== 'owner' && (await this.isLastOwner(workspaceId, userId))) {
      throw new LastOwnerException();
    }

    const updated: WorkspaceMembership = {
      ...membership,
      role,
      updated_at: toClickHouseDateTime(),
    };
    await this.clickhouse.insert('workspace_members', [updated]);
    return updated;
  }

  async remove(workspaceId: string, userId: string): Promise<WorkspaceMembership> {
    const membership = await this.get(workspaceId, userId);

    if (membership.role === 'owner' && (await this.isLastOwner(workspaceId, userId))) {
      throw new LastOwnerException();
    }

    await this.clickhouse.command(
      `DELETE FROM workspace_members
       WHERE workspace_id = {workspace_id:String} AND user_id = {user_id:String}`,
      { workspace_id: workspaceId, user_id: userId },
    );
    return membership;
  }

  /**
   * Drops every membership of a workspace without the last-owner check.
   * Only used to undo a workspace creation that failed half way.
   */
  async purgeWorkspace(workspaceId: string): Promise<void> {
    await this.clickhouse.command(
      'DELETE FROM workspace_members WHERE workspace_id = {workspace_id:String}',
      { workspace_id: workspaceId },
    );
  }

  async list(
    workspaceId: string,
    page?: number,
    pageSize?: number,
  ): Promise<ListResult<WorkspaceMembership>> {
    const { pageSize: limit, offset } = normalizePage(page, pageSize);
    const params = { workspace_id: workspaceId };

    const total = await this.clickhouse.count(
      `SELECT count() AS count FROM workspace_members FINAL
       WHERE workspace_id = {workspace_id:String}`,
      params,
    );
    const items = await this.clickhouse.query<WorkspaceMembership>(
      `SELECT * FROM workspace_members FINAL
       WHERE workspace_id = {workspace_id:String}
       ORDER BY joined_at DESC, user_id ASC
       LIMIT {limit:UInt32} OFFSET {offset:UInt32}`,
      { ...params, limit, offset },
    );

    return { items, total };
  }

  async countOwners(workspaceId: string): Promise<number> {
    return this.clickhouse.count(
      `SELECT count() AS count FROM workspace_members FINAL
       WHERE workspace_id = {workspace_id:String} AND role = 'owner'`,
      { workspace_id: workspaceId },
    );
  }

  async isLastOwner(workspaceId: string, userId: string): Promise<boolean> {
    const membership = await this.find(workspaceId, userId);
    if (!membership || membership.role !== 'owner') {
      return false;
    }
    return (await this.countOwners(workspaceId)) <= 1;
  }

  async listUserIds(workspaceId: string): Promise<string[]> {
    const rows = await this.clickhouse.query<{ user_id: string }>(
      `SELECT user_id FROM workspace_members FINAL
       WHERE workspace_id = {workspace_id:String}`,
      { workspace_id: workspaceId },
    );
    return rows.map((row) => row.user_id);
  }

  async listWorkspaceIdsForUser(userId: string): Promise<string[]> {
    const rows = await this.clickhouse.query<{ workspace_id: string }>(
      `SELECT workspace_id FROM workspace_members FINAL
       WHERE user_id = {user_id:String}`,
      { user_id: userId },
    );
    return rows.map((row) => row.workspace_id);
  }
}
