import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { diffChanges } from '../audit/audit-changes';
import { AuditService } from '../audit/audit.service';
import { ResourceCacheService } from '../cache/resource-cache.service';
import { Actor } from '../common/entities';
import {
  AccessDeniedException,
  DuplicateResourceException,
  QuotaExceededException,
  ResourceInUseException,
  ResourceNotFoundException,
} from '../common/errors';
import { WORKSPACE_QUOTA_PER_TENANT } from '../common/limits';
import { projectsLockKey, tenantLockKey } from '../common/lock-keys';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import {
  normalizePage,
  paginate,
  Paginated,
} from '../common/utils/pagination.util';
import { MembersRepository } from '../members/members.repository';
import { WorkspaceAccessService } from '../members/workspace-access.service';
import { ProjectsRepository } from '../projects/projects.repository';
import { CreateWorkspaceDto } from './dto/create-workspace.dto';
import { ListWorkspacesDto } from './dto/list-workspaces.dto';
import { UpdateWorkspaceDto } from './dto/update-workspace.dto';
import { Workspace, WorkspaceStats } from './entities/workspace.entity';
import { WorkspacesRepository } from './workspaces.repository';

@Injectable()
export class WorkspacesService {
  private readonly logger = new Logger(WorkspacesService.name);

  constructor(
    private readonly workspaces: WorkspacesRepository,
    private readonly projects: ProjectsRepository,
    private readonly members: MembersRepository,
    private readonly access: WorkspaceAccessService,
    private readonly cache: ResourceCacheService,
    private readonly auditService: AuditService,
    private readonly locks: KeyedMutex,
  ) {}

  async list(
    actor: Actor,
    dto: ListWorkspacesDto,
  ): Promise<Paginated<Workspace>> {
    const page = normalizePage(dto.page, dto.page_size);
    const result = await this.workspaces.list({
      tenant_id: actor.tenantId,
      member_id: actor.userId,
      created_by: dto.created_by,
      search: dto.search,
      include_deleted: dto.include_deleted,
      sort_by: dto.sort_by,
      sort_order: dto.sort_order,
      page: page.page,
      page_size: page.pageSize,
    });
    return paginate(result, page);
  }

  async get(actor: Actor, id: string): Promise<Workspace> {
    await this.access.authorize(id, actor.userId, 'workspace.read');

    const workspace = await this.cache.readThrough('workspace', id, () =>
      this.workspaces.findById(id),
    );
    if (!workspace) {
      throw new ResourceNotFoundException('workspace');
    }
    if (workspace.tenant_id !== actor.tenantId) {
      throw new AccessDeniedException();
    }
    return workspace;
  }

  /**
   * Creates a workspace owned by the actor. The owner membership is written
   * before the workspace row and removed again if that write fails, so a
   * workspace is never visible without an owner.
   */
  async create(actor: Actor, dto: CreateWorkspaceDto): Promise<Workspace> {
    const workspace = await this.locks.runExclusive(
      tenantLockKey(actor.tenantId),
      async () => {
        const count = await this.workspaces.countByTenant(actor.tenantId);
        if (count >= WORKSPACE_QUOTA_PER_TENANT) {
          throw new QuotaExceededException('workspace', WORKSPACE_QUOTA_PER_TENANT);
        }
        if (await this.workspaces.existsByName(actor.tenantId, dto.name)) {
          throw new DuplicateResourceException(
            'workspace',
            `Workspace "${dto.name}" already exists`,
          );
        }

        const now = toClickHouseDateTime();
        const created: Workspace = {
          id: randomUUID(),
          tenant_id: actor.tenantId,
          name: dto.name,
          description: dto.description ?? '',
          settings: dto.settings ?? {},
          created_by: actor.userId,
          deleted_at: null,
          state: 'active',
          created_at: now,
          updated_at: now,
        };

        await this.members.add(created.id, actor.userId, 'owner');
        try {
          await this.workspaces.create(created);
        } catch (error) {
          this.logger.error(
            `Workspace ${created.id} insert failed, removing its owner membership`,
          );
          await this.members.purgeWorkspace(created.id);
          throw error;
        }
        return created;
      },
    );

    await this.cache.invalidateUserIndex(actor.userId);
    await this.auditService.record({
      workspace_id: workspace.id,
      user_id: actor.userId,
      action: 'workspace.created',
      resource_type: 'workspace',
      resource_id: workspace.id,
      changes: {
        name: workspace.name,
        description: workspace.description,
        tenant_id: workspace.tenant_id,
      },
    });

    return workspace;
  }

  async update(actor: Actor, dto: UpdateWorkspaceDto): Promise<Workspace> {
    await this.access.authorize(dto.id, actor.userId, 'workspace.update');

    const { updated, changes } = await this.locks.runExclusive(
      tenantLockKey(actor.tenantId),
      async () => {
        const existing = await this.workspaces.findById(dto.id);
        if (!existing) {
          throw new ResourceNotFoundException('workspace');
        }

        if (
          dto.name !== undefined &&
          dto.name !== existing.name &&
          (await this.workspaces.existsByName(existing.tenant_id, dto.name, existing.id))
        ) {
          throw new DuplicateResourceException(
            'workspace',
            `Workspace "${dto.name}" already exists`,
          );
        }

        const patch: Partial<Workspace> = {
          name: dto.name,
          description: dto.description,
          settings: dto.settings,
        };
        const next: Workspace = {
          ...existing,
          name: dto.name ?? existing.name,
          description: dto.description ?? existing.description,
          settings: dto.settings ?? existing.settings,
          updated_at: toClickHouseDateTime(),
        };
        await this.workspaces.update(next);

        return {
          updated: next,
          changes: diffChanges(existing, patch, ['name', 'description', 'settings']),
        };
      },
    );

    await this.cache.invalidate('workspace', updated.id);
    if (Object.keys(changes).length > 0) {
      await this.auditService.record({
        workspace_id: updated.id,
        user_id: actor.userId,
        action: 'workspace.updated',
        resource_type: 'workspace',
        resource_id: updated.id,
        changes,
      });
    }

    return updated;
  }

  /**
   * Soft-deletes an empty workspace. Members keep their rows; every cache
   * entry of the workspace and every member's workspace index is dropped.
   */
  async delete(actor: Actor, id: string): Promise<void> {
    await this.access.authorize(id, actor.userId, 'workspace.delete');

    // Tenant lock first, as update takes it; the workspace's projects lock
    // keeps project creation out while the count is checked.
    const deleted = await this.locks.runExclusive(tenantLockKey(actor.tenantId), () =>
      this.locks.runExclusive(projectsLockKey(id), async () => {
        const workspace = await this.workspaces.findById(id);
        if (!workspace) {
          throw new ResourceNotFoundException('workspace');
        }

        const projectCount = await this.projects.countByWorkspace(id);
        if (projectCount > 0) {
          throw new ResourceInUseException('workspace', 'projects', projectCount);
        }

        return this.workspaces.softDelete(workspace);
      }),
    );

    const memberIds = await this.members.listUserIds(id);
    await this.cache.invalidateWorkspaceCascade(id);
    for (const userId of memberIds) {
      await this.cache.invalidateUserIndex(userId);
    }

    await this.auditService.record({
      workspace_id: id,
      user_id: actor.userId,
      action: 'workspace.deleted',
      resource_type: 'workspace',
      resource_id: id,
      changes: { name: deleted.name },
    });
  }

  async stats(actor: Actor): Promise<WorkspaceStats> {
    return this.workspaces.getStats(actor.tenantId);
  }
}
