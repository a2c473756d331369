import { Injectable } from '@nestjs/common';
import { AuditService } from '../audit/audit.service';
import { ResourceCacheService } from '../cache/resource-cache.service';
import { AccessDeniedException, ResourceNotFoundException } from '../common/errors';
import { Actor, WorkspaceMembership } from '../common/entities';
import { membersLockKey } from '../common/lock-keys';
import { satisfiesRole, touchesOwnership } from '../common/permissions';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import {
  normalizePage,
  paginate,
  Paginated,
} from '../common/utils/pagination.util';
import { Workspace } from '../workspaces/entities/workspace.entity';
import { WorkspacesRepository } from '../workspaces/workspaces.repository';
import { AddMemberDto } from './dto/add-member.dto';
import { ListMembersDto } from './dto/list-members.dto';
import { RemoveMemberDto } from './dto/remove-member.dto';
import { UpdateRoleDto } from './dto/update-role.dto';
import { MembersRepository } from './members.repository';
import { WorkspaceAccessService } from './workspace-access.service';

@Injectable()
export class MembersService {
  constructor(
    private readonly members: MembersRepository,
    private readonly access: WorkspaceAccessService,
    private readonly workspaces: WorkspacesRepository,
    private readonly cache: ResourceCacheService,
    private readonly auditService: AuditService,
    private readonly locks: KeyedMutex,
  ) {}

  async list(
    actor: Actor,
    dto: ListMembersDto,
  ): Promise<Paginated<WorkspaceMembership>> {
    await this.access.authorize(dto.workspace_id, actor.userId, 'members.read');
    const page = normalizePage(dto.page, dto.page_size);
    const result = await this.members.list(
      dto.workspace_id,
      page.page,
      page.pageSize,
    );
    return paginate(result, page);
  }

  async add(actor: Actor, dto: AddMemberDto): Promise<WorkspaceMembership> {
    const membership = await this.locks.runExclusive(
      membersLockKey(dto.workspace_id),
      async () => {
        const actorMembership = await this.access.authorize(
          dto.workspace_id,
          actor.userId,
          'members.manage',
        );
        if (dto.role === 'owner' && actorMembership.role !== 'owner') {
          throw new AccessDeniedException('Only owners can grant the owner role');
        }
        await this.requireWorkspace(dto.workspace_id);

        return this.members.add(dto.workspace_id, dto.user_id, dto.role);
      },
    );
    await this.cache.invalidateUserIndex(dto.user_id);

    await this.auditService.record({
      workspace_id: dto.workspace_id,
      user_id: actor.userId,
      action: 'member.added',
      resource_type: 'workspace_member',
      resource_id: dto.user_id,
      changes: { user_id: dto.user_id, role: dto.role },
    });

    return membership;
  }

  /**
   * The caller's role and the target's current role are read under the
   * workspace's members lock, together with the write.
   */
  async updateRole(
    actor: Actor,
    dto: UpdateRoleDto,
  ): Promise<WorkspaceMembership> {
    const { previousRole, updated } = await this.locks.runExclusive(
      membersLockKey(dto.workspace_id),
      async () => {
        const actorMembership = await this.access.authorize(
          dto.workspace_id,
          actor.userId,
          'members.manage',
        );
        const target = await this.members.get(dto.workspace_id, dto.user_id);

        if (touchesOwnership(target.role, dto.role) && actorMembership.role !== 'owner') {
          throw new AccessDeniedException('Only owners can change owner roles');
        }

        const updated = await this.members.updateRole(
          dto.workspace_id,
          dto.user_id,
          dto.role,
        );
        return { previousRole: target.role, updated };
      },
    );
    await this.cache.invalidateUserIndex(dto.user_id);

    await this.auditService.record({
      workspace_id: dto.workspace_id,
      user_id: actor.userId,
      action: 'member.role_updated',
      resource_type: 'workspace_member',
      resource_id: dto.user_id,
      changes: {
        user_id: dto.user_id,
        old_role: previousRole,
        new_role: dto.role,
      },
    });

    return updated;
  }

  /**
   * Admins remove others; any member may remove themselves.
   */
  async remove(actor: Actor, dto: RemoveMemberDto): Promise<{ success: true }> {
    const removed = await this.locks.runExclusive(
      membersLockKey(dto.workspace_id),
      async () => {
        const actorMembership = await this.members.find(
          dto.workspace_id,
          actor.userId,
        );
        if (!actorMembership) {
          throw new AccessDeniedException();
        }

        const isSelf = dto.user_id === actor.userId;
        if (!isSelf && !satisfiesRole(actorMembership.role, 'admin')) {
          throw new AccessDeniedException();
        }

        const target = isSelf
          ? actorMembership
          : await this.members.get(dto.workspace_id, dto.user_id);
        if (!isSelf && target.role === 'owner' && actorMembership.role !== 'owner') {
          throw new AccessDeniedException('Only owners can remove an owner');
        }

        return this.members.remove(dto.workspace_id, dto.user_id);
      },
    );
    await this.cache.invalidateUserIndex(dto.user_id);

    await this.auditService.record({
      workspace_id: dto.workspace_id,
      user_id: actor.userId,
      action: 'member.removed',
      resource_type: 'workspace_member',
      resource_id: dto.user_id,
      changes: { user_id: dto.user_id, role: removed.role },
    });

    return { success: true };
  }

  /**
   * Workspaces the actor belongs to within their tenant. The id list is
   * kept in the user's cache index; each workspace is read through the
   * workspace cache.
   */
  async getUserWorkspaces(actor: Actor): Promise<Workspace[]> {
    const cached = await this.cache.getUserIndex(actor.userId);
    if (cached.found) {
      const workspaces = await this.loadWorkspaces(cached.value);
      return workspaces.filter((w) => w.tenant_id === actor.tenantId);
    }

    const memberOf = await this.members.listWorkspaceIdsForUser(actor.userId);
    const workspaces = await this.loadWorkspaces(memberOf);
    await this.cache.setUserIndex(
      actor.userId,
      workspaces.map((w) => w.id),
    );
    return workspaces.filter((w) => w.tenant_id === actor.tenantId);
  }

  private async loadWorkspaces(ids: string[]): Promise<Workspace[]> {
    const workspaces: Workspace[] = [];
    for (const id of ids) {
      const workspace = await this.cache.readThrough('workspace', id, () =>
        this.workspaces.findById(id),
      );
      if (workspace) {
        workspaces.push(workspace);
      }
    }
    return workspaces;
  }

  private async requireWorkspace(workspaceId: string): Promise<Workspace> {
    const workspace = await this.cache.readThrough('workspace', workspaceId, () =>
      this.workspaces.findById(workspaceId),
    );
    if (!workspace) {
      throw new ResourceNotFoundException('workspace');
    }
    return workspace;
  }
}
