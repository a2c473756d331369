import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { diffChanges } from '../audit/audit-changes';
import { AuditService } from '../audit/audit.service';
import { ResourceCacheService } from '../cache/resource-cache.service';
import { Actor } from '../common/entities';
import {
  DuplicateResourceException,
  InvalidInputException,
  QuotaExceededException,
  ResourceInUseException,
  ResourceNotFoundException,
} from '../common/errors';
import { PROJECT_QUOTA_PER_WORKSPACE } from '../common/limits';
import { connectionsLockKey, projectsLockKey } from '../common/lock-keys';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import {
  normalizePage,
  paginate,
  Paginated,
} from '../common/utils/pagination.util';
import { ConnectionsRepository } from '../connections/connections.repository';
import { WorkspaceAccessService } from '../members/workspace-access.service';
import { WorkspacesRepository } from '../workspaces/workspaces.repository';
import { CreateProjectDto } from './dto/create-project.dto';
import { ListProjectsDto } from './dto/list-projects.dto';
import { UpdateProjectDto } from './dto/update-project.dto';
import { isProjectStatus, Project } from './entities/project.entity';
import { ProjectsRepository } from './projects.repository';

@Injectable()
export class ProjectsService {
  constructor(
    private readonly projects: ProjectsRepository,
    private readonly workspaces: WorkspacesRepository,
    private readonly connections: ConnectionsRepository,
    private readonly access: WorkspaceAccessService,
    private readonly cache: ResourceCacheService,
    private readonly auditService: AuditService,
    private readonly locks: KeyedMutex,
  ) {}

  async list(actor: Actor, dto: ListProjectsDto): Promise<Paginated<Project>> {
    await this.access.authorize(dto.workspace_id, actor.userId, 'project.read');

    const page = normalizePage(dto.page, dto.page_size);
    const result = await this.projects.list({
      workspace_id: dto.workspace_id,
      status: dto.status,
      search: dto.search,
      created_by: dto.created_by,
      include_deleted: dto.include_deleted,
      sort_by: dto.sort_by,
      sort_order: dto.sort_order,
      page: page.page,
      page_size: page.pageSize,
    });
    return paginate(result, page);
  }

  async get(actor: Actor, id: string): Promise<Project> {
    const project = await this.cache.readThrough('project', id, () =>
      this.projects.findById(id),
    );
    if (!project) {
      throw new ResourceNotFoundException('project');
    }
    await this.access.authorize(project.workspace_id, actor.userId, 'project.read');
    return project;
  }

  async create(actor: Actor, dto: CreateProjectDto): Promise<Project> {
    await this.access.authorize(dto.workspace_id, actor.userId, 'project.create');

    const project = await this.locks.runExclusive(
      projectsLockKey(dto.workspace_id),
      async () => {
        const workspace = await this.workspaces.findById(dto.workspace_id);
        if (!workspace) {
          throw new ResourceNotFoundException('workspace');
        }

        const count = await this.projects.countByWorkspace(dto.workspace_id);
        if (count >= PROJECT_QUOTA_PER_WORKSPACE) {
          throw new QuotaExceededException('project', PROJECT_QUOTA_PER_WORKSPACE);
        }
        if (await this.projects.existsByName(dto.workspace_id, dto.name)) {
          throw new DuplicateResourceException(
            'project',
            `Project "${dto.name}" already exists in this workspace`,
          );
        }

        const now = toClickHouseDateTime();
        const created: Project = {
          id: randomUUID(),
          workspace_id: dto.workspace_id,
          name: dto.name,
          description: dto.description ?? '',
          status: 'active',
          settings: dto.settings ?? {},
          created_by: actor.userId,
          deleted_at: null,
          state: 'active',
          created_at: now,
          updated_at: now,
        };
        await this.projects.create(created);
        return created;
      },
    );

    await this.auditService.record({
      workspace_id: project.workspace_id,
      user_id: actor.userId,
      action: 'project.created',
      resource_type: 'project',
      resource_id: project.id,
      changes: { name: project.name, description: project.description },
    });

    return project;
  }

  async update(actor: Actor, dto: UpdateProjectDto): Promise<Project> {
    const status = dto.status;
    if (status !== undefined && !isProjectStatus(status)) {
      throw new InvalidInputException(
        `Invalid project status "${status}", expected active or archived`,
      );
    }

    const found = await this.requireProject(dto.id);
    await this.access.authorize(found.workspace_id, actor.userId, 'project.update');

    // Re-read under the lock delete also takes, so a concurrent delete is
    // never overwritten by a version built from the row read above.
    const { existing, updated } = await this.locks.runExclusive(
      projectsLockKey(found.workspace_id),
      async () => {
        const existing = await this.requireProject(dto.id);
        if (
          dto.name !== undefined &&
          dto.name !== existing.name &&
          (await this.projects.existsByName(existing.workspace_id, dto.name, existing.id))
        ) {
          throw new DuplicateResourceException(
            'project',
            `Project "${dto.name}" already exists in this workspace`,
          );
        }

        const next: Project = {
          ...existing,
          name: dto.name ?? existing.name,
          description: dto.description ?? existing.description,
          status: status ?? existing.status,
          settings: dto.settings ?? existing.settings,
          updated_at: toClickHouseDateTime(),
        };
        await this.projects.update(next);
        return { existing, updated: next };
      },
    );

    await this.cache.invalidate('project', updated.id);

    const changes = diffChanges<Project>(
      existing,
      {
        name: dto.name,
        description: dto.description,
        status,
        settings: dto.settings,
      },
      ['name', 'description', 'status', 'settings'],
    );
    if (Object.keys(changes).length > 0) {
      await this.auditService.record({
        workspace_id: updated.workspace_id,
        user_id: actor.userId,
        action: 'project.updated',
        resource_type: 'project',
        resource_id: updated.id,
        changes,
      });
    }

    return updated;
  }

  async delete(actor: Actor, id: string): Promise<void> {
    const found = await this.requireProject(id);
    await this.access.authorize(found.workspace_id, actor.userId, 'project.delete');

    // Workspace lock first, then the project's: update and rename share the
    // first, connect shares the second.
    const existing = await this.locks.runExclusive(
      projectsLockKey(found.workspace_id),
      () =>
        this.locks.runExclusive(connectionsLockKey(id), async () => {
          const existing = await this.requireProject(id);
          const connectionCount = await this.connections.countByProject(id);
          if (connectionCount > 0) {
            throw new ResourceInUseException('project', 'connections', connectionCount);
          }
          await this.projects.softDelete(existing);
          return existing;
        }),
    );

    await this.cache.invalidate('project', id);
    await this.auditService.record({
      workspace_id: existing.workspace_id,
      user_id: actor.userId,
      action: 'project.deleted',
      resource_type: 'project',
      resource_id: id,
      changes: { name: existing.name },
    });
  }

  private async requireProject(id: string): Promise<Project> {
    const project = await this.projects.findById(id);
    if (!project) {
      throw new ResourceNotFoundException('project');
    }
    return project;
  }
}
