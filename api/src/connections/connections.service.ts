import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { diffChanges } from '../audit/audit-changes';
import { AuditService } from '../audit/audit.service';
import { ResourceCacheService } from '../cache/resource-cache.service';
import { Actor } from '../common/entities';
import {
  DuplicateResourceException,
  InvalidInputException,
  ResourceNotFoundException,
} from '../common/errors';
import { connectionsLockKey } from '../common/lock-keys';
import { WorkspaceAction } from '../common/permissions';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import {
  normalizePage,
  paginate,
  Paginated,
} from '../common/utils/pagination.util';
import { WorkspaceAccessService } from '../members/workspace-access.service';
import { Project } from '../projects/entities/project.entity';
import { ProjectsRepository } from '../projects/projects.repository';
import { ConnectionsRepository } from './connections.repository';
import { CreateConnectionDto } from './dto/create-connection.dto';
import { ListConnectionsDto } from './dto/list-connections.dto';
import { UpdateConnectionDto } from './dto/update-connection.dto';
import { Connection } from './entities/connection.entity';

@Injectable()
export class ConnectionsService {
  private readonly logger = new Logger(ConnectionsService.name);

  constructor(
    private readonly connections: ConnectionsRepository,
    private readonly projects: ProjectsRepository,
    private readonly access: WorkspaceAccessService,
    private readonly cache: ResourceCacheService,
    private readonly auditService: AuditService,
    private readonly locks: KeyedMutex,
  ) {}

  async list(
    actor: Actor,
    dto: ListConnectionsDto,
  ): Promise<Paginated<Connection>> {
    const project = await this.loadProject(dto.project_id);
    await this.access.authorize(project.workspace_id, actor.userId, 'connection.read');

    const page = normalizePage(dto.page, dto.page_size);
    const result = await this.connections.list({
      project_id: dto.project_id,
      sync_enabled: dto.sync_enabled,
      search: dto.search,
      include_deleted: dto.include_deleted,
      sort_by: dto.sort_by,
      sort_order: dto.sort_order,
      page: page.page,
      page_size: page.pageSize,
    });
    return paginate(result, page);
  }

  async get(actor: Actor, id: string): Promise<Connection> {
    const { connection } = await this.authorizeConnection(actor, id, 'connection.read', true);
    return connection;
  }

  async connect(actor: Actor, dto: CreateConnectionDto): Promise<Connection> {
    const project = await this.loadProject(dto.project_id);
    await this.access.authorize(project.workspace_id, actor.userId, 'connection.connect');

    const connection = await this.locks.runExclusive(
      connectionsLockKey(project.id),
      async () => {
        // The project may have been deleted while waiting for the lock.
        if (!(await this.projects.findById(project.id))) {
          throw new ResourceNotFoundException('project');
        }
        if (await this.connections.existsByExternalId(project.id, dto.base_id)) {
          throw new DuplicateResourceException(
            'connection',
            `Base ${dto.base_id} is already connected to this project`,
          );
        }

        const now = toClickHouseDateTime();
        const created: Connection = {
          id: randomUUID(),
          project_id: project.id,
          base_id: dto.base_id,
          name: dto.name,
          description: dto.description ?? '',
          sync_enabled: dto.sync_enabled ?? true,
          last_sync_at: null,
          deleted_at: null,
          state: 'active',
          created_at: now,
          updated_at: now,
        };
        await this.connections.create(created);
        return created;
      },
    );

    await this.auditService.record({
      workspace_id: project.workspace_id,
      user_id: actor.userId,
      action: 'connection.connected',
      resource_type: 'connection',
      resource_id: connection.id,
      changes: {
        project_id: connection.project_id,
        base_id: connection.base_id,
        name: connection.name,
      },
    });

    return connection;
  }

  async update(actor: Actor, dto: UpdateConnectionDto): Promise<Connection> {
    const { project } = await this.authorizeConnection(
      actor,
      dto.id,
      'connection.update',
    );

    const { connection, updated } = await this.withFreshConnection(
      project,
      dto.id,
      async (connection) => {
        const updated: Connection = {
          ...connection,
          name: dto.name ?? connection.name,
          description: dto.description ?? connection.description,
          sync_enabled: dto.sync_enabled ?? connection.sync_enabled,
          updated_at: toClickHouseDateTime(),
        };
        await this.connections.update(updated);
        return { connection, updated };
      },
    );
    await this.cache.invalidate('connection', updated.id);

    const changes = diffChanges<Connection>(connection, dto, [
      'name',
      'description',
      'sync_enabled',
    ]);
    if (Object.keys(changes).length > 0) {
      await this.auditService.record({
        workspace_id: project.workspace_id,
        user_id: actor.userId,
        action: 'connection.updated',
        resource_type: 'connection',
        resource_id: updated.id,
        changes,
      });
    }

    return updated;
  }

  async disconnect(actor: Actor, id: string): Promise<void> {
    const { project } = await this.authorizeConnection(
      actor,
      id,
      'connection.disconnect',
    );

    const connection = await this.withFreshConnection(
      project,
      id,
      async (connection) => {
        await this.connections.softDelete(connection);
        return connection;
      },
    );
    await this.cache.invalidate('connection', id);

    await this.auditService.record({
      workspace_id: project.workspace_id,
      user_id: actor.userId,
      action: 'connection.disconnected',
      resource_type: 'connection',
      resource_id: id,
      changes: { base_id: connection.base_id, name: connection.name },
    });
  }

  /**
   * Records a completed sync. Only allowed while sync is enabled.
   */
  async markSynced(actor: Actor, id: string): Promise<Connection> {
    const { project } = await this.authorizeConnection(
      actor,
      id,
      'connection.sync',
    );

    const { connection, synced } = await this.withFreshConnection(
      project,
      id,
      async (connection) => {
        if (!connection.sync_enabled) {
          throw new InvalidInputException('Sync is disabled for this connection');
        }
        const synced = await this.connections.markSynced(connection);
        return { connection, synced };
      },
    );
    await this.cache.invalidate('connection', id);
    this.logger.log(`Connection ${id} synced at ${synced.last_sync_at ?? ''}`);

    await this.auditService.record({
      workspace_id: project.workspace_id,
      user_id: actor.userId,
      action: 'connection.synced',
      resource_type: 'connection',
      resource_id: id,
      changes: {
        last_sync_at: { old: connection.last_sync_at, new: synced.last_sync_at },
      },
    });

    return synced;
  }

  /**
   * Runs a write under the project's connections lock against a row read
   * inside that lock. A connection disconnected meanwhile is NotFound.
   */
  private withFreshConnection<T>(
    project: Project,
    id: string,
    task: (connection: Connection) => Promise<T>,
  ): Promise<T> {
    return this.locks.runExclusive(connectionsLockKey(project.id), async () => {
      const connection = await this.connections.findById(id);
      if (!connection) {
        throw new ResourceNotFoundException('connection');
      }
      return task(connection);
    });
  }

  /**
   * Loads a connection and its project, then checks the actor's role in the
   * owning workspace. Reads go through the cache; writes load fresh rows.
   */
  private async authorizeConnection(
    actor: Actor,
    id: string,
    action: WorkspaceAction,
    cached = false,
  ): Promise<{ connection: Connection; project: Project }> {
    const connection = cached
      ? await this.cache.readThrough('connection', id, () =>
          this.connections.findById(id),
        )
      : await this.connections.findById(id);
    if (!connection) {
      throw new ResourceNotFoundException('connection');
    }

    const project = await this.loadProject(connection.project_id);
    await this.access.authorize(project.workspace_id, actor.userId, action);
    return { connection, project };
  }

  private async loadProject(projectId: string): Promise<Project> {
    const project = await this.cache.readThrough('project', projectId, () =>
      this.projects.findById(projectId),
    );
    if (!project) {
      throw new ResourceNotFoundException('project');
    }
    return project;
  }
}
