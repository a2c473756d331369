import { Role } from '../common/entities';
import {
  AccessDeniedException,
  DuplicateResourceException,
  QuotaExceededException,
  ResourceInUseException,
  ResourceNotFoundException,
} from '../common/errors';
import { toClickHouseDateTime } from '../common/utils/datetime.util';
import { Project } from '../projects/entities/project.entity';
import { actor, createServiceTestingModule } from '../../test/helpers';
import { InMemoryRepositories } from '../../test/helpers/in-memory-repositories';
import { Workspace } from './entities/workspace.entity';
import { WorkspacesService } from './workspaces.service';

describe('WorkspacesService', () => {
  let service: WorkspacesService;
  let repos: InMemoryRepositories;

  const owner = actor('owner-1');

  const join = (workspaceId: string, userId: string, role: Role) => {
    const now = toClickHouseDateTime();
    repos.store.members.push({
      workspace_id: workspaceId,
      user_id: userId,
      role,
      joined_at: now,
      updated_at: now,
    });
  };

  const seedProject = (workspaceId: string): Project => {
    const now = toClickHouseDateTime();
    const project: Project = {
      id: 'proj-1',
      workspace_id: workspaceId,
      name: 'Pipeline',
      description: '',
      status: 'active',
      settings: {},
      created_by: 'owner-1',
      deleted_at: null,
      state: 'active',
      created_at: now,
      updated_at: now,
    };
    repos.store.projects.set(project.id, project);
    return project;
  };

  beforeEach(async () => {
    const context = await createServiceTestingModule([WorkspacesService]);
    service = context.module.get(WorkspacesService);
    repos = context.repos;
  });

  describe('create', () => {
    it('makes the creator the owner and records the creation', async () => {
      const workspace = await service.create(owner, {
        name: 'Analytics',
        description: 'Reporting',
      });

      expect(workspace).toMatchObject({
        tenant_id: 'tenant-1',
        name: 'Analytics',
        description: 'Reporting',
        settings: {},
        created_by: 'owner-1',
        deleted_at: null,
        state: 'active',
      });
      expect(repos.store.members).toEqual([
        expect.objectContaining({
          workspace_id: workspace.id,
          user_id: 'owner-1',
          role: 'owner',
        }),
      ]);
      expect(repos.store.auditLogs[0]).toMatchObject({
        action: 'workspace.created',
        resource_id: workspace.id,
        changes: { name: 'Analytics', description: 'Reporting', tenant_id: 'tenant-1' },
      });
    });

    it('rejects a duplicate name within the tenant', async () => {
      await service.create(owner, { name: 'Analytics' });

      await expect(service.create(owner, { name: 'Analytics' })).rejects.toThrow(
        DuplicateResourceException,
      );
      await expect(
        service.create(actor('owner-2', 'tenant-2'), { name: 'Analytics' }),
      ).resolves.toMatchObject({ tenant_id: 'tenant-2' });
    });

    it('allows the tenth workspace and rejects the eleventh', async () => {
      for (let i = 1; i <= 9; i++) {
        await service.create(owner, { name: `Workspace ${i}` });
      }

      await expect(service.create(owner, { name: 'Workspace 10' })).resolves.toBeDefined();
      await expect(service.create(owner, { name: 'Workspace 11' })).rejects.toThrow(
        QuotaExceededException,
      );
    });

    it('holds the quota under concurrent creation', async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 12 }, (_, i) =>
          service.create(owner, { name: `Concurrent ${i}` }),
        ),
      );

      const rejected = results.filter((r) => r.status === 'rejected');
      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(10);
      expect(rejected).toHaveLength(2);
      for (const result of rejected) {
        expect(result.status === 'rejected' && result.reason).toBeInstanceOf(
          QuotaExceededException,
        );
      }
      await expect(repos.workspaces.countByTenant('tenant-1')).resolves.toBe(10);
    });

    it('removes the owner membership when the workspace write fails', async () => {
      repos.workspaces.failCreates = true;

      await expect(service.create(owner, { name: 'Analytics' })).rejects.toThrow(
        'workspaces insert failed',
      );
      expect(repos.store.members).toEqual([]);
      expect(repos.store.workspaces.size).toBe(0);
      expect(repos.store.auditLogs).toEqual([]);
    });

    it('still succeeds when the audit store is down', async () => {
      repos.auditLogs.failInserts = true;

      await expect(service.create(owner, { name: 'Analytics' })).resolves.toMatchObject({
        name: 'Analytics',
      });
      expect(repos.store.workspaces.size).toBe(1);
    });
  });

  describe('get', () => {
    it('requires membership', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });

      await expect(service.get(actor('stranger'), workspace.id)).rejects.toThrow(
        AccessDeniedException,
      );
    });

    it('does not reveal whether a workspace exists', async () => {
      await expect(service.get(actor('stranger'), 'missing')).rejects.toThrow(
        AccessDeniedException,
      );
    });

    it('rejects a member calling from another tenant', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      join(workspace.id, 'guest-1', 'viewer');

      await expect(
        service.get(actor('guest-1', 'tenant-2'), workspace.id),
      ).rejects.toThrow(AccessDeniedException);
    });
  });

  describe('update', () => {
    it('serves the new version after an update', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      await service.get(owner, workspace.id);

      await service.update(owner, { id: workspace.id, name: 'Insights' });

      await expect(service.get(owner, workspace.id)).resolves.toMatchObject({
        name: 'Insights',
      });
    });

    it('records only the fields that were sent', async () => {
      const workspace = await service.create(owner, {
        name: 'Analytics',
        description: 'Reporting',
      });

      await service.update(owner, { id: workspace.id, description: 'Dashboards' });

      expect(repos.store.auditLogs[1]).toMatchObject({
        action: 'workspace.updated',
        changes: { description: { old: 'Reporting', new: 'Dashboards' } },
      });
      expect(Object.keys(repos.store.auditLogs[1].changes)).toEqual(['description']);
    });

    it('skips the audit entry for an empty patch', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });

      await service.update(owner, { id: workspace.id });

      expect(repos.store.auditLogs).toHaveLength(1);
    });

    it('rejects a rename onto an existing name', async () => {
      await service.create(owner, { name: 'Analytics' });
      const other = await service.create(owner, { name: 'Marketing' });

      await expect(
        service.update(owner, { id: other.id, name: 'Analytics' }),
      ).rejects.toThrow(DuplicateResourceException);
    });

    it('requires admin', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      join(workspace.id, 'member-1', 'member');

      await expect(
        service.update(actor('member-1'), { id: workspace.id, name: 'Other' }),
      ).rejects.toThrow(AccessDeniedException);
    });
  });

  describe('delete', () => {
    it('refuses while projects remain', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      seedProject(workspace.id);

      await expect(service.delete(owner, workspace.id)).rejects.toThrow(
        ResourceInUseException,
      );
      await expect(service.delete(owner, workspace.id)).rejects.toThrow(
        'Cannot delete workspace with 1 active projects',
      );
    });

    it('soft-deletes and drops cached copies', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      await service.get(owner, workspace.id);

      await service.delete(owner, workspace.id);

      expect(repos.store.workspaces.get(workspace.id)).toMatchObject({
        state: 'deleted',
      });
      await expect(service.get(owner, workspace.id)).rejects.toThrow(
        ResourceNotFoundException,
      );
      expect(repos.store.auditLogs.map((log) => log.action)).toEqual([
        'workspace.created',
        'workspace.deleted',
      ]);
    });

    it('is reserved to owners', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      join(workspace.id, 'admin-1', 'admin');

      await expect(service.delete(actor('admin-1'), workspace.id)).rejects.toThrow(
        AccessDeniedException,
      );
    });

    it('frees a quota slot', async () => {
      const created: Workspace[] = [];
      for (let i = 1; i <= 10; i++) {
        created.push(await service.create(owner, { name: `Workspace ${i}` }));
      }
      await service.delete(owner, created[0].id);

      await expect(service.create(owner, { name: 'Workspace 11' })).resolves.toBeDefined();
    });

    it('keeps the workspace deleted when an update races the delete', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });

      const [deleted, updated] = await Promise.allSettled([
        service.delete(owner, workspace.id),
        service.update(owner, { id: workspace.id, name: 'Renamed' }),
      ]);

      expect(deleted.status).toBe('fulfilled');
      expect(updated.status).toBe('rejected');
      if (updated.status === 'rejected') {
        expect(updated.reason).toBeInstanceOf(ResourceNotFoundException);
      }
      expect(repos.store.workspaces.get(workspace.id)).toMatchObject({
        name: 'Analytics',
        state: 'deleted',
      });
    });
  });

  describe('list', () => {
    it('shows only workspaces the actor belongs to', async () => {
      await service.create(owner, { name: 'Analytics' });
      await service.create(actor('owner-2'), { name: 'Marketing' });

      const result = await service.list(owner, {});

      expect(result.items.map((w) => w.name)).toEqual(['Analytics']);
      expect(result.total).toBe(1);
    });
  });

  describe('stats', () => {
    it('counts the tenant workspaces and projects', async () => {
      const workspace = await service.create(owner, { name: 'Analytics' });
      seedProject(workspace.id);

      await expect(service.stats(owner)).resolves.toEqual({
        tenant_id: 'tenant-1',
        total_workspaces: 1,
        total_projects: 1,
        active_projects: 1,
        archived_projects: 0,
        total_connections: 0,
      });
    });
  });
});
