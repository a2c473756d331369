import { AuditLog, Role } from '../common/entities';
import { AccessDeniedException } from '../common/errors';
import { daysBefore, toClickHouseDateTime } from '../common/utils/datetime.util';
import { actor, createServiceTestingModule } from '../../test/helpers';
import { InMemoryRepositories } from '../../test/helpers/in-memory-repositories';
import { AuditService } from './audit.service';

describe('AuditService', () => {
  let service: AuditService;
  let repos: InMemoryRepositories;

  const entry = (overrides: Partial<AuditLog> = {}): AuditLog => ({
    id: `audit-${Math.random().toString(36).slice(2)}`,
    workspace_id: 'ws-1',
    user_id: 'owner-1',
    action: 'project.created',
    resource_type: 'project',
    resource_id: 'proj-1',
    changes: {},
    created_at: toClickHouseDateTime(),
    ...overrides,
  });

  const join = (userId: string, role: Role) => {
    const now = toClickHouseDateTime();
    repos.store.members.push({
      workspace_id: 'ws-1',
      user_id: userId,
      role,
      joined_at: now,
      updated_at: now,
    });
  };

  beforeEach(async () => {
    const context = await createServiceTestingModule([]);
    service = context.module.get(AuditService);
    repos = context.repos;
  });

  describe('record', () => {
    it('stores the entry with an empty change set by default', async () => {
      await service.record({
        workspace_id: 'ws-1',
        user_id: 'owner-1',
        action: 'workspace.created',
        resource_type: 'workspace',
        resource_id: 'ws-1',
      });

      expect(repos.store.auditLogs).toHaveLength(1);
      expect(repos.store.auditLogs[0]).toMatchObject({
        workspace_id: 'ws-1',
        user_id: 'owner-1',
        action: 'workspace.created',
        resource_type: 'workspace',
        resource_id: 'ws-1',
        changes: {},
      });
    });

    it('resolves even when the store rejects the write', async () => {
      repos.auditLogs.failInserts = true;

      await expect(
        service.record({
          workspace_id: 'ws-1',
          user_id: 'owner-1',
          action: 'workspace.updated',
          resource_type: 'workspace',
          resource_id: 'ws-1',
        }),
      ).resolves.toBeUndefined();
      expect(repos.store.auditLogs).toHaveLength(0);
    });
  });

  describe('getAuditLogs', () => {
    beforeEach(() => {
      join('owner-1', 'owner');
      join('member-1', 'member');
    });

    it('rejects members below admin', async () => {
      await expect(
        service.getAuditLogs(actor('member-1'), { workspace_id: 'ws-1' }),
      ).rejects.toThrow(AccessDeniedException);
    });

    it('rejects callers outside the workspace', async () => {
      await expect(
        service.getAuditLogs(actor('stranger'), { workspace_id: 'ws-1' }),
      ).rejects.toThrow(AccessDeniedException);
    });

    it('pages with a default size of 50', async () => {
      for (let i = 0; i < 60; i++) {
        repos.store.auditLogs.push(entry({ resource_id: `proj-${i}` }));
      }

      const result = await service.getAuditLogs(actor('owner-1'), {
        workspace_id: 'ws-1',
        page: 2,
      });

      expect(result.total).toBe(60);
      expect(result.page).toBe(2);
      expect(result.page_size).toBe(50);
      expect(result.total_pages).toBe(2);
      expect(result.items).toHaveLength(10);
    });

    it('clamps oversized pages to 100', async () => {
      const result = await service.getAuditLogs(actor('owner-1'), {
        workspace_id: 'ws-1',
        page_size: 1000,
      });

      expect(result.page_size).toBe(100);
    });

    it('filters by action', async () => {
      repos.store.auditLogs.push(entry(), entry({ action: 'project.deleted' }));

      const result = await service.getAuditLogs(actor('owner-1'), {
        workspace_id: 'ws-1',
        action: 'project.deleted',
      });

      expect(result.total).toBe(1);
      expect(result.items[0].action).toBe('project.deleted');
    });
  });

  describe('cleanup', () => {
    beforeEach(() => {
      repos.store.auditLogs.push(
        entry({ id: 'old', created_at: toClickHouseDateTime(daysBefore(40)) }),
        entry({ id: 'recent', created_at: toClickHouseDateTime(daysBefore(10)) }),
      );
    });

    it('never purges entries younger than 30 days', async () => {
      await expect(service.cleanup(7)).resolves.toEqual({
        retention_days: 30,
        deleted: 1,
      });
      expect(repos.store.auditLogs.map((log) => log.id)).toEqual(['recent']);
    });

    it('honours a longer retention period', async () => {
      await expect(service.cleanup(60)).resolves.toEqual({
        retention_days: 60,
        deleted: 0,
      });
      expect(repos.store.auditLogs).toHaveLength(2);
    });

    it.each([NaN, Infinity, -Infinity])(
      'falls back to 30 days for a retention of %p',
      async (days) => {
        await expect(service.cleanup(days)).resolves.toEqual({
          retention_days: 30,
          deleted: 1,
        });
        expect(repos.store.auditLogs.map((log) => log.id)).toEqual(['recent']);
      },
    );
  });
});
