import { Test, TestingModule } from '@nestjs/testing';
import { ClickHouseService } from '../database/clickhouse.service';
import { AuditLog } from '../common/entities/audit-log.entity';
import { AuditLogRepository } from './audit-log.repository';

describe('AuditLogRepository', () => {
  let repository: AuditLogRepository;
  let clickhouse: {
    query: jest.Mock;
    count: jest.Mock;
    insert: jest.Mock;
    command: jest.Mock;
  };

  const log: AuditLog = {
    id: 'audit-1',
    workspace_id: 'ws-1',
    user_id: 'owner-1',
    action: 'project.updated',
    resource_type: 'project',
    resource_id: 'proj-1',
    changes: { name: { old: 'Alpha', new: 'Beta' } },
    created_at: '2025-01-01 12:00:00.000',
  };

  // ClickHouse stores changes as a JSON string
  const logRow = { ...log, changes: JSON.stringify(log.changes) };

  beforeEach(async () => {
    clickhouse = {
      query: jest.fn(),
      count: jest.fn(),
      insert: jest.fn(),
      command: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuditLogRepository,
        { provide: ClickHouseService, useValue: clickhouse },
      ],
    }).compile();

    repository = module.get(AuditLogRepository);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('serializes changes on insert', async () => {
    await repository.insert(log);

    expect(clickhouse.insert).toHaveBeenCalledWith('workspace_audit_logs', [logRow]);
  });

  describe('list', () => {
    it('parses rows and pages with the audit default size', async () => {
      clickhouse.count.mockResolvedValue(1);
      clickhouse.query.mockResolvedValue([logRow]);

      const result = await repository.list({ workspace_id: 'ws-1' });

      expect(result).toEqual({ items: [log], total: 1 });
      expect(clickhouse.query).toHaveBeenCalledWith(
        expect.stringContaining('ORDER BY created_at DESC, id ASC'),
        { workspace_id: 'ws-1', limit: 50, offset: 0 },
      );
    });

    it('adds a condition per filter', async () => {
      clickhouse.count.mockResolvedValue(0);
      clickhouse.query.mockResolvedValue([]);

      await repository.list({
        workspace_id: 'ws-1',
        user_id: 'owner-1',
        action: 'project.updated',
        resource_type: 'project',
        resource_id: 'proj-1',
        page: 3,
        page_size: 10,
      });

      const [sql, params] = clickhouse.query.mock.calls[0];
      expect(sql).toContain('user_id = {user_id:String}');
      expect(sql).toContain('action = {action:String}');
      expect(sql).toContain('resource_type = {resource_type:String}');
      expect(sql).toContain('resource_id = {resource_id:String}');
      expect(params).toEqual({
        workspace_id: 'ws-1',
        user_id: 'owner-1',
        action: 'project.updated',
        resource_type: 'project',
        resource_id: 'proj-1',
        limit: 10,
        offset: 20,
      });
    });
  });

  describe('deleteOlderThan', () => {
    it('skips the mutation when nothing is stale', async () => {
      clickhouse.count.mockResolvedValue(0);

      await expect(repository.deleteOlderThan(30)).resolves.toBe(0);
      expect(clickhouse.command).not.toHaveBeenCalled();
    });

    it('deletes stale rows and reports how many', async () => {
      clickhouse.count.mockResolvedValue(12);

      await expect(repository.deleteOlderThan(45)).resolves.toBe(12);
      expect(clickhouse.command).toHaveBeenCalledWith(
        expect.stringContaining('ALTER TABLE workspace_audit_logs DELETE'),
        { days: 45 },
      );
    });
  });
});
