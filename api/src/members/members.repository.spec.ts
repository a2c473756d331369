import { Test, TestingModule } from '@nestjs/testing';
import { ClickHouseService } from '../database/clickhouse.service';
import {
  DuplicateResourceException,
  LastOwnerException,
  ResourceNotFoundException,
} from '../common/errors';
import { WorkspaceMembership } from '../common/entities';
import { MembersRepository } from './members.repository';

describe('MembersRepository', () => {
  let repository: MembersRepository;
  let clickhouse: {
    query: jest.Mock;
    count: jest.Mock;
    insert: jest.Mock;
    command: jest.Mock;
  };

  const ownerMembership: WorkspaceMembership = {
    workspace_id: 'ws-1',
    user_id: 'owner-1',
    role: 'owner',
    joined_at: '2025-01-01 00:00:00.000',
    updated_at: '2025-01-01 00:00:00.000',
  };

  const memberMembership: WorkspaceMembership = {
    ...ownerMembership,
    user_id: 'member-1',
    role: 'member',
  };

  beforeEach(async () => {
    clickhouse = {
      query: jest.fn(),
      count: jest.fn(),
      insert: jest.fn(),
      command: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MembersRepository,
        { provide: ClickHouseService, useValue: clickhouse },
      ],
    }).compile();

    repository = module.get(MembersRepository);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('find', () => {
    it('returns null when there is no row', async () => {
      clickhouse.query.mockResolvedValue([]);

      await expect(repository.find('ws-1', 'nobody')).resolves.toBeNull();
      expect(clickhouse.query).toHaveBeenCalledWith(
        expect.stringContaining('FROM workspace_members FINAL'),
        { workspace_id: 'ws-1', user_id: 'nobody' },
      );
    });
  });

  describe('get', () => {
    it('throws NotFound for a missing membership', async () => {
      clickhouse.query.mockResolvedValue([]);

      await expect(repository.get('ws-1', 'nobody')).rejects.toThrow(
        ResourceNotFoundException,
      );
    });
  });

  describe('add', () => {
    it('inserts a new membership', async () => {
      clickhouse.query.mockResolvedValue([]);

      const result = await repository.add('ws-1', 'member-1', 'member');

      expect(result).toMatchObject({
        workspace_id: 'ws-1',
        user_id: 'member-1',
        role: 'member',
      });
      expect(clickhouse.insert).toHaveBeenCalledWith('workspace_members', [result]);
    });

    it('rejects an existing membership', async () => {
      clickhouse.query.mockResolvedValue([memberMembership]);

      await expect(repository.add('ws-1', 'member-1', 'admin')).rejects.toThrow(
        DuplicateResourceException,
      );
      expect(clickhouse.insert).not.toHaveBeenCalled();
    });
  });

  describe('updateRole', () => {
    it('refuses to demote the last owner', async () => {
      clickhouse.query.mockResolvedValue([ownerMembership]);
      clickhouse.count.mockResolvedValue(1);

      await expect(repository.updateRole('ws-1', 'owner-1', 'admin')).rejects.toThrow(
        LastOwnerException,
      );
      expect(clickhouse.insert).not.toHaveBeenCalled();
    });

    it('demotes an owner when another owner remains', async () => {
      clickhouse.query.mockResolvedValue([ownerMembership]);
      clickhouse.count.mockResolvedValue(2);

      const result = await repository.updateRole('ws-1', 'owner-1', 'admin');

      expect(result.role).toBe('admin');
      expect(clickhouse.insert).toHaveBeenCalledWith('workspace_members', [
        expect.objectContaining({ user_id: 'owner-1', role: 'admin' }),
      ]);
    });

    it('skips the owner count when promoting to owner', async () => {
      clickhouse.query.mockResolvedValue([memberMembership]);

      await repository.updateRole('ws-1', 'member-1', 'owner');

      expect(clickhouse.count).not.toHaveBeenCalled();
    });
  });

  describe('remove', () => {
    it('refuses to remove the last owner', async () => {
      clickhouse.query.mockResolvedValue([ownerMembership]);
      clickhouse.count.mockResolvedValue(1);

      await expect(repository.remove('ws-1', 'owner-1')).rejects.toThrow(
        LastOwnerException,
      );
      expect(clickhouse.command).not.toHaveBeenCalled();
    });

    it('deletes a non-owner membership', async () => {
      clickhouse.query.mockResolvedValue([memberMembership]);

      await expect(repository.remove('ws-1', 'member-1')).resolves.toEqual(
        memberMembership,
      );
      expect(clickhouse.command).toHaveBeenCalledWith(
        expect.stringContaining('DELETE FROM workspace_members'),
        { workspace_id: 'ws-1', user_id: 'member-1' },
      );
    });
  });

  describe('list', () => {
    it('orders by joined_at descending and clamps the page size', async () => {
      clickhouse.count.mockResolvedValue(3);
      clickhouse.query.mockResolvedValue([memberMembership]);

      const result = await repository.list('ws-1', 1, 500);

      expect(result).toEqual({ items: [memberMembership], total: 3 });
      expect(clickhouse.query).toHaveBeenCalledWith(
        expect.stringContaining('ORDER BY joined_at DESC'),
        { workspace_id: 'ws-1', limit: 100, offset: 0 },
      );
    });
  });

  describe('isLastOwner', () => {
    it('is false for a non-owner', async () => {
      clickhouse.query.mockResolvedValue([memberMembership]);

      await expect(repository.isLastOwner('ws-1', 'member-1')).resolves.toBe(false);
    });

    it('is true for the only owner', async () => {
      clickhouse.query.mockResolvedValue([ownerMembership]);
      clickhouse.count.mockResolvedValue(1);

      await expect(repository.isLastOwner('ws-1', 'owner-1')).resolves.toBe(true);
    });
  });

  describe('listWorkspaceIdsForUser', () => {
    it('queries memberships by user', async () => {
      clickhouse.query.mockResolvedValue([{ workspace_id: 'ws-1' }, { workspace_id: 'ws-2' }]);

      await expect(repository.listWorkspaceIdsForUser('user-1')).resolves.toEqual([
        'ws-1',
        'ws-2',
      ]);
      expect(clickhouse.query).toHaveBeenCalledWith(
        expect.stringContaining('WHERE user_id = {user_id:String}'),
        { user_id: 'user-1' },
      );
    });
  });
});
