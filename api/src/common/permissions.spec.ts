import {
  canPerform,
  isWorkspaceRole,
  ROLE_HIERARCHY,
  satisfiesRole,
  touchesOwnership,
} from './permissions';

describe('permissions', () => {
  describe('satisfiesRole', () => {
    it.each([
      ['owner', 'owner', true],
      ['owner', 'admin', true],
      ['owner', 'member', true],
      ['owner', 'viewer', true],
      ['admin', 'owner', false],
      ['admin', 'admin', true],
      ['admin', 'member', true],
      ['admin', 'viewer', true],
      ['member', 'owner', false],
      ['member', 'admin', false],
      ['member', 'member', true],
      ['member', 'viewer', true],
      ['viewer', 'owner', false],
      ['viewer', 'admin', false],
      ['viewer', 'member', false],
      ['viewer', 'viewer', true],
    ])('%s satisfies %s: %s', (actual, required, expected) => {
      expect(satisfiesRole(actual, required)).toBe(expected);
    });

    it('rejects an unknown actual role', () => {
      expect(satisfiesRole('superuser', 'viewer')).toBe(false);
    });

    it('rejects an unknown required role', () => {
      expect(satisfiesRole('owner', 'editor')).toBe(false);
    });

    it('rejects an empty role', () => {
      expect(satisfiesRole('', '')).toBe(false);
    });
  });

  describe('ROLE_HIERARCHY', () => {
    it('ranks owner > admin > member > viewer', () => {
      expect(ROLE_HIERARCHY.owner).toBeGreaterThan(ROLE_HIERARCHY.admin);
      expect(ROLE_HIERARCHY.admin).toBeGreaterThan(ROLE_HIERARCHY.member);
      expect(ROLE_HIERARCHY.member).toBeGreaterThan(ROLE_HIERARCHY.viewer);
    });

    it('is frozen', () => {
      expect(Object.isFrozen(ROLE_HIERARCHY)).toBe(true);
    });
  });

  describe('isWorkspaceRole', () => {
    it('accepts the four roles', () => {
      expect(['owner', 'admin', 'member', 'viewer'].every(isWorkspaceRole)).toBe(true);
    });

    it('rejects other values', () => {
      expect(isWorkspaceRole('editor')).toBe(false);
      expect(isWorkspaceRole('toString')).toBe(false);
      expect(isWorkspaceRole(3)).toBe(false);
    });
  });

  describe('canPerform', () => {
    it('lets members create projects but not delete them', () => {
      expect(canPerform('member', 'project.create')).toBe(true);
      expect(canPerform('member', 'project.delete')).toBe(false);
    });

    it('reserves workspace deletion to owners', () => {
      expect(canPerform('admin', 'workspace.delete')).toBe(false);
      expect(canPerform('owner', 'workspace.delete')).toBe(true);
    });

    it('lets viewers read everything they can see', () => {
      expect(canPerform('viewer', 'workspace.read')).toBe(true);
      expect(canPerform('viewer', 'project.read')).toBe(true);
      expect(canPerform('viewer', 'connection.read')).toBe(true);
      expect(canPerform('viewer', 'members.read')).toBe(true);
    });

    it('requires admin for audit logs and disconnects', () => {
      expect(canPerform('member', 'audit.read')).toBe(false);
      expect(canPerform('admin', 'audit.read')).toBe(true);
      expect(canPerform('member', 'connection.disconnect')).toBe(false);
    });
  });

  describe('touchesOwnership', () => {
    it('is true when the target is an owner', () => {
      expect(touchesOwnership('owner', 'admin')).toBe(true);
    });

    it('is true when granting owner', () => {
      expect(touchesOwnership('member', 'owner')).toBe(true);
    });

    it('is false between non-owner roles', () => {
      expect(touchesOwnership('member', 'admin')).toBe(false);
      expect(touchesOwnership('viewer')).toBe(false);
    });
  });
});
