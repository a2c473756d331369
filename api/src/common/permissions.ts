import { Role } from './entities/membership.entity';

export const ROLE_HIERARCHY: Readonly<Record<Role, number>> = Object.freeze({
  owner: 4,
  admin: 3,
  member: 2,
  viewer: 1,
});

/**
 * Minimum workspace role required for each action.
 * Project and connection actions are checked against the role held in the
 * owning workspace.
 */
export const WORKSPACE_ACTIONS = {
  // Workspace
  'workspace.read': 'viewer',
  'workspace.update': 'admin',
  'workspace.delete': 'owner',

  // Projects
  'project.read': 'viewer',
  'project.create': 'member',
  'project.update': 'member',
  'project.delete': 'admin',

  // Connections
  'connection.read': 'viewer',
  'connection.connect': 'member',
  'connection.update': 'member',
  'connection.sync': 'member',
  'connection.disconnect': 'admin',

  // Team management
  'members.read': 'viewer',
  'members.manage': 'admin',

  'audit.read': 'admin',
} as const satisfies Record<string, Role>;

export type WorkspaceAction = keyof typeof WORKSPACE_ACTIONS;

export function isWorkspaceRole(value: unknown): value is Role {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(ROLE_HIERARCHY, value)
  );
}

/**
 * True when `actual` ranks at or above `required`.
 * An unrecognized role on either side never satisfies.
 */
export function satisfiesRole(actual: string, required: string): boolean {
  if (!isWorkspaceRole(actual) || !isWorkspaceRole(required)) {
    return false;
  }
  return ROLE_HIERARCHY[actual] >= ROLE_HIERARCHY[required];
}

export function canPerform(role: Role, action: WorkspaceAction): boolean {
  return satisfiesRole(role, WORKSPACE_ACTIONS[action]);
}

/**
 * Granting or revoking the owner role, or acting on an existing owner,
 * is reserved to owners.
 */
export function touchesOwnership(targetRole: Role, newRole?: Role): boolean {
  return targetRole === 'owner' || newRole === 'owner';
}
