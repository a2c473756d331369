export const AUDIT_ACTIONS = {
  // Workspaces
  'workspace.created': 'Workspace created',
  'workspace.updated': 'Workspace settings updated',
  'workspace.deleted': 'Workspace deleted',

  // Projects
  'project.created': 'Project created',
  'project.updated': 'Project updated',
  'project.deleted': 'Project deleted',

  // Connections
  'connection.connected': 'External base connected',
  'connection.updated': 'Connection updated',
  'connection.disconnected': 'External base disconnected',
  'connection.synced': 'Connection sync recorded',

  // Members
  'member.added': 'Member added to workspace',
  'member.role_updated': 'Member role updated',
  'member.removed': 'Member removed from workspace',
} as const;

export type AuditAction = keyof typeof AUDIT_ACTIONS;

export type AuditResourceType =
  | 'workspace'
  | 'project'
  | 'connection'
  | 'workspace_member';

export interface AuditLog {
  id: string;
  workspace_id: string;
  user_id: string;
  action: AuditAction;
  resource_type: AuditResourceType;
  resource_id: string;
  changes: Record<string, unknown>;
  created_at: string;
}
