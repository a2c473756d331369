import { SoftDeletable } from '../../common/entities/lifecycle.entity';

export interface Workspace extends SoftDeletable {
  id: string;
  tenant_id: string;
  name: string;
  description: string;
  settings: Record<string, unknown>;
  created_by: string;
  created_at: string;
  updated_at: string;
}

export const WORKSPACE_SORT_FIELDS = ['created_at', 'updated_at', 'name'] as const;
export type WorkspaceSortField = (typeof WORKSPACE_SORT_FIELDS)[number];

export interface WorkspaceStats {
  tenant_id: string;
  total_workspaces: number;
  total_projects: number;
  active_projects: number;
  archived_projects: number;
  total_connections: number;
}
