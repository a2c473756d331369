import { SoftDeletable } from '../../common/entities/lifecycle.entity';

export const PROJECT_STATUSES = ['active', 'archived'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export function isProjectStatus(value: unknown): value is ProjectStatus {
  return (
    typeof value === 'string' &&
    PROJECT_STATUSES.some((status) => status === value)
  );
}

export interface Project extends SoftDeletable {
  id: string;
  workspace_id: string;
  name: string;
  description: string;
  status: ProjectStatus;
  settings: Record<string, unknown>;
  created_by: string;
  created_at: string;
  updated_at: string;
}

export const PROJECT_SORT_FIELDS = ['created_at', 'updated_at', 'name', 'status'] as const;
export type ProjectSortField = (typeof PROJECT_SORT_FIELDS)[number];
