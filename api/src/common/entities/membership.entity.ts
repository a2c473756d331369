export const WORKSPACE_ROLES = ['owner', 'admin', 'member', 'viewer'] as const;

export type Role = (typeof WORKSPACE_ROLES)[number];

export interface WorkspaceMembership {
  workspace_id: string;
  user_id: string;
  role: Role;
  joined_at: string;
  updated_at: string;
}
