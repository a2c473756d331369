import { SoftDeletable } from '../../common/entities/lifecycle.entity';

/**
 * Link between a project and an external Airtable base.
 */
export interface Connection extends SoftDeletable {
  id: string;
  project_id: string;
  base_id: string;
  name: string;
  description: string;
  sync_enabled: boolean;
  last_sync_at: string | null;
  created_at: string;
  updated_at: string;
}

export const CONNECTION_SORT_FIELDS = ['created_at', 'updated_at', 'name', 'last_sync_at'] as const;
export type ConnectionSortField = (typeof CONNECTION_SORT_FIELDS)[number];
