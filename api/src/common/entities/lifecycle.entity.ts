export type LifecycleState = 'active' | 'deleted';

export interface SoftDeletable {
  deleted_at: string | null;
  state: LifecycleState;
}

export function lifecycleOf(deletedAt: string | null): LifecycleState {
  return deletedAt === null ? 'active' : 'deleted';
}
