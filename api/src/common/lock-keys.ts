// Keys for KeyedMutex. Each guards a check-then-write sequence. Nested
// acquisition follows tenant, then workspace projects, then project connections.

/** Workspace quota and name uniqueness within a tenant; workspace update and delete. */
export const tenantLockKey = (tenantId: string) => `tenant:${tenantId}`;

/** Project quota and names within a workspace; project update and delete; workspace delete. */
export const projectsLockKey = (workspaceId: string) =>
  `workspace:${workspaceId}:projects`;

/** Connection uniqueness within a project; connection writes; project delete. */
export const connectionsLockKey = (projectId: string) =>
  `project:${projectId}:connections`;

/** Member add, role change and removal (last-owner rule). */
export const membersLockKey = (workspaceId: string) => `members:${workspaceId}`;
