import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import { DEFAULT_CACHE_TTL_MS } from '../common/limits';
import { Connection } from '../connections/entities/connection.entity';
import { Project } from '../projects/entities/project.entity';
import { Workspace } from '../workspaces/entities/workspace.entity';

export interface CachedResources {
  workspace: Workspace;
  project: Project;
  connection: Connection;
}

export type CachedResource = keyof CachedResources;

export type CacheLookup<T> =
  | { found: true; value: T }
  | { found: false; value: null };

const MISS = { found: false, value: null } as const;

export function resourceKey(type: CachedResource, id: string): string {
  return `${type}:${id}`;
}

export function childIndexKey(type: 'workspace' | 'project', id: string): string {
  return type === 'workspace' ? `workspace:${id}:projects` : `project:${id}:connections`;
}

export function userIndexKey(userId: string): string {
  return `user:workspaces:${userId}`;
}

/**
 * Read-through cache for workspaces, projects and connections.
 *
 * Reads populate, writes invalidate. Every cached project is registered in
 * its workspace's child index and every cached connection in its project's,
 * so a workspace can be invalidated with everything below it.
 *
 * Cache failures never fail a request: reads degrade to a miss and
 * invalidations are logged and left to expire with the TTL.
 */
@Injectable()
export class ResourceCacheService {
  private readonly logger = new Logger(ResourceCacheService.name);
  private readonly ttl: number;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
    configService: ConfigService,
  ) {
    this.ttl = Number(configService.get('CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS));
  }

  async get<K extends CachedResource>(
    type: K,
    id: string,
  ): Promise<CacheLookup<CachedResources[K]>> {
    return this.read<CachedResources[K]>(resourceKey(type, id));
  }

  async set<K extends CachedResource>(
    type: K,
    id: string,
    value: CachedResources[K],
  ): Promise<void> {
    try {
      await this.cacheManager.set(resourceKey(type, id), value, this.ttl);
      const resource: Workspace | Project | Connection = value;
      if ('workspace_id' in resource) {
        await this.addToIndex(childIndexKey('workspace', resource.workspace_id), id);
      } else if ('project_id' in resource) {
        await this.addToIndex(childIndexKey('project', resource.project_id), id);
      }
    } catch (error) {
      this.warn(`set ${resourceKey(type, id)}`, error);
    }
  }

  /**
   * Cache-aside read: returns the cached value, or loads it from the store
   * and caches it when found.
   */
  async readThrough<K extends CachedResource>(
    type: K,
    id: string,
    load: () => Promise<CachedResources[K] | null>,
  ): Promise<CachedResources[K] | null> {
    const cached = await this.get(type, id);
    if (cached.found) {
      return cached.value;
    }

    const value = await load();
    if (value) {
      await this.set(type, id, value);
    }
    return value;
  }

  async invalidate(type: CachedResource, id: string): Promise<void> {
    await this.delete(resourceKey(type, id));
  }

  /**
   * Drops a workspace, every project indexed under it, and every connection
   * indexed under those projects.
   */
  async invalidateWorkspaceCascade(workspaceId: string): Promise<void> {
    const projectsIndex = childIndexKey('workspace', workspaceId);
    const projectIds = await this.read<string[]>(projectsIndex);

    for (const projectId of projectIds.value ?? []) {
      const connectionsIndex = childIndexKey('project', projectId);
      const connectionIds = await this.read<string[]>(connectionsIndex);
      for (const connectionId of connectionIds.value ?? []) {
        await this.delete(resourceKey('connection', connectionId));
      }
      await this.delete(connectionsIndex);
      await this.delete(resourceKey('project', projectId));
    }

    await this.delete(projectsIndex);
    await this.delete(resourceKey('workspace', workspaceId));
  }

  async getUserIndex(userId: string): Promise<CacheLookup<string[]>> {
    return this.read<string[]>(userIndexKey(userId));
  }

  async setUserIndex(userId: string, workspaceIds: string[]): Promise<void> {
    try {
      await this.cacheManager.set(userIndexKey(userId), workspaceIds, this.ttl);
    } catch (error) {
      this.warn(`set ${userIndexKey(userId)}`, error);
    }
  }

  async invalidateUserIndex(userId: string): Promise<void> {
    await this.delete(userIndexKey(userId));
  }

  private async read<T>(key: string): Promise<CacheLookup<T>> {
    try {
      const value = await this.cacheManager.get<T>(key);
      if (value === undefined || value === null) {
        return MISS;
      }
      return { found: true, value };
    } catch (error) {
      this.warn(`get ${key}`, error);
      return MISS;
    }
  }

  private async addToIndex(indexKey: string, id: string): Promise<void> {
    const ids = (await this.cacheManager.get<string[]>(indexKey)) ?? [];
    if (!ids.includes(id)) {
      await this.cacheManager.set(indexKey, [...ids, id], this.ttl);
    }
  }

  private async delete(key: string): Promise<void> {
    try {
      await this.cacheManager.del(key);
    } catch (error) {
      this.warn(`del ${key}`, error);
    }
  }

  private warn(operation: string, error: unknown): void {
    this.logger.warn(
      `Cache ${operation} failed: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
}
