import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Test, TestingModule } from '@nestjs/testing';
import { Cache, createCache } from 'cache-manager';
import { AuditService } from '../../src/audit/audit.service';
import { ResourceCacheService } from '../../src/cache/resource-cache.service';
import { Actor } from '../../src/common/entities';
import { KeyedMutex } from '../../src/common/utils/keyed-mutex';
import { WorkspaceAccessService } from '../../src/members/workspace-access.service';
import {
  createInMemoryRepositories,
  InMemoryRepositories,
  repositoryProviders,
} from './in-memory-repositories';

export interface ServiceTestContext {
  module: TestingModule;
  repos: InMemoryRepositories;
  cache: Cache;
}

/**
 * Compiles the given services against in-memory repositories, a real
 * in-memory cache and the shared collaborators every domain service needs.
 */
export async function createServiceTestingModule(
  services: Provider[],
): Promise<ServiceTestContext> {
  const repos = createInMemoryRepositories();
  const cache = createCache();

  const module = await Test.createTestingModule({
    providers: [
      ...services,
      ...repositoryProviders(repos),
      WorkspaceAccessService,
      AuditService,
      ResourceCacheService,
      KeyedMutex,
      { provide: CACHE_MANAGER, useValue: cache },
      { provide: ConfigService, useValue: new ConfigService({ CACHE_TTL_MS: 300000 }) },
    ],
  }).compile();

  return { module, repos, cache };
}

export function actor(userId: string, tenantId = 'tenant-1'): Actor {
  return { userId, tenantId };
}
