import { Global, Module } from '@nestjs/common';
import { AuditLogRepository } from '../audit/audit-log.repository';
import { ConnectionsRepository } from '../connections/connections.repository';
import { MembersRepository } from '../members/members.repository';
import { ProjectsRepository } from '../projects/projects.repository';
import { WorkspacesRepository } from '../workspaces/workspaces.repository';
import { ClickHouseService } from './clickhouse.service';

// Repositories are shared here: services of one feature read the tables of
// the others (quota counts, child checks, membership lookups).
const REPOSITORIES = [
  WorkspacesRepository,
  ProjectsRepository,
  ConnectionsRepository,
  MembersRepository,
  AuditLogRepository,
];

@Global()
@Module({
  providers: [ClickHouseService, ...REPOSITORIES],
  exports: [ClickHouseService, ...REPOSITORIES],
})
export class DatabaseModule {}
