import { Module } from '@nestjs/common';
import { MembersController } from './members.controller';
import { MembersService } from './members.service';
import { WorkspaceAccessService } from './workspace-access.service';

@Module({
  controllers: [MembersController],
  providers: [MembersService, WorkspaceAccessService],
  exports: [MembersService, WorkspaceAccessService],
})
export class MembersModule {}
