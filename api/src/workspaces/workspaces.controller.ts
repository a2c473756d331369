import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiQuery,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CreateThrottle } from '../common/decorators/throttle.decorator';
import { ResourceIdDto } from '../common/dto/resource-id.dto';
import { Actor } from '../common/entities';
import { CreateWorkspaceDto } from './dto/create-workspace.dto';
import { ListWorkspacesDto } from './dto/list-workspaces.dto';
import { UpdateWorkspaceDto } from './dto/update-workspace.dto';
import { WorkspacesService } from './workspaces.service';

@ApiTags('workspaces')
@ApiSecurity('jwt-auth')
@Controller('api')
export class WorkspacesController {
  constructor(private readonly workspacesService: WorkspacesService) {}

  @Get('workspaces.list')
  @ApiOperation({ summary: 'List workspaces the current user belongs to' })
  list(@CurrentActor() actor: Actor, @Query() dto: ListWorkspacesDto) {
    return this.workspacesService.list(actor, dto);
  }

  @Get('workspaces.get')
  @ApiOperation({ summary: 'Get workspace by ID' })
  @ApiQuery({ name: 'id', type: String, required: true })
  get(@CurrentActor() actor: Actor, @Query() dto: ResourceIdDto) {
    return this.workspacesService.get(actor, dto.id);
  }

  @Get('workspaces.stats')
  @ApiOperation({ summary: 'Workspace, project and connection totals for the tenant' })
  stats(@CurrentActor() actor: Actor) {
    return this.workspacesService.stats(actor);
  }

  @Post('workspaces.create')
  @CreateThrottle()
  @ApiOperation({ summary: 'Create a new workspace' })
  create(@CurrentActor() actor: Actor, @Body() dto: CreateWorkspaceDto) {
    return this.workspacesService.create(actor, dto);
  }

  @Post('workspaces.update')
  @HttpCode(200)
  @ApiOperation({ summary: 'Update an existing workspace (admin)' })
  update(@CurrentActor() actor: Actor, @Body() dto: UpdateWorkspaceDto) {
    return this.workspacesService.update(actor, dto);
  }

  @Post('workspaces.delete')
  @HttpCode(200)
  @ApiOperation({ summary: 'Delete an empty workspace (owner)' })
  @ApiBody({
    schema: {
      type: 'object',
      properties: { id: { type: 'string' } },
      required: ['id'],
    },
  })
  async delete(@CurrentActor() actor: Actor, @Body() dto: ResourceIdDto) {
    await this.workspacesService.delete(actor, dto.id);
    return { success: true };
  }
}
