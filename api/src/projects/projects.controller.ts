import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CreateThrottle } from '../common/decorators/throttle.decorator';
import { ResourceIdDto } from '../common/dto/resource-id.dto';
import { Actor } from '../common/entities';
import { CreateProjectDto } from './dto/create-project.dto';
import { ListProjectsDto } from './dto/list-projects.dto';
import { UpdateProjectDto } from './dto/update-project.dto';
import { ProjectsService } from './projects.service';

@ApiTags('projects')
@ApiSecurity('jwt-auth')
@Controller('api')
export class ProjectsController {
  constructor(private readonly projectsService: ProjectsService) {}

  @Get('projects.list')
  @ApiOperation({ summary: 'List projects of a workspace' })
  list(@CurrentActor() actor: Actor, @Query() dto: ListProjectsDto) {
    return this.projectsService.list(actor, dto);
  }

  @Get('projects.get')
  @ApiOperation({ summary: 'Get project by ID' })
  @ApiQuery({ name: 'id', type: String, required: true })
  get(@CurrentActor() actor: Actor, @Query() dto: ResourceIdDto) {
    return this.projectsService.get(actor, dto.id);
  }

  @Post('projects.create')
  @CreateThrottle()
  @ApiOperation({ summary: 'Create a project in a workspace (member)' })
  create(@CurrentActor() actor: Actor, @Body() dto: CreateProjectDto) {
    return this.projectsService.create(actor, dto);
  }

  @Post('projects.update')
  @HttpCode(200)
  @ApiOperation({ summary: 'Update a project (member)' })
  update(@CurrentActor() actor: Actor, @Body() dto: UpdateProjectDto) {
    return this.projectsService.update(actor, dto);
  }

  @Post('projects.delete')
  @HttpCode(200)
  @ApiOperation({ summary: 'Delete a project without connections (admin)' })
  async delete(@CurrentActor() actor: Actor, @Body() dto: ResourceIdDto) {
    await this.projectsService.delete(actor, dto.id);
    return { success: true };
  }
}
