import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CreateThrottle } from '../common/decorators/throttle.decorator';
import { ResourceIdDto } from '../common/dto/resource-id.dto';
import { Actor } from '../common/entities';
import { ConnectionsService } from './connections.service';
import { CreateConnectionDto } from './dto/create-connection.dto';
import { ListConnectionsDto } from './dto/list-connections.dto';
import { UpdateConnectionDto } from './dto/update-connection.dto';

@ApiTags('connections')
@ApiSecurity('jwt-auth')
@Controller('api')
export class ConnectionsController {
  constructor(private readonly connectionsService: ConnectionsService) {}

  @Get('connections.list')
  @ApiOperation({ summary: 'List external bases connected to a project' })
  list(@CurrentActor() actor: Actor, @Query() dto: ListConnectionsDto) {
    return this.connectionsService.list(actor, dto);
  }

  @Get('connections.get')
  @ApiOperation({ summary: 'Get connection by ID' })
  @ApiQuery({ name: 'id', type: String, required: true })
  get(@CurrentActor() actor: Actor, @Query() dto: ResourceIdDto) {
    return this.connectionsService.get(actor, dto.id);
  }

  @Post('connections.connect')
  @CreateThrottle()
  @ApiOperation({ summary: 'Connect an external base to a project (member)' })
  connect(@CurrentActor() actor: Actor, @Body() dto: CreateConnectionDto) {
    return this.connectionsService.connect(actor, dto);
  }

  @Post('connections.update')
  @HttpCode(200)
  @ApiOperation({ summary: 'Update a connection (member)' })
  update(@CurrentActor() actor: Actor, @Body() dto: UpdateConnectionDto) {
    return this.connectionsService.update(actor, dto);
  }

  @Post('connections.markSynced')
  @HttpCode(200)
  @ApiOperation({ summary: 'Record a completed sync (member)' })
  markSynced(@CurrentActor() actor: Actor, @Body() dto: ResourceIdDto) {
    return this.connectionsService.markSynced(actor, dto.id);
  }

  @Post('connections.disconnect')
  @HttpCode(200)
  @ApiOperation({ summary: 'Disconnect an external base (admin)' })
  async disconnect(@CurrentActor() actor: Actor, @Body() dto: ResourceIdDto) {
    await this.connectionsService.disconnect(actor, dto.id);
    return { success: true };
  }
}
