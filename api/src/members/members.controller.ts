import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CreateThrottle } from '../common/decorators/throttle.decorator';
import { Actor } from '../common/entities';
import { AddMemberDto } from './dto/add-member.dto';
import { ListMembersDto } from './dto/list-members.dto';
import { RemoveMemberDto } from './dto/remove-member.dto';
import { UpdateRoleDto } from './dto/update-role.dto';
import { MembersService } from './members.service';

@ApiTags('members')
@ApiSecurity('jwt-auth')
@Controller('api')
export class MembersController {
  constructor(private readonly membersService: MembersService) {}

  @Get('members.list')
  @ApiOperation({ summary: 'List members of a workspace' })
  list(@CurrentActor() actor: Actor, @Query() dto: ListMembersDto) {
    return this.membersService.list(actor, dto);
  }

  @Get('members.mine')
  @ApiOperation({ summary: 'List workspaces the current user belongs to' })
  mine(@CurrentActor() actor: Actor) {
    return this.membersService.getUserWorkspaces(actor);
  }

  @Post('members.add')
  @CreateThrottle()
  @ApiOperation({ summary: 'Add a user to a workspace (admin)' })
  add(@CurrentActor() actor: Actor, @Body() dto: AddMemberDto) {
    return this.membersService.add(actor, dto);
  }

  @Post('members.updateRole')
  @HttpCode(200)
  @ApiOperation({ summary: 'Change the role of a workspace member (admin)' })
  updateRole(@CurrentActor() actor: Actor, @Body() dto: UpdateRoleDto) {
    return this.membersService.updateRole(actor, dto);
  }

  @Post('members.remove')
  @HttpCode(200)
  @ApiOperation({ summary: 'Remove a member, or leave the workspace' })
  remove(@CurrentActor() actor: Actor, @Body() dto: RemoveMemberDto) {
    return this.membersService.remove(actor, dto);
  }
}
