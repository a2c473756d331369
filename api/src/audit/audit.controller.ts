import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { Actor } from '../common/entities';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { AuditService } from './audit.service';
import { ListAuditDto } from './dto/list-audit.dto';

@ApiTags('audit')
@ApiSecurity('jwt-auth')
@Controller('api')
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Get('audit.list')
  @ApiOperation({ summary: 'List audit logs of a workspace (admin)' })
  list(@CurrentActor() actor: Actor, @Query() dto: ListAuditDto) {
    return this.auditService.getAuditLogs(actor, dto);
  }
}
