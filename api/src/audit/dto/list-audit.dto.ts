import { IsIn, IsInt, IsOptional, IsString } from 'class-validator';
import { Type } from 'class-transformer';
import {
  AUDIT_ACTIONS,
  type AuditAction,
  type AuditResourceType,
} from '../../common/entities/audit-log.entity';

const RESOURCE_TYPES: AuditResourceType[] = [
  'workspace',
  'project',
  'connection',
  'workspace_member',
];

export class ListAuditDto {
  @IsString()
  workspace_id!: string;

  @IsOptional()
  @IsString()
  user_id?: string;

  @IsOptional()
  @IsIn(Object.keys(AUDIT_ACTIONS))
  action?: AuditAction;

  @IsOptional()
  @IsIn(RESOURCE_TYPES)
  resource_type?: AuditResourceType;

  @IsOptional()
  @IsString()
  resource_id?: string;

  @IsOptional()
  @IsInt()
  @Type(() => Number)
  page?: number;

  // Out-of-range sizes are clamped, not rejected.
  @IsOptional()
  @IsInt()
  @Type(() => Number)
  page_size?: number;
}
