import { IsIn, IsString } from 'class-validator';
import { WORKSPACE_ROLES, type Role } from '../../common/entities/membership.entity';

export class UpdateRoleDto {
  @IsString()
  workspace_id!: string;

  @IsString()
  user_id!: string;

  @IsIn(WORKSPACE_ROLES)
  role!: Role;
}
