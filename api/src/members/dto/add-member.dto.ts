import { IsIn, IsString, MinLength } from 'class-validator';
import { WORKSPACE_ROLES, type Role } from '../../common/entities/membership.entity';

export class AddMemberDto {
  @IsString()
  workspace_id!: string;

  @IsString()
  @MinLength(1)
  user_id!: string;

  @IsIn(WORKSPACE_ROLES)
  role!: Role;
}
