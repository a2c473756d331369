import { IsBoolean, IsIn, IsInt, IsOptional, IsString } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { toBoolean } from '../../common/utils/transform.util';
import type { SortOrder } from '../../common/utils/pagination.util';
import {
  WORKSPACE_SORT_FIELDS,
  type WorkspaceSortField,
} from '../entities/workspace.entity';

export class ListWorkspacesDto {
  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @IsString()
  created_by?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  include_deleted?: boolean;

  @IsOptional()
  @IsIn(WORKSPACE_SORT_FIELDS)
  sort_by?: WorkspaceSortField;

  @IsOptional()
  @IsIn(['asc', 'desc'])
  sort_order?: SortOrder;

  @IsOptional()
  @IsInt()
  @Type(() => Number)
  page?: number;

  @IsOptional()
  @IsInt()
  @Type(() => Number)
  page_size?: number;
}
