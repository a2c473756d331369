import { IsBoolean, IsIn, IsInt, IsOptional, IsString } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { toBoolean } from '../../common/utils/transform.util';
import type { SortOrder } from '../../common/utils/pagination.util';
import {
  PROJECT_SORT_FIELDS,
  PROJECT_STATUSES,
  type ProjectSortField,
  type ProjectStatus,
} from '../entities/project.entity';

export class ListProjectsDto {
  @IsString()
  workspace_id!: string;

  @IsOptional()
  @IsIn(PROJECT_STATUSES)
  status?: ProjectStatus;

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
  @IsIn(PROJECT_SORT_FIELDS)
  sort_by?: ProjectSortField;

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
