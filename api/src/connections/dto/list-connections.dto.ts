import { IsBoolean, IsIn, IsInt, IsOptional, IsString } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { toBoolean } from '../../common/utils/transform.util';
import type { SortOrder } from '../../common/utils/pagination.util';
import {
  CONNECTION_SORT_FIELDS,
  type ConnectionSortField,
} from '../entities/connection.entity';

export class ListConnectionsDto {
  @IsString()
  project_id!: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  sync_enabled?: boolean;

  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  include_deleted?: boolean;

  @IsOptional()
  @IsIn(CONNECTION_SORT_FIELDS)
  sort_by?: ConnectionSortField;

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
