import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { trimString } from '../../common/utils/transform.util';

export class CreateConnectionDto {
  @IsString()
  project_id!: string;

  /** Identifier of the base in the external system. */
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  base_id!: string;

  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  @IsOptional()
  @IsBoolean()
  sync_enabled?: boolean;
}
