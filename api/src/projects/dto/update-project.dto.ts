import {
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { trimString } from '../../common/utils/transform.util';

export class UpdateProjectDto {
  @IsString()
  id!: string;

  @IsOptional()
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string;

  // Checked by the service so the error carries the InvalidInput kind.
  @IsOptional()
  @IsString()
  status?: string;

  @IsOptional()
  @IsObject()
  settings?: Record<string, unknown>;
}
