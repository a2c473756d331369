import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsString()
  @MinLength(32, { message: 'JWT_SECRET must be at least 32 characters' })
  JWT_SECRET!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  CLICKHOUSE_HOST: string = 'http://localhost:8123';

  @IsOptional()
  @IsString()
  CLICKHOUSE_DATABASE: string = 'workspace_service';

  @IsOptional()
  @IsString()
  CLICKHOUSE_USER: string = 'default';

  @IsOptional()
  @IsString()
  CLICKHOUSE_PASSWORD: string = '';

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsInt()
  @Min(1000)
  CACHE_TTL_MS: number = 5 * 60 * 1000;

  @IsOptional()
  @IsInt()
  @Min(1)
  AUDIT_RETENTION_DAYS: number = 90;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
