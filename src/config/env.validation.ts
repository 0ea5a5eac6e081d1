import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Reads the raw variable; implicit conversion would already have turned
 * 'false' into true
 */
const toBoolean = ({ obj, key }: TransformFnParams): boolean => {
  const raw: unknown = obj[key];
  return typeof raw === 'boolean'
    ? raw
    : String(raw).trim().toLowerCase() === 'true';
};

/**
 * Environment variables read at startup
 */
export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 5000;

  @IsOptional()
  @IsString()
  WHATSAPP_VERIFY_TOKEN?: string;

  @IsOptional()
  @IsString()
  WHATSAPP_APP_SECRET?: string;

  @IsIn(['typeorm', 'memory'])
  STORAGE_TYPE: 'typeorm' | 'memory' = 'typeorm';

  @IsString()
  DB_PATH: string = 'db_data/whatsapp_data.db';

  @IsInt()
  @Min(0)
  DB_BUSY_TIMEOUT_MS: number = 5000;

  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING: boolean = false;

  @IsInt()
  @Min(1)
  WEBHOOK_TIMEOUT_MS: number = 10000;

  @Transform(toBoolean)
  @IsBoolean()
  DEBUG: boolean = false;
}

/**
 * ConfigModule validate hook; throws on the first invalid variable set
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}
