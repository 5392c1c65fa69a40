// src/config/env.validation.ts
import { plainToInstance, Transform } from 'class-transformer';
import {
    IsIn,
    IsInt,
    IsOptional,
    IsString,
    Max,
    Min,
    MinLength,
    validateSync,
} from 'class-validator';

const toInt = ({ value }: { value: unknown }) =>
    typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

// `SECRET_KEY=` in an env file means unset
const blankToUndefined = ({ value }: { value: unknown }) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

export class EnvironmentVariables {
    // Server
    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    @Max(65535)
    PORT?: number;

    @IsOptional()
    @IsIn(['development', 'production', 'test'])
    NODE_ENV?: string;

    @Transform(blankToUndefined)
    @IsOptional()
    @IsString()
    @MinLength(16)
    SECRET_KEY?: string;

    // Database
    @IsOptional()
    @IsString()
    DB_HOST?: string;

    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    @Max(65535)
    DB_PORT?: number;

    @IsOptional()
    @IsString()
    DB_USERNAME?: string;

    @IsOptional()
    @IsString()
    DB_PASSWORD?: string;

    @IsOptional()
    @IsString()
    DB_DATABASE?: string;

    @IsOptional()
    @IsString()
    DB_CHARSET?: string;

    @IsOptional()
    @IsString()
    DB_TIMEZONE?: string;

    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    DB_CONNECTION_LIMIT?: number;
}

export function validate(config: Record<string, unknown>): Record<string, unknown> {
    const validatedConfig = plainToInstance(EnvironmentVariables, config);

    const errors = validateSync(validatedConfig, {
        skipMissingProperties: false,
    });

    if (errors.length > 0) {
        throw new Error(errors.toString());
    }

    // Dropped keys stay out of process.env, so the config factory falls back
    return Object.fromEntries(
        Object.entries(validatedConfig).filter(([, value]) => value !== undefined),
    );
}
