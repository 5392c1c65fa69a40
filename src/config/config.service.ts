// src/config/config.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEVELOPMENT_SECRET_KEY } from './env.config';

export interface DatabaseConfig {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    charset: string;
    timezone: string;
    connectionLimit: number;
}

@Injectable()
export class AppConfigService {
    constructor(private configService: ConfigService) {}

    // Server
    get port(): number {
        return this.configService.get<number>('app.port') || 8080;
    }

    get nodeEnv(): string {
        return this.configService.get<string>('app.nodeEnv') || 'development';
    }

    get secretKey(): string {
        return this.configService.get<string>('app.secretKey') || DEVELOPMENT_SECRET_KEY;
    }

    // Database
    get database(): DatabaseConfig {
        return (
            this.configService.get<DatabaseConfig>('app.database') || {
                host: 'localhost',
                port: 3306,
                username: 'root',
                password: '',
                database: 'job_tracker',
                charset: 'utf8mb4',
                timezone: 'local',
                connectionLimit: 10,
            }
        );
    }

    get isDevelopment(): boolean {
        return this.nodeEnv === 'development';
    }

    get isTest(): boolean {
        return this.nodeEnv === 'test';
    }

    /** True when SECRET_KEY was not provided and the built-in fallback is in use. */
    get usesDevelopmentSecret(): boolean {
        return this.secretKey === DEVELOPMENT_SECRET_KEY;
    }
}
