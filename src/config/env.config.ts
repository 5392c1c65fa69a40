// src/config/env.config.ts
import { registerAs } from '@nestjs/config';

// Local development only. Never a real secret.
export const DEVELOPMENT_SECRET_KEY = 'default_key_used_for_dev';

export default registerAs('app', () => ({
    // Server
    port: parseInt(process.env.PORT || '8080', 10),
    nodeEnv: process.env.NODE_ENV || 'development',

    // Cookie and form-token signing
    secretKey: process.env.SECRET_KEY || DEVELOPMENT_SECRET_KEY,

    // Database
    database: {
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '3306', 10),
        username: process.env.DB_USERNAME || 'root',
        password: process.env.DB_PASSWORD || '',
        database: process.env.DB_DATABASE || 'job_tracker',
        charset: process.env.DB_CHARSET || 'utf8mb4',
        timezone: process.env.DB_TIMEZONE || 'local',
        connectionLimit: parseInt(process.env.DB_CONNECTION_LIMIT || '10', 10),
    },
}));
