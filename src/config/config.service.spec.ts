import { ConfigService } from '@nestjs/config';
import { AppConfigService } from './config.service';
import envConfig, { DEVELOPMENT_SECRET_KEY } from './env.config';

describe('AppConfigService', () => {
    const originalEnv = process.env;

    afterEach(() => {
        process.env = originalEnv;
    });

    function load(env: Record<string, string>): AppConfigService {
        process.env = { ...env };
        return new AppConfigService(new ConfigService({ app: envConfig() }));
    }

    it('falls back to local development defaults', () => {
        const config = load({});

        expect(config.port).toBe(8080);
        expect(config.isDevelopment).toBe(true);
        expect(config.secretKey).toBe(DEVELOPMENT_SECRET_KEY);
        expect(config.usesDevelopmentSecret).toBe(true);
        expect(config.database).toEqual({
            host: 'localhost',
            port: 3306,
            username: 'root',
            password: '',
            database: 'job_tracker',
            charset: 'utf8mb4',
            timezone: 'local',
            connectionLimit: 10,
        });
    });

    it('reads the environment', () => {
        const config = load({
            PORT: '3000',
            NODE_ENV: 'production',
            SECRET_KEY: 'test-secret-test-secret',
            DB_HOST: 'db.internal',
            DB_DATABASE: 'tracker',
        });

        expect(config.port).toBe(3000);
        expect(config.nodeEnv).toBe('production');
        expect(config.isDevelopment).toBe(false);
        expect(config.usesDevelopmentSecret).toBe(false);
        expect(config.database.host).toBe('db.internal');
        expect(config.database.database).toBe('tracker');
    });
});
