import { validate } from './env.validation';

describe('validate (environment)', () => {
    it('accepts an empty environment and leaves defaults to the config factory', () => {
        expect(() => validate({})).not.toThrow();
    });

    it('converts numeric variables', () => {
        const config = validate({ PORT: '3000', DB_PORT: '3307', DB_CONNECTION_LIMIT: '5' });

        expect(config.PORT).toBe(3000);
        expect(config.DB_PORT).toBe(3307);
        expect(config.DB_CONNECTION_LIMIT).toBe(5);
    });

    it('rejects a non-numeric port', () => {
        expect(() => validate({ PORT: 'eighty' })).toThrow(/PORT/);
    });

    it('rejects an unknown NODE_ENV', () => {
        expect(() => validate({ NODE_ENV: 'staging' })).toThrow(/NODE_ENV/);
    });

    it('rejects a short SECRET_KEY', () => {
        expect(() => validate({ SECRET_KEY: 'test-secret' })).toThrow(/SECRET_KEY/);
        expect(() => validate({ SECRET_KEY: 'test-secret-test-secret' })).not.toThrow();
    });

    it('treats a blank SECRET_KEY as unset', () => {
        const config = validate({ SECRET_KEY: '', DB_PASSWORD: '' });

        expect(config).not.toHaveProperty('SECRET_KEY');
        expect(config.DB_PASSWORD).toBe('');
    });
});
