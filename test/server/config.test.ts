import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../server/src/config.js';

describe('loadConfig', () => {
    it('fills in defaults', () => {
        const config = loadConfig({});
        expect(config.PORT).toBe(3000);
        expect(config.NODE_ENV).toBe('development');
        expect(config.BCRYPT_ROUNDS).toBe(12);
        expect(config.ADMIN_EMAIL).toBe('admin@example.com');
        expect(config.ADMIN_NAME).toBeUndefined();
        expect(config.DB_URL.endsWith('data.db')).toBe(true);
    });

    it('coerces numbers and treats empty admin fields as unset', () => {
        const config = loadConfig({ PORT: '8080', BCRYPT_ROUNDS: '10', ADMIN_NAME: '', ADMIN_PASSWORD: '' });
        expect(config.PORT).toBe(8080);
        expect(config.BCRYPT_ROUNDS).toBe(10);
        expect(config.ADMIN_NAME).toBeUndefined();
        expect(config.ADMIN_PASSWORD).toBeUndefined();
    });

    it('rejects values out of range', () => {
        expect(() => loadConfig({ BCRYPT_ROUNDS: '3' })).toThrow(/^Invalid configuration: BCRYPT_ROUNDS:/);
        expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT:/);
        expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(/^Invalid configuration: NODE_ENV:/);
    });
});
