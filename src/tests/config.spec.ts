import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
    it('should fall back to defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            host: '0.0.0.0',
            logLevel: 'info',
            logPretty: true,
            rateLimit: { max: 100, timeWindow: '1 minute' },
            idempotencyTtlMs: 86400000
        });
    });

    it('should coerce numeric variables', () => {
        const config = loadConfig({ PORT: '8080', LOG_PRETTY: 'false', RATE_LIMIT_MAX: '5', LOG_LEVEL: 'debug' });

        expect(config.port).toBe(8080);
        expect(config.logPretty).toBe(false);
        expect(config.rateLimit.max).toBe(5);
        expect(config.logLevel).toBe('debug');
    });

    it('should reject invalid variables', () => {
        expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT/);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
