import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
    it('falls back to defaults for unset and blank variables', () => {
        expect(loadConfig({})).toEqual({
            apiKey: undefined,
            model: 'gemini-2.5-flash',
            timeoutMs: 60000,
            temperature: 0,
        });
        expect(loadConfig({ GEMINI_API_KEY: '  ', ROUTEBENCH_MODEL: '' }).apiKey).toBeUndefined();
    });

    it('reads every variable', () => {
        expect(loadConfig({
            GEMINI_API_KEY: 'test-key',
            ROUTEBENCH_MODEL: 'gemini-2.0-flash',
            ROUTEBENCH_TIMEOUT_MS: '15000',
            ROUTEBENCH_TEMPERATURE: '0.4',
        })).toEqual({
            apiKey: 'test-key',
            model: 'gemini-2.0-flash',
            timeoutMs: 15000,
            temperature: 0.4,
        });
    });

    it('rejects malformed numbers', () => {
        expect(() => loadConfig({ ROUTEBENCH_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
        expect(() => loadConfig({ ROUTEBENCH_TIMEOUT_MS: '-5' })).toThrow(/ROUTEBENCH_TIMEOUT_MS/);
        expect(() => loadConfig({ ROUTEBENCH_TEMPERATURE: '3' })).toThrow(/ROUTEBENCH_TEMPERATURE/);
    });
});
