/**
 * Environment Configuration
 *
 * GEMINI_API_KEY          required unless running offline
 * ROUTEBENCH_MODEL        Gemini model name
 * ROUTEBENCH_TIMEOUT_MS   bound on one dispatch
 * ROUTEBENCH_TEMPERATURE  sampling temperature
 */

import { z } from 'zod';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from '@routebench/dispatch';
import { formatIssues } from '@routebench/domain-registry';
import { ConfigError } from './errors.js';

// Unset and blank variables both fall back to the default
const blankAsUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const EnvSchema = z.object({
    GEMINI_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
    ROUTEBENCH_MODEL: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_MODEL)),
    ROUTEBENCH_TIMEOUT_MS: z.preprocess(
        blankAsUndefined,
        z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)
    ),
    ROUTEBENCH_TEMPERATURE: z.preprocess(
        blankAsUndefined,
        z.coerce.number().min(0).max(2).default(0)
    ),
});

export interface RouteBenchConfig {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    temperature: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RouteBenchConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError('Invalid environment configuration', formatIssues(parsed.error));
    }

    return {
        apiKey: parsed.data.GEMINI_API_KEY,
        model: parsed.data.ROUTEBENCH_MODEL,
        timeoutMs: parsed.data.ROUTEBENCH_TIMEOUT_MS,
        temperature: parsed.data.ROUTEBENCH_TEMPERATURE,
    };
}
