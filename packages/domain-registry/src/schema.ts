/**
 * Registry Schemas
 *
 * Validates registry and fixture files using Zod schemas.
 */

import { z } from 'zod';

// Lowercase snake identifier: finance, it_support, learning_development
const IdentifierSchema = z.string().regex(
    /^[a-z][a-z0-9_]*$/,
    'Must be a lowercase snake identifier'
);

export const DomainRecordSchema = z.object({
    name: IdentifierSchema,
    description: z.string().min(1, 'Domain description is required'),
    keywords: z.array(z.string().min(1)).default([]),
    leafHandlers: z.array(IdentifierSchema).default([]),
    sampleQueries: z.array(z.string()).default([]),
});

export const RegistryDataSchema = z.object({
    version: z.string().default('0.0.0'),
    domains: z.array(DomainRecordSchema).min(1, 'Registry must contain at least one domain'),
    leafDescriptions: z.record(z.record(z.string())).default({}),
});

export const QueryCaseSchema = z.object({
    text: z.string().min(1, 'Query text is required'),
    expectedDomain: IdentifierSchema,
});

export const QueryFixtureSchema = z.object({
    queries: z.array(QueryCaseSchema).min(1, 'At least one query case is required'),
});

/** Registry input before defaults are applied */
export type RegistryInput = z.input<typeof RegistryDataSchema>;

/**
 * Flatten Zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
