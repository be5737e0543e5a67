/**
 * Raised for invalid environment or command-line configuration.
 * The CLI exits with code 1 on this error.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
