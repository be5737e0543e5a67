/**
 * Raised when registry or fixture data cannot be used.
 * This is the only error class allowed to abort a whole run.
 */
export class RegistryError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'RegistryError';
        this.issues = issues;
    }
}
