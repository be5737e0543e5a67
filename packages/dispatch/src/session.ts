import { v4 as uuidv4 } from 'uuid';

/**
 * Distinct session id per execution, so per-session conversation history
 * in the completion service never leaks between queries.
 */
export function createSessionId(prefix = 'routebench'): string {
    return `${prefix}-${uuidv4()}`;
}
