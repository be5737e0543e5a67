/**
 * Dispatch Types
 *
 * The boundary between the harness and the completion service that makes
 * the actual routing decisions.
 */

import type { DispatchNode } from './topology.js';

// ============================================================================
// Completion Service Boundary
// ============================================================================

export interface SessionRef {
    appName: string;
    userId: string;
    /** Must be distinct per concurrent execution */
    sessionId: string;
}

/**
 * One output event, attributed to the node that produced it.
 */
export interface AgentEvent {
    /** Node identifier, or the user id for echoed user turns */
    author: string;
    texts: string[];
}

export interface CompletionRequest {
    root: DispatchNode;
    text: string;
    session: SessionRef;
}

/**
 * Anything that can drive a request through a delegation tree.
 * Production uses Gemini; tests use scripted responses.
 */
export interface CompletionService {
    readonly name: string;
    run(request: CompletionRequest): AsyncIterable<AgentEvent>;
    /** Drop any state held for a session that will not be used again */
    endSession?(session: SessionRef): void;
}

// ============================================================================
// Trace
// ============================================================================

export interface DispatchTrace {
    /** Node identifiers in visitation order (repeats allowed) */
    authors: string[];
    /** All text segments joined with newlines */
    responseText: string;
    sessionId: string;
}
