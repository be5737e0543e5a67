/**
 * @routebench/dispatch
 *
 * Drives requests through delegation trees and reads back where they landed.
 */

export { DispatchExecutor, DEFAULT_TIMEOUT_MS, type ExecuteOptions, type ExecutorOptions } from './executor.js';
export { DispatchError, DispatchTimeoutError } from './errors.js';
export { UNKNOWN_ROUTE, extractMarkers, parseRoutedTo, routeFromTrace } from './marker-parser.js';
export { createSessionId } from './session.js';
export {
    DEFAULT_MODEL,
    GeminiCompletionService,
    TRANSFER_FUNCTION,
    readTransferTarget,
    transferTool,
    type ContentGenerator,
    type GeminiServiceOptions,
    type GenerativeClient,
    type ModelReply,
} from './gemini-service.js';
export { KeywordCompletionService, pickByOverlap } from './keyword-service.js';
