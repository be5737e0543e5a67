/**
 * Marker Parser
 * 
 * Reads the routing decision back out of free-text model output.
 *
 * Nodes are told to include `[ROUTED_TO: <id>]` or `[HANDLED_BY: <id>]`.
 * The last marker wins: nodes closer to the leaf are more specific.
 * When no marker is present (the model delegated but forgot the literal),
 * the trace decides instead.
 */

/** Sentinel for an unresolvable route */
export const UNKNOWN_ROUTE = 'unknown';

const MARKER_PATTERN = /\[(?:ROUTED_TO|HANDLED_BY):([^\]]*)\]/g;

/** Trace entries containing these are routers, not destinations */
const ROUTER_NAME_FRAGMENTS = ['coordinator', 'category'];

/**
 * All marker identifiers in order of appearance, trimmed.
 * Markers with an empty identifier are skipped.
 */
export function extractMarkers(text: string): string[] {
    const markers: string[] = [];
    for (const match of text.matchAll(MARKER_PATTERN)) {
        const identifier = match[1].trim();
        if (identifier) {
            markers.push(identifier);
        }
    }
    return markers;
}

/**
 * Resolve the routed-to identifier for one response.
 * Never returns an empty string.
 */
export function parseRoutedTo(responseText: string, trace: readonly string[]): string {
    const markers = extractMarkers(responseText);
    if (markers.length > 0) {
        return markers[markers.length - 1];
    }
    return routeFromTrace(trace);
}

/**
 * Last non-router node in the trace, else the last node, else 'unknown'.
 */
export function routeFromTrace(trace: readonly string[]): string {
    const destinations = trace.filter(id => !isRouterName(id));
    if (destinations.length > 0) {
        return destinations[destinations.length - 1];
    }
    if (trace.length > 0) {
        return trace[trace.length - 1];
    }
    return UNKNOWN_ROUTE;
}

function isRouterName(identifier: string): boolean {
    const lower = identifier.toLowerCase();
    return ROUTER_NAME_FRAGMENTS.some(fragment => lower.includes(fragment));
}
