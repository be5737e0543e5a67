/**
 * Keyword Completion Service
 *
 * Deterministic offline stand-in for a model: routes with the registry's
 * keyword detector and answers with the marker protocol. Lets the whole
 * harness run without an API key (--offline).
 */

import { UNKNOWN_DOMAIN, type DomainRegistry } from '@routebench/domain-registry';
import type { AgentEvent, CompletionRequest, CompletionService, DispatchNode } from '@routebench/types';

export class KeywordCompletionService implements CompletionService {
    readonly name = 'keyword';
    private registry: DomainRegistry;

    constructor(registry: DomainRegistry) {
        this.registry = registry;
    }

    async *run(request: CompletionRequest): AsyncGenerator<AgentEvent> {
        yield { author: request.session.userId, texts: [request.text] };

        const root = request.root;
        const domain = this.registry.detectDomain(request.text);
        const candidates = root.children.filter(c => c.domain === domain);

        if (domain === UNKNOWN_DOMAIN || candidates.length === 0) {
            // Dispatcher answers in place; nothing to delegate to
            yield { author: root.identifier, texts: ['No specialized agent matches this request.'] };
            return;
        }

        yield { author: root.identifier, texts: [] };

        let node = pickByOverlap(candidates, request.text);
        while (node.role === 'dispatcher' && node.children.length > 0) {
            yield { author: node.identifier, texts: [`[ROUTED_TO: ${domain}]`] };
            node = pickByOverlap(node.children, request.text);
        }

        yield {
            author: node.identifier,
            texts: [`[ROUTED_TO: ${node.identifier}]\nHandling this request as ${node.identifier}.`],
        };
    }
}

/**
 * Candidate whose identifier or description shares the most query words.
 * Ties and zero overlap go to the first candidate.
 */
export function pickByOverlap(candidates: readonly DispatchNode[], query: string): DispatchNode {
    const words = tokenize(query).filter(w => w.length >= 3);
    let best = candidates[0];
    let bestScore = 0;

    for (const candidate of candidates) {
        const haystack = `${candidate.identifier.replace(/_/g, ' ')} ${candidate.description}`.toLowerCase();
        const score = words.filter(w => haystack.includes(w)).length;
        if (score > bestScore) {
            best = candidate;
            bestScore = score;
        }
    }

    return best;
}

function tokenize(text: string): string[] {
    return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}
