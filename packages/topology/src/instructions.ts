/**
 * Instruction Builder
 *
 * Renders the natural-language instructions each node is conditioned on.
 * Every node is told to emit a [ROUTED_TO: <id>] marker so the routing
 * decision can be read back from free text.
 */

import type { DomainRecord, LeafHandlerRecord } from '@routebench/domain-registry';
import type { RoutingHint } from './routing-hints.js';

/** Maximum description length shown in the flat-domain child list */
export const FLAT_DOMAIN_DESCRIPTION_LIMIT = 80;

/** Maximum number of sample queries embedded in a domain leaf */
export const MAX_SAMPLE_QUERIES = 3;

const DISPATCHER_RULES = `**CRITICAL RULES:**
1. You MUST ALWAYS delegate - never answer queries yourself
2. Read ALL available options before deciding
3. Be decisive - pick exactly ONE option and delegate immediately
4. When in doubt, choose the closest match`;

export interface ChildEntry {
    identifier: string;
    description: string;
}

export interface DispatcherInstructionInput {
    /** Opening line, e.g. "You are the central routing coordinator." */
    persona: string;
    /** Heading for the child list, e.g. "Available Domain Agents" */
    childHeading: string;
    children: readonly ChildEntry[];
    hints: readonly RoutingHint[];
    /** Extra lines appended after the rules (marker instruction, domain context) */
    footer?: string;
}

// ============================================================================
// Dispatchers
// ============================================================================

/**
 * Build a dispatcher instruction: child list, fixed rules, routing hints.
 */
export function buildDispatcherInstruction(input: DispatcherInstructionInput): string {
    const childList = input.children
        .map(child => `- **${child.identifier}**: ${child.description}`)
        .join('\n');
    const hints = formatHints(input.hints, input.children);
    const footer = input.footer ? `\n\n${input.footer}` : '';

    return `${input.persona} Your ONLY job is to route queries to the most appropriate option below.

${DISPATCHER_RULES}

**${input.childHeading} (${input.children.length} total):**
${childList}${hints}${footer}

Now route the query and DELEGATE immediately.`;
}

/**
 * Hints whose target is one of the listed children
 */
export function formatHints(hints: readonly RoutingHint[], children: readonly ChildEntry[]): string {
    const childIds = new Set(children.map(c => c.identifier));
    const lines = hints
        .filter(h => childIds.has(h.target))
        .map(h => `- ${h.phrases.map(p => `"${p}"`).join(', ')} → ${h.target}`);

    if (lines.length === 0) return '';
    return `\n\n**ROUTING HINTS FOR AMBIGUOUS CASES:**\n${lines.join('\n')}`;
}

/**
 * Instruction for a two-level domain node that routes to its own leaves only.
 */
export function buildDomainDispatcherInstruction(
    domain: DomainRecord,
    children: readonly ChildEntry[]
): string {
    return buildDispatcherInstruction({
        persona: `You are the ${titleCase(domain.name)} domain agent.`,
        childHeading: 'Your Sub-Agents',
        children,
        hints: [],
        footer: `Domain description: ${domain.description}
Your keywords: ${domain.keywords.join(', ')}
After routing, indicate with: [ROUTED_TO: ${domain.name}]`,
    });
}

// ============================================================================
// Leaves
// ============================================================================

/**
 * Instruction for a leaf that stands for a whole domain.
 */
export function buildDomainLeafInstruction(domain: DomainRecord, identifier: string): string {
    const examples = domain.sampleQueries
        .slice(0, MAX_SAMPLE_QUERIES)
        .map(q => `\n  - "${q}"`)
        .join('');
    const examplesBlock = examples ? `\nExamples:${examples}` : '';

    return `You are the ${titleCase(domain.name)} agent.

${domain.description}

Keywords: ${domain.keywords.join(', ')}${examplesBlock}

Acknowledge you are handling this request as the ${domain.name} agent.
Start your response with: [ROUTED_TO: ${identifier}]`;
}

/**
 * Instruction for a leaf handler inside a domain.
 */
export function buildLeafHandlerInstruction(leaf: LeafHandlerRecord, identifier: string): string {
    return `You are the ${titleCase(leaf.name)} sub-agent within the ${leaf.domain} domain.

Your description: ${leaf.description}

Acknowledge you are the ${leaf.domain}/${leaf.name} sub-agent handling this request.
Start your response with: [ROUTED_TO: ${identifier}]
Keep your response brief.`;
}

// ============================================================================
// Helpers
// ============================================================================

export function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/** it_support → It Support */
export function titleCase(name: string): string {
    return name
        .split('_')
        .filter(Boolean)
        .map(part => part.charAt(0).toUpperCase() + part.slice(1))
        .join(' ');
}
