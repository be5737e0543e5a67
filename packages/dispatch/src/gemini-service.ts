/**
 * Gemini Completion Service
 * 
 * Production completion service. Walks the delegation tree with Gemini:
 * each dispatcher is offered a transfer_to_agent function listing its
 * children, and a valid call moves control to that child. A node that
 * answers without transferring ends the request, as does any leaf.
 *
 * Conversation history is kept per session, so concurrent executions
 * must use distinct session ids.
 */

import {
    GoogleGenerativeAI,
    SchemaType,
    type Content,
    type FunctionCall,
    type FunctionDeclarationsTool,
    type GenerateContentRequest,
    type ModelParams,
    type RequestOptions,
} from '@google/generative-ai';
import type {
    AgentEvent,
    CompletionRequest,
    CompletionService,
    DispatchNode,
    SessionRef,
} from '@routebench/types';

export const TRANSFER_FUNCTION = 'transfer_to_agent';

export const DEFAULT_MODEL = 'gemini-2.5-flash';

/** The slice of the Gemini SDK this service calls */
export interface ModelReply {
    text(): string;
    functionCalls(): FunctionCall[] | undefined;
}

export interface ContentGenerator {
    generateContent(request: GenerateContentRequest): Promise<{ response: ModelReply }>;
}

export interface GenerativeClient {
    getGenerativeModel(params: ModelParams, requestOptions?: RequestOptions): ContentGenerator;
}

export interface GeminiServiceOptions {
    apiKey?: string;
    model?: string;
    temperature?: number;
    /** Per-call request timeout in ms */
    requestTimeoutMs?: number;
    /** Injected client (tests); defaults to GoogleGenerativeAI */
    client?: GenerativeClient;
}

export class GeminiCompletionService implements CompletionService {
    readonly name = 'gemini';
    private client: GenerativeClient;
    private model: string;
    private temperature: number;
    readonly requestTimeoutMs: number | undefined;
    private sessions: Map<string, Content[]> = new Map();

    constructor(options: GeminiServiceOptions = {}) {
        if (options.client) {
            this.client = options.client;
        } else {
            const apiKey = options.apiKey || process.env.GEMINI_API_KEY || '';
            if (!apiKey) {
                throw new Error('GEMINI_API_KEY is required');
            }
            this.client = new GoogleGenerativeAI(apiKey);
        }

        this.model = options.model || DEFAULT_MODEL;
        this.temperature = options.temperature ?? 0;
        this.requestTimeoutMs = options.requestTimeoutMs;
    }

    /**
     * Run one user turn through the tree, yielding an event per node visited
     */
    async *run(request: CompletionRequest): AsyncGenerator<AgentEvent> {
        const key = sessionKey(request.session);
        const history = this.sessions.get(key) ?? [];
        const userTurn: Content = { role: 'user', parts: [{ text: request.text }] };
        const contents = [...history, userTurn];

        yield { author: request.session.userId, texts: [request.text] };

        let node: DispatchNode = request.root;
        let finalText = '';

        while (true) {
            const reply = await this.generate(node, contents);
            const text = reply.text().trim();
            if (text) finalText = text;

            yield { author: node.identifier, texts: text ? [text] : [] };

            if (node.role === 'leaf') break;

            const target = readTransferTarget(reply.functionCalls());
            if (!target) break;

            const child = node.children.find(c => c.identifier === target);
            if (!child) {
                console.warn(`[GeminiService] ${node.identifier} transferred to unknown agent "${target}"`);
                break;
            }
            node = child;
        }

        if (finalText) {
            this.sessions.set(key, [...contents, { role: 'model', parts: [{ text: finalText }] }]);
        }
    }

    endSession(session: SessionRef): void {
        this.sessions.delete(sessionKey(session));
    }

    /** Number of sessions holding history */
    get sessionCount(): number {
        return this.sessions.size;
    }

    private async generate(node: DispatchNode, contents: Content[]): Promise<ModelReply> {
        const params: ModelParams = {
            model: this.model,
            systemInstruction: node.instruction,
            generationConfig: {
                temperature: this.temperature,
            },
        };
        if (node.role === 'dispatcher' && node.children.length > 0) {
            params.tools = [transferTool(node)];
        }

        const requestOptions: RequestOptions | undefined = this.requestTimeoutMs
            ? { timeout: this.requestTimeoutMs }
            : undefined;

        const model = this.client.getGenerativeModel(params, requestOptions);
        const result = await model.generateContent({ contents });
        return result.response;
    }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * transfer_to_agent declaration naming the node's children
 */
export function transferTool(node: DispatchNode): FunctionDeclarationsTool {
    const childIds = node.children.map(c => c.identifier);

    return {
        functionDeclarations: [
            {
                name: TRANSFER_FUNCTION,
                description: `Delegate the request to exactly one of: ${childIds.join(', ')}`,
                parameters: {
                    type: SchemaType.OBJECT,
                    properties: {
                        agent_name: {
                            type: SchemaType.STRING,
                            description: 'Identifier of the agent to delegate to',
                        },
                    },
                    required: ['agent_name'],
                },
            },
        ],
    };
}

export function readTransferTarget(calls: FunctionCall[] | undefined): string | undefined {
    const call = calls?.find(c => c.name === TRANSFER_FUNCTION);
    if (!call) return undefined;

    const args: object = call.args;
    if ('agent_name' in args && typeof args.agent_name === 'string') {
        return args.agent_name.trim() || undefined;
    }
    return undefined;
}

function sessionKey(session: SessionRef): string {
    return `${session.appName}/${session.userId}/${session.sessionId}`;
}
