import type { ConversationTurn, RoutingDecision } from '@voicegate/shared';
import type { Logger } from '../lib/logger.js';
import type { LLMRouter, LlmPayload, ToolDescriptor } from './router.js';

/**
 * Rolling conversation context for LLM payloads. Keeps the most recent
 * `maxHistory` turns.
 */
export class ConversationController {
    private history: ConversationTurn[] = [];

    constructor(
        private readonly router: LLMRouter,
        private readonly maxHistory = 6,
        private readonly logger?: Logger
    ) {}

    recordTurn(role: ConversationTurn['role'], content: string): void {
        this.history.push({ role, content });
        while (this.history.length > this.maxHistory) {
            this.history.shift();
        }
    }

    getHistory(): readonly ConversationTurn[] {
        return [...this.history];
    }

    respond(decision: RoutingDecision, message: string, catalog: readonly ToolDescriptor[]): LlmPayload {
        const payload = this.router.buildPayload(decision, message, catalog, this.history);
        this.recordTurn('user', message);
        this.logger?.info(
            { model: decision.model, tier: decision.modelTier, tools: decision.toolSchemaRefs },
            'Routed message'
        );
        return payload;
    }

    recordReply(reply: string): void {
        this.recordTurn('assistant', reply);
    }

    clear(): void {
        this.history = [];
    }
}
