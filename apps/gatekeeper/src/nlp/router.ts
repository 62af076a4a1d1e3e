/**
 * LLM routing: picks the model tier, attaches the relevant tool schemas and
 * builds the payload handed to the LLM back end.
 */

import type { ConversationTurn, IntentLabel, IntentResult, RoutingDecision } from '@voicegate/shared';
import type { RoutingConfig } from '../config.js';

export interface ToolDescriptor {
    name: string;
    description: string;
    intents: readonly IntentLabel[];
    parameters: Record<string, string>;
    requiresVerification: boolean;
    requiresConfirmation?: boolean;
}

export interface LlmMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface LlmPayload {
    model: string;
    messages: LlmMessage[];
    tools?: ToolDescriptor[];
}

const DEFAULT_SYSTEM_PROMPT = `You are a personal voice assistant acting for a single verified owner.
Keep spoken answers short. Only request a tool when it is listed.`;

const CLARIFICATION_PROMPT = 'The request is ambiguous. Ask one short question to clarify what the owner wants; do not act yet.';

export class LLMRouter {
    constructor(
        private readonly config: RoutingConfig,
        private readonly systemPrompt: string = DEFAULT_SYSTEM_PROMPT
    ) {}

    route(intent: IntentResult, catalog: readonly ToolDescriptor[]): RoutingDecision {
        const complex = intent.complexityScore >= this.config.complexityCutoff;
        const clarificationNeeded = intent.confidence < this.config.clarificationThreshold;

        // Schemas are only described here; implementations stay unloaded until the gate.
        const toolSchemaRefs = clarificationNeeded
            ? []
            : catalog.filter((tool) => tool.intents.includes(intent.intentLabel)).map((tool) => tool.name);

        return {
            intentLabel: intent.intentLabel,
            complexityTier: complex ? 'complex' : 'simple',
            modelTier: complex ? 'high-capability' : 'low-cost',
            model: complex ? this.config.highCapabilityModel : this.config.lowCostModel,
            toolSchemaRefs,
            clarificationNeeded,
            confidence: intent.confidence,
        };
    }

    buildPayload(
        decision: RoutingDecision,
        message: string,
        catalog: readonly ToolDescriptor[],
        history: readonly ConversationTurn[] = []
    ): LlmPayload {
        const messages: LlmMessage[] = [
            { role: 'system', content: this.systemPrompt },
            ...history.map((turn) => ({ role: turn.role, content: turn.content })),
            { role: 'user', content: message },
        ];

        if (decision.clarificationNeeded) {
            messages.splice(1, 0, { role: 'system', content: CLARIFICATION_PROMPT });
            return { model: decision.model, messages };
        }

        const tools = catalog.filter((tool) => decision.toolSchemaRefs.includes(tool.name));
        return tools.length > 0
            ? { model: decision.model, messages, tools }
            : { model: decision.model, messages };
    }
}
