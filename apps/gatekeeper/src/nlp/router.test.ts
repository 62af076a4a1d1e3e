import { describe, expect, test } from 'vitest';
import type { IntentResult } from '@voicegate/shared';
import { LLMRouter, type ToolDescriptor } from './router.js';

const config = {
    complexityCutoff: 0.5,
    clarificationThreshold: 0.5,
    lowCostModel: 'fast-model',
    highCapabilityModel: 'big-model',
};

const catalog: ToolDescriptor[] = [
    { name: 'email.send', description: 'Send', intents: ['email'], parameters: {}, requiresVerification: true },
    { name: 'email.draft', description: 'Draft', intents: ['email'], parameters: {}, requiresVerification: true },
    { name: 'call.place', description: 'Call', intents: ['call'], parameters: {}, requiresVerification: true },
];

function intent(overrides: Partial<IntentResult>): IntentResult {
    return { intentLabel: 'email', complexityScore: 0.1, confidence: 0.8, evidence: [], ...overrides };
}

describe('LLMRouter.route', () => {
    test('sends simple requests to the low-cost tier with matching tools', () => {
        expect(new LLMRouter(config).route(intent({}), catalog)).toEqual({
            intentLabel: 'email',
            complexityTier: 'simple',
            modelTier: 'low-cost',
            model: 'fast-model',
            toolSchemaRefs: ['email.send', 'email.draft'],
            clarificationNeeded: false,
            confidence: 0.8,
        });
    });

    test('sends complex requests to the high-capability tier', () => {
        const decision = new LLMRouter(config).route(intent({ complexityScore: 0.5 }), catalog);
        expect(decision.complexityTier).toBe('complex');
        expect(decision.modelTier).toBe('high-capability');
        expect(decision.model).toBe('big-model');
    });

    test('asks for clarification below the confidence threshold and attaches no tools', () => {
        const decision = new LLMRouter(config).route(intent({ intentLabel: 'tool-needed', confidence: 0.3 }), catalog);
        expect(decision.clarificationNeeded).toBe(true);
        expect(decision.toolSchemaRefs).toEqual([]);
    });

    test('attaches nothing for intents without tools', () => {
        expect(new LLMRouter(config).route(intent({ intentLabel: 'chat' }), catalog).toolSchemaRefs).toEqual([]);
    });
});

describe('LLMRouter.buildPayload', () => {
    test('includes history, the message and routed tool descriptions', () => {
        const router = new LLMRouter(config, 'system prompt');
        const decision = router.route(intent({}), catalog);
        const payload = router.buildPayload(decision, 'email bob', catalog, [
            { role: 'user', content: 'hi' },
            { role: 'assistant', content: 'hello' },
        ]);

        expect(payload.model).toBe('fast-model');
        expect(payload.messages).toEqual([
            { role: 'system', content: 'system prompt' },
            { role: 'user', content: 'hi' },
            { role: 'assistant', content: 'hello' },
            { role: 'user', content: 'email bob' },
        ]);
        expect(payload.tools?.map((tool) => tool.name)).toEqual(['email.send', 'email.draft']);
    });

    test('replaces tools with a clarification instruction', () => {
        const router = new LLMRouter(config, 'system prompt');
        const decision = router.route(intent({ confidence: 0.2 }), catalog);
        const payload = router.buildPayload(decision, 'do it', catalog);

        expect(payload.tools).toBeUndefined();
        expect(payload.messages).toHaveLength(3);
        expect(payload.messages[1]?.role).toBe('system');
        expect(payload.messages[1]?.content).toMatch(/^The request is ambiguous/);
    });

    test('omits the tools key when no tool is routed', () => {
        const router = new LLMRouter(config);
        const payload = router.buildPayload(router.route(intent({ intentLabel: 'chat' }), catalog), 'hi', catalog);
        expect('tools' in payload).toBe(false);
    });
});
