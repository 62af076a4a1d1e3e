import type { IntentLabel, IntentResult } from '@voicegate/shared';

interface IntentRule {
    intent: Exclude<IntentLabel, 'unknown'>;
    pattern: RegExp;
    weight: number;
    evidence: string;
}

const INTENT_RULES: IntentRule[] = [
    { intent: 'email', pattern: /\b(e-?mail|inbox|mail)\b/, weight: 3, evidence: 'email_signal' },
    { intent: 'email', pattern: /\b(draft|reply|unread)\b/, weight: 1.5, evidence: 'email_action_signal' },
    { intent: 'call', pattern: /\b(call|dial|phone)\b/, weight: 3, evidence: 'call_signal' },
    { intent: 'call', pattern: /\bring\b/, weight: 1.5, evidence: 'call_action_signal' },
    { intent: 'blog', pattern: /\b(blog|article)\b/, weight: 3, evidence: 'blog_signal' },
    { intent: 'blog', pattern: /\b(publish|post)\b/, weight: 1.5, evidence: 'blog_action_signal' },
    { intent: 'tool-needed', pattern: /\b(run|execute|tool|container|docker)\b/, weight: 2, evidence: 'tool_signal' },
    // Bare action words with no object: too vague to act on.
    { intent: 'tool-needed', pattern: /\b(do|something|stuff|handle)\b/, weight: 0.43, evidence: 'vague_action_signal' },
    { intent: 'chat', pattern: /\b(hello|hi|thanks|thank you|how are you|tell me|what is|who is)\b/, weight: 2, evidence: 'chat_signal' },
];

const COMPLEX_PATTERN = /\b(summari[sz]e|analy[sz]e|compose|compare|plan|explain)\b/;
const LONG_UTTERANCE_TOKENS = 40;
const PLAIN_CHAT_CONFIDENCE = 0.6;

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

function normalize(transcript: string): string {
    return transcript.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function complexityScore(text: string): number {
    const tokens = text.split(' ').filter((token) => token.length > 0).length;
    const base = tokens / LONG_UTTERANCE_TOKENS + (COMPLEX_PATTERN.test(text) ? 0.5 : 0);
    return round2(Math.min(1, base));
}

/**
 * Keyword-weighted intent classification. Pure and deterministic: the same
 * transcript always produces the same result. Text without any letter or
 * digit is `unknown`; words with no matching rule are plain `chat`.
 */
export function classify(transcript: string): IntentResult {
    const text = normalize(transcript);
    if (!/[\p{L}\p{N}]/u.test(text)) {
        return { intentLabel: 'unknown', complexityScore: 0, confidence: 0, evidence: [] };
    }

    const scores = new Map<IntentRule['intent'], number>();
    const evidence: string[] = [];
    for (const rule of INTENT_RULES) {
        if (rule.pattern.test(text)) {
            scores.set(rule.intent, (scores.get(rule.intent) ?? 0) + rule.weight);
            evidence.push(rule.evidence);
        }
    }

    const complexity = complexityScore(text);
    if (scores.size === 0) {
        return { intentLabel: 'chat', complexityScore: complexity, confidence: PLAIN_CHAT_CONFIDENCE, evidence: [] };
    }

    // Rule order breaks ties, so the result never depends on Map iteration quirks.
    const ranked = [...scores.entries()].sort((a, b) => b[1] - a[1]);
    const [intentLabel, top] = ranked[0];
    const second = ranked[1]?.[1] ?? 0;

    return {
        intentLabel,
        complexityScore: complexity,
        confidence: round2(top / (top + second + 1)),
        evidence,
    };
}

export class IntentClassifier {
    classify(transcript: string): IntentResult {
        return classify(transcript);
    }
}
