/**
 * Groq adapters for the gatekeeper
 *
 * Provides:
 * - Whisper transcription as a `Transcriber` (cloud side of the ASR router)
 * - Chat completion as an `LlmBackend` that consumes routing payloads
 */

import Groq, { toFile } from 'groq-sdk';
import type { AudioFrame } from '@voicegate/shared';
import { encodeWav } from '../voice/audio.js';
import type { Transcriber, Transcription } from '../nlp/asr.js';
import type { LlmPayload } from '../nlp/router.js';
import type { Logger } from './logger.js';
import type { MetricsSink } from './metrics.js';
import { withTimeout } from './timeout.js';

export interface LlmBackend {
    complete(payload: LlmPayload): Promise<string>;
}

// Groq has request limits; keep at most ~10 requests per second.
const MIN_REQUEST_INTERVAL_MS = 100;

class RateLimiter {
    private lastRequestTime = 0;

    async wait(): Promise<void> {
        const elapsed = Date.now() - this.lastRequestTime;
        if (elapsed < MIN_REQUEST_INTERVAL_MS) {
            await new Promise((resolve) => setTimeout(resolve, MIN_REQUEST_INTERVAL_MS - elapsed));
        }
        this.lastRequestTime = Date.now();
    }
}

export function createGroqClient(apiKey: string | undefined): Groq {
    if (!apiKey) {
        throw new Error('GROQ_API_KEY is not configured');
    }
    return new Groq({ apiKey });
}

export class GroqTranscriber implements Transcriber {
    private readonly limiter = new RateLimiter();

    constructor(
        private readonly groq: Groq,
        private readonly metrics: MetricsSink,
        private readonly logger: Logger,
        private readonly model = 'whisper-large-v3-turbo'
    ) {}

    async transcribe(frames: readonly AudioFrame[], sampleRate: number, timeoutMs: number): Promise<Transcription> {
        const startTime = Date.now();
        try {
            await this.limiter.wait();
            const file = await toFile(encodeWav(frames, sampleRate), 'audio.wav', { type: 'audio/wav' });
            const transcription = await withTimeout('groq transcription', timeoutMs, () =>
                this.groq.audio.transcriptions.create({
                    file,
                    model: this.model,
                    language: 'en',
                })
            );

            const durationMs = Date.now() - startTime;
            this.metrics.record('asr.groq_ms', durationMs);
            const text = transcription.text.trim();
            // Whisper returns no score here; an empty result is treated as no confidence.
            return { text, confidence: text ? 0.85 : 0, source: 'groq_whisper' };
        } catch (error) {
            this.metrics.record('asr.errors', 1, { source: 'groq_whisper' });
            this.logger.error({ error }, 'Groq transcription failed');
            throw error;
        }
    }
}

export class GroqBackend implements LlmBackend {
    private readonly limiter = new RateLimiter();

    constructor(
        private readonly groq: Groq,
        private readonly timeoutMs: number,
        private readonly metrics: MetricsSink,
        private readonly logger: Logger
    ) {}

    async complete(payload: LlmPayload): Promise<string> {
        const startTime = Date.now();
        try {
            await this.limiter.wait();

            const messages = [...payload.messages];
            if (payload.tools && payload.tools.length > 0) {
                messages.splice(1, 0, {
                    role: 'system',
                    content: `Available tools:\n${payload.tools
                        .map((tool) => `- ${tool.name}: ${tool.description} (${JSON.stringify(tool.parameters)})`)
                        .join('\n')}`,
                });
            }

            const completion = await withTimeout('groq completion', this.timeoutMs, () =>
                this.groq.chat.completions.create({
                    model: payload.model,
                    messages,
                    max_tokens: 300,
                    temperature: 0.4,
                })
            );

            const response = completion.choices[0]?.message?.content || '';
            const durationMs = Date.now() - startTime;
            this.metrics.record('llm.latency_ms', durationMs, { model: payload.model });
            this.logger.info(
                {
                    model: payload.model,
                    durationMs,
                    inputTokens: completion.usage?.prompt_tokens,
                    outputTokens: completion.usage?.completion_tokens,
                },
                'LLM completion received'
            );
            return response;
        } catch (error) {
            this.metrics.record('llm.errors', 1, { model: payload.model });
            this.logger.error({ error, model: payload.model }, 'LLM completion failed');
            throw error;
        }
    }
}
