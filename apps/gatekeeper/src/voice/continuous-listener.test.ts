import { describe, expect, test, vi, type Mock } from 'vitest';
import {
    ListenerState,
    type AudioFrame,
    type EmbeddingVector,
    type EnrolledVoiceprint,
    type ListenerRejection,
    type VerifiedUtterance,
    type WakeEvent,
} from '@voicegate/shared';
import type { GuardrailConfig } from '../config.js';
import { MissingKeyError, NotEnrolledError } from '../lib/errors.js';
import { createSilentLogger } from '../lib/logger.js';
import { MetricsCollector } from '../lib/metrics.js';
import type { Transcriber } from '../nlp/asr.js';
import { TokenLedger } from '../tools/token-ledger.js';
import { createFrame } from './audio.js';
import { ContinuousListener, type VoiceprintLoader } from './continuous-listener.js';
import { AudioGuardrail } from './guardrail.js';
import { SpeakerVerifier } from './speaker-verifier.js';
import type { WakeDetector } from './wake-detector.js';

const SAMPLE_RATE = 1000;
const OWNER: EnrolledVoiceprint = { ownerId: 'alice', embedding: [1, 0], keyFingerprint: 'fp' };

// 100 samples at 1 kHz: every frame lasts 100ms.
const speech = (at: number) => createFrame(new Int16Array(100).fill(10000), SAMPLE_RATE, at);
const silence = (at: number) => createFrame(new Int16Array(100), SAMPLE_RATE, at);

class FakeWakeDetector implements WakeDetector {
    next = 0;

    process(frame: AudioFrame): WakeEvent | null {
        const confidence = this.next;
        this.next = 0;
        return confidence > 0 ? { confidence, timestamp: frame.timestamp } : null;
    }
}

interface HarnessOptions {
    guardrail?: Partial<GuardrailConfig>;
    loadVoiceprint?: VoiceprintLoader;
    challengeTranscriber?: Transcriber;
    extractionTimeoutMs?: number;
    frameBufferSize?: number;
}

function createHarness(options: HarnessOptions = {}) {
    const clock = { now: 1000 };
    const wake = new FakeWakeDetector();
    const extract: Mock<[readonly AudioFrame[], number], Promise<EmbeddingVector>> = vi.fn();
    extract.mockResolvedValue([1, 0]);
    const metrics = new MetricsCollector();
    const tokens = new TokenLedger(30_000, () => clock.now);

    const listener = new ContinuousListener(
        {
            wakeDetector: wake,
            extractor: { dimensions: 2, extract },
            verifier: new SpeakerVerifier({ threshold: 0.75 }),
            guardrail: new AudioGuardrail({
                minSpeechMs: 300,
                maxSilenceMs: 250,
                energyThreshold: 0.02,
                ...options.guardrail,
            }),
            loadVoiceprint: options.loadVoiceprint ?? (async () => OWNER),
            tokens,
            metrics,
            logger: createSilentLogger(),
            challengeTranscriber: options.challengeTranscriber,
            now: () => clock.now,
        },
        {
            wakeThreshold: 0.8,
            cooldown: {
                baseMs: 1000,
                maxConsecutiveRejections: 2,
                rejectionWindowMs: 60_000,
                escalationFactor: 2,
                maxMs: 8000,
            },
            extractionTimeoutMs: options.extractionTimeoutMs ?? 1000,
            transcriptionTimeoutMs: 1000,
            frameBufferSize: options.frameBufferSize ?? 8,
        }
    );

    const states: ListenerState[] = [];
    const wakes: WakeEvent[] = [];
    const verified: VerifiedUtterance[] = [];
    const rejected: ListenerRejection[] = [];
    listener.on('statusChange', (state: ListenerState) => states.push(state));
    listener.on('wake', (event: WakeEvent) => wakes.push(event));
    listener.on('verified', (utterance: VerifiedUtterance) => verified.push(utterance));
    listener.on('rejected', (rejection: ListenerRejection) => rejected.push(rejection));

    // Processes one frame stamped with the current time, then advances the clock by its duration.
    const feed = async (make: (at: number) => AudioFrame) => {
        await listener.processFrame(make(clock.now));
        clock.now += 100;
    };

    // Wake on a speech frame followed by three more: exactly the minimum speech.
    const attempt = async () => {
        wake.next = 0.9;
        for (let i = 0; i < 4; i++) {
            await feed(speech);
        }
    };

    return { listener, clock, wake, extract, metrics, tokens, states, wakes, verified, rejected, feed, attempt };
}

describe('ContinuousListener', () => {
    test('verifies the owner and issues a usable token', async () => {
        const h = createHarness();
        await h.attempt();

        expect(h.states).toEqual([
            ListenerState.LISTENING_FOR_WAKE,
            ListenerState.WAKE_DETECTED,
            ListenerState.GUARDRAIL_CHECK,
            ListenerState.VERIFYING,
            ListenerState.VERIFIED_ACTIVE,
            ListenerState.IDLE,
        ]);
        expect(h.verified).toHaveLength(1);

        const utterance = h.verified[0];
        expect(utterance?.ownerId).toBe('alice');
        expect(utterance?.frames).toHaveLength(3);
        expect(utterance?.sampleRate).toBe(SAMPLE_RATE);
        expect(utterance?.wakeToVerifyLatencyMs).toBe(300);
        expect(utterance?.confidence).toBe(1);
        expect(h.tokens.consume(utterance?.token, 'alice').valid).toBe(true);

        expect(h.metrics.counter('listener.verified')).toBe(1);
        expect(h.metrics.getAvgLatency('listener.wake_to_verify_ms')).toBe(300);
        expect(h.listener.getState()).toBe(ListenerState.IDLE);
    });

    test('ignores wake events below the threshold', async () => {
        const h = createHarness();
        h.wake.next = 0.5;
        await h.feed(speech);

        expect(h.wakes).toEqual([]);
        expect(h.listener.getState()).toBe(ListenerState.LISTENING_FOR_WAKE);
        expect(h.metrics.counter('listener.wake_events')).toBe(1);
        expect(h.metrics.counter('listener.wake_detected')).toBe(0);
    });

    test('discards audio captured before the wake word', async () => {
        const h = createHarness();
        await h.feed(speech);
        await h.feed(speech);
        await h.attempt();

        expect(h.verified[0]?.frames).toHaveLength(3);
    });

    test('returns to idle when silence exceeds the limit before enough speech', async () => {
        const h = createHarness();
        h.wake.next = 0.9;
        await h.feed(speech);
        await h.feed(speech);
        await h.feed(silence);
        await h.feed(silence);
        await h.feed(silence);

        expect(h.states).not.toContain(ListenerState.VERIFYING);
        expect(h.listener.getState()).toBe(ListenerState.IDLE);
        expect(h.listener.getGuardrailState()).toEqual({ speechMs: 0, silenceMs: 0 });
        expect(h.extract).not.toHaveBeenCalled();
        expect(h.rejected).toEqual([
            {
                reason: 'guardrail',
                latencyMs: 400,
                cooldownMs: 0,
                message: 'Insufficient speech captured (speech 100ms, silence 300ms).',
                code: 'GUARDRAIL_REJECTED',
            },
        ]);
        expect(h.listener.consecutiveRejections).toBe(0);
    });

    test('enters cooldown on a speaker mismatch and ignores wake words meanwhile', async () => {
        const h = createHarness();
        h.extract.mockResolvedValue([0, 1]);
        await h.attempt();

        expect(h.verified).toEqual([]);
        expect(h.rejected).toEqual([
            {
                reason: 'verification_rejected',
                latencyMs: 300,
                cooldownMs: 1000,
                message: 'Speaker does not match the enrolled owner (score 0.000 < 0.75).',
                confidence: 0,
                code: 'VERIFICATION_REJECTED',
            },
        ]);
        expect(h.listener.getState()).toBe(ListenerState.COOLDOWN);

        await h.attempt();
        expect(h.wakes).toHaveLength(1);
        expect(h.listener.getState()).toBe(ListenerState.COOLDOWN);
    });

    test('escalates the cooldown after repeated rejections', async () => {
        const h = createHarness();
        h.extract.mockResolvedValue([0, 1]);

        for (let i = 0; i < 3; i++) {
            await h.attempt();
            const last = h.rejected[h.rejected.length - 1];
            // Jump to the end of the cooldown; that frame returns the listener to idle.
            h.clock.now += (last?.cooldownMs ?? 0) - 100;
            await h.feed(silence);
            expect(h.listener.getState()).toBe(ListenerState.IDLE);
        }

        expect(h.rejected.map((rejection) => rejection.cooldownMs)).toEqual([1000, 2000, 4000]);
        expect(h.listener.consecutiveRejections).toBe(3);

        h.extract.mockResolvedValue([1, 0]);
        await h.attempt();
        expect(h.verified).toHaveLength(1);
        expect(h.listener.consecutiveRejections).toBe(0);
    });

    test('gives infrastructure failures the base cooldown even after a lockout', async () => {
        const h = createHarness({ extractionTimeoutMs: 20 });
        h.extract.mockResolvedValue([0, 1]);

        for (let i = 0; i < 3; i++) {
            await h.attempt();
            const last = h.rejected[h.rejected.length - 1];
            h.clock.now += (last?.cooldownMs ?? 0) - 100;
            await h.feed(silence);
        }
        h.extract.mockImplementation(() => new Promise<EmbeddingVector>(() => undefined));
        await h.attempt();

        expect(h.rejected.map((rejection) => [rejection.reason, rejection.cooldownMs])).toEqual([
            ['verification_rejected', 1000],
            ['verification_rejected', 2000],
            ['verification_rejected', 4000],
            ['timeout', 1000],
        ]);
        expect(h.listener.consecutiveRejections).toBe(3);
    });

    test('returns to idle when a verified handler throws', async () => {
        const h = createHarness();
        const handler = vi.fn(() => {
            throw new Error('consumer failed');
        });
        h.listener.on('verified', handler);

        await h.attempt();
        expect(h.listener.getState()).toBe(ListenerState.IDLE);
        expect(h.rejected).toEqual([]);
        expect(h.metrics.counter('listener.handler_errors')).toBe(1);

        await h.attempt();
        expect(handler).toHaveBeenCalledTimes(2);
        expect(h.verified).toHaveLength(2);
        expect(h.listener.getState()).toBe(ListenerState.IDLE);
    });

    test('retries a timed-out extraction once', async () => {
        const h = createHarness({ extractionTimeoutMs: 20 });
        h.extract.mockImplementationOnce(() => new Promise<EmbeddingVector>(() => undefined));
        await h.attempt();

        expect(h.extract).toHaveBeenCalledTimes(2);
        expect(h.verified).toHaveLength(1);
        expect(h.metrics.counter('listener.retries')).toBe(1);
    });

    test('rejects with a timeout without counting toward lockout', async () => {
        const h = createHarness({ extractionTimeoutMs: 20 });
        h.extract.mockImplementation(() => new Promise<EmbeddingVector>(() => undefined));
        await h.attempt();

        expect(h.rejected).toHaveLength(1);
        expect(h.rejected[0]?.reason).toBe('timeout');
        expect(h.rejected[0]?.code).toBe('TIMEOUT');
        expect(h.rejected[0]?.cooldownMs).toBe(1000);
        expect(h.listener.consecutiveRejections).toBe(0);
    });

    test('rejects when no voiceprint is enrolled', async () => {
        const h = createHarness({
            loadVoiceprint: async () => {
                throw new NotEnrolledError('missing.voiceprint.json');
            },
        });
        await h.attempt();

        expect(h.rejected[0]?.reason).toBe('not_enrolled');
        expect(h.rejected[0]?.code).toBe('NOT_ENROLLED');
        expect(h.extract).not.toHaveBeenCalled();
    });

    test('reports a missing voice key under its own reason', async () => {
        const h = createHarness({
            loadVoiceprint: async () => {
                throw new MissingKeyError('load a voiceprint');
            },
        });
        await h.attempt();

        expect(h.rejected[0]?.reason).toBe('missing_key');
        expect(h.rejected[0]?.code).toBe('MISSING_KEY');
        expect(h.rejected[0]?.message).toBe('An explicit voice key is required to load a voiceprint.');
    });

    test('requires the challenge phrase when one is configured', async () => {
        const transcribe: Mock<[readonly AudioFrame[], number, number], Promise<{ text: string; confidence: number; source: string }>> =
            vi.fn();
        transcribe.mockResolvedValueOnce({ text: 'hello there', confidence: 0.9, source: 'fake' });
        transcribe.mockResolvedValueOnce({ text: 'Please, open sesame.', confidence: 0.9, source: 'fake' });
        const h = createHarness({ guardrail: { challengePhrase: 'open sesame' }, challengeTranscriber: { transcribe } });

        await h.attempt();
        expect(h.rejected[0]?.reason).toBe('challenge_failed');
        expect(h.listener.consecutiveRejections).toBe(1);
        expect(h.extract).not.toHaveBeenCalled();

        h.clock.now += 1000;
        await h.feed(silence);
        await h.attempt();
        expect(h.verified).toHaveLength(1);
    });

    test('refuses a challenge phrase without a transcriber', () => {
        expect(() => createHarness({ guardrail: { challengePhrase: 'open sesame' } })).toThrow(
            'A challenge phrase is configured but no challenge transcriber was provided'
        );
    });

    test('drops frames when the buffer is full', () => {
        const h = createHarness({ frameBufferSize: 2 });

        expect([h.listener.pushFrame(speech(0)), h.listener.pushFrame(speech(100)), h.listener.pushFrame(speech(200))]).toEqual([
            true,
            true,
            false,
        ]);
        expect(h.metrics.getSummary().framesDropped).toBe(1);
    });

    test('consumes a frame source in order', async () => {
        const h = createHarness();
        async function* source() {
            for (let i = 0; i < 4; i++) {
                yield speech(i * 100);
            }
        }

        h.wake.next = 0.9;
        await h.listener.run(source());

        expect(h.verified).toHaveLength(1);
        expect(h.verified[0]?.frames.map((frame) => frame.timestamp)).toEqual([100, 200, 300]);
    });

    test('stop resets an in-progress session to idle', async () => {
        const h = createHarness();
        h.wake.next = 0.9;
        await h.feed(speech);
        expect(h.listener.getState()).toBe(ListenerState.WAKE_DETECTED);

        h.listener.stop();
        expect(h.listener.getState()).toBe(ListenerState.IDLE);
        expect(h.listener.pushFrame(speech(0))).toBe(false);
    });
});
