/**
 * Continuous Listener
 *
 * Consumes audio frames in arrival order and gates them:
 * wake word -> speech guardrail -> (challenge phrase) -> speaker verification.
 * A successful pass emits a `VerifiedUtterance` carrying a single-use
 * verification token; every other outcome emits a rejection and leaves the
 * listener in a safe state (idle or cooldown). Nothing here throws out of
 * the consume loop on a rejection.
 */

import { EventEmitter } from 'events';
import { createActor, type Actor } from 'xstate';
import {
    ListenerState,
    type AudioFrame,
    type EnrolledVoiceprint,
    type GuardrailState,
    type ListenerRejection,
    type RejectionReason,
    type VerificationResult,
    type VerifiedUtterance,
    type WakeEvent,
} from '@voicegate/shared';
import type { CooldownConfig } from '../config.js';
import {
    GuardrailRejectedError,
    VerificationRejectedError,
    isGatekeeperError,
    type GatekeeperErrorCode,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { MetricsSink } from '../lib/metrics.js';
import { retryTransient, withTimeout } from '../lib/timeout.js';
import type { Transcriber } from '../nlp/asr.js';
import type { TokenLedger } from '../tools/token-ledger.js';
import type { EmbeddingExtractor } from './embedding.js';
import { FrameQueue } from './frame-queue.js';
import type { AudioGuardrail } from './guardrail.js';
import { listenerMachine, toListenerState, type ListenerEvent } from './listener-machine.js';
import type { SpeakerVerifier } from './speaker-verifier.js';
import type { WakeDetector } from './wake-detector.js';

export interface ListenerEvents {
    statusChange: (state: ListenerState, previous: ListenerState) => void;
    wake: (event: WakeEvent) => void;
    verified: (utterance: VerifiedUtterance) => void;
    rejected: (rejection: ListenerRejection) => void;
}

export type VoiceprintLoader = () => Promise<EnrolledVoiceprint>;

export interface ListenerDependencies {
    wakeDetector: WakeDetector;
    extractor: EmbeddingExtractor;
    verifier: SpeakerVerifier;
    guardrail: AudioGuardrail;
    loadVoiceprint: VoiceprintLoader;
    tokens: TokenLedger;
    metrics: MetricsSink;
    logger: Logger;
    /** Required when the guardrail has a challenge phrase. */
    challengeTranscriber?: Transcriber;
    now?: () => number;
}

export interface ListenerOptions {
    wakeThreshold: number;
    cooldown: CooldownConfig;
    extractionTimeoutMs: number;
    transcriptionTimeoutMs: number;
    frameBufferSize: number;
}

const REASON_BY_CODE: Partial<Record<GatekeeperErrorCode, RejectionReason>> = {
    TIMEOUT: 'timeout',
    EXTRACTION_FAILED: 'extraction_failed',
    NOT_ENROLLED: 'not_enrolled',
    KEY_MISMATCH: 'key_mismatch',
    MISSING_KEY: 'missing_key',
    VOICEPRINT_CORRUPT: 'voiceprint_unavailable',
    LOW_CONFIDENCE: 'challenge_failed',
};

// Identity failures escalate cooldown; infrastructure failures do not.
const LOCKOUT_REASONS: ReadonlySet<RejectionReason> = new Set(['verification_rejected', 'challenge_failed']);

export class ContinuousListener extends EventEmitter {
    private readonly actor: Actor<typeof listenerMachine>;
    private readonly queue: FrameQueue;
    private readonly now: () => number;
    private readonly logger: Logger;
    private segment: AudioFrame[] = [];
    private status: ListenerState = ListenerState.IDLE;
    private verifying = false;
    private running = false;

    constructor(
        private readonly deps: ListenerDependencies,
        private readonly options: ListenerOptions
    ) {
        super();
        if (deps.guardrail.challengePhrase && !deps.challengeTranscriber) {
            throw new Error('A challenge phrase is configured but no challenge transcriber was provided');
        }

        this.now = deps.now ?? Date.now;
        this.logger = deps.logger.child({ component: 'listener' });
        this.queue = new FrameQueue(options.frameBufferSize, (_frame, dropped) => {
            deps.metrics.record('listener.frames_dropped', 1);
            this.logger.warn({ dropped }, 'Frame buffer full, dropping frame');
        });

        this.actor = createActor(listenerMachine, {
            input: {
                rules: deps.guardrail,
                wakeThreshold: options.wakeThreshold,
                cooldown: options.cooldown,
            },
        });
        this.actor.subscribe((snapshot) => {
            const next = toListenerState(snapshot.value);
            if (next !== this.status) {
                const previous = this.status;
                this.status = next;
                this.logger.debug({ from: previous, to: next }, 'Listener status change');
                this.emit('statusChange', next, previous);
            }
        });
        this.actor.start();
    }

    getState(): ListenerState {
        return this.status;
    }

    getGuardrailState(): GuardrailState {
        return { ...this.actor.getSnapshot().context.guardrail };
    }

    get consecutiveRejections(): number {
        return this.actor.getSnapshot().context.consecutiveRejections;
    }

    /**
     * Capture side. Never blocks; drops the frame (and records it) when the
     * buffer is full.
     */
    pushFrame(frame: AudioFrame): boolean {
        return this.queue.push(frame);
    }

    /**
     * Consume frames one at a time until the source ends or `stop` is called.
     */
    async run(source: AsyncIterable<AudioFrame> = this.queue): Promise<void> {
        if (this.running) {
            throw new Error('Listener is already running');
        }
        this.running = true;
        this.logger.info('Listener started');
        try {
            for await (const frame of source) {
                if (!this.running) break;
                await this.processFrame(frame);
            }
        } finally {
            this.running = false;
            this.logger.info('Listener stopped');
        }
    }

    stop(): void {
        this.running = false;
        this.queue.close();
        this.segment = [];
        this.send({ type: 'RESET' });
    }

    async processFrame(frame: AudioFrame): Promise<void> {
        switch (this.status) {
            case ListenerState.IDLE:
            case ListenerState.LISTENING_FOR_WAKE:
                this.listenForWake(frame);
                return;
            case ListenerState.WAKE_DETECTED:
            case ListenerState.GUARDRAIL_CHECK:
                await this.checkGuardrail(frame);
                return;
            case ListenerState.COOLDOWN:
                this.send({ type: 'FRAME', measurement: this.deps.guardrail.measure(frame), at: this.now() });
                return;
            case ListenerState.VERIFYING:
            case ListenerState.VERIFIED_ACTIVE:
                // Only reachable when frames are pushed past `run`; one verification at a time.
                this.deps.metrics.record('listener.frames_ignored', 1, { state: this.status });
                return;
        }
    }

    private send(event: ListenerEvent): void {
        this.actor.send(event);
    }

    private listenForWake(frame: AudioFrame): void {
        const at = this.now();
        this.send({ type: 'FRAME', measurement: this.deps.guardrail.measure(frame), at });

        const wake = this.deps.wakeDetector.process(frame);
        if (!wake) return;

        this.deps.metrics.record('listener.wake_events', 1);
        this.send({ type: 'WAKE', confidence: wake.confidence, at });
        if (this.status !== ListenerState.WAKE_DETECTED) {
            this.logger.debug({ confidence: wake.confidence }, 'Wake event below threshold');
            return;
        }

        this.segment = [];
        this.deps.metrics.record('listener.wake_detected', 1);
        this.logger.info({ confidence: wake.confidence, phrase: wake.phrase }, 'Wake word detected');
        this.emit('wake', wake);
    }

    private async checkGuardrail(frame: AudioFrame): Promise<void> {
        this.segment.push(frame);
        const wakeAt = this.wakeAt();
        this.send({ type: 'FRAME', measurement: this.deps.guardrail.measure(frame), at: this.now() });

        if (this.status === ListenerState.IDLE) {
            const rejected = this.actor.getSnapshot().context.rejectedSegment ?? { speechMs: 0, silenceMs: 0 };
            const error = new GuardrailRejectedError(rejected.speechMs, rejected.silenceMs);
            this.segment = [];
            this.reportRejection({
                reason: 'guardrail',
                latencyMs: this.now() - wakeAt,
                cooldownMs: 0,
                message: error.message,
                code: error.code,
            });
            return;
        }

        if (this.status === ListenerState.VERIFYING) {
            await this.verifySegment(wakeAt);
        }
    }

    private wakeAt(): number {
        return this.actor.getSnapshot().context.wakeAt ?? this.now();
    }

    private async verifySegment(wakeAt: number): Promise<void> {
        if (this.verifying) return;
        this.verifying = true;

        const segment = this.segment;
        this.segment = [];
        const sampleRate = segment[0]?.sampleRate ?? 0;

        try {
            const result = await this.verifyOwner(segment, sampleRate, wakeAt);
            if (result) {
                this.accept(segment, sampleRate, wakeAt, result);
            }
        } finally {
            this.verifying = false;
        }
    }

    /** Resolves with the verified result, or null once a rejection has been reported. */
    private async verifyOwner(
        segment: AudioFrame[],
        sampleRate: number,
        wakeAt: number
    ): Promise<VerificationResult | null> {
        try {
            const challenge = this.deps.guardrail.challengePhrase;
            if (challenge && this.deps.challengeTranscriber) {
                const transcriber = this.deps.challengeTranscriber;
                const timeoutMs = this.options.transcriptionTimeoutMs;
                const transcript = await retryTransient(() =>
                    withTimeout('challenge transcription', timeoutMs, () =>
                        transcriber.transcribe(segment, sampleRate, timeoutMs)
                    )
                );
                if (!this.deps.guardrail.matchesChallenge(transcript.text)) {
                    this.reject('challenge_failed', wakeAt, 'Challenge phrase not spoken.');
                    return null;
                }
            }

            const enrolled = await this.deps.loadVoiceprint();
            const timeoutMs = this.options.extractionTimeoutMs;
            const live = await retryTransient(
                () => withTimeout('embedding extraction', timeoutMs, () => this.deps.extractor.extract(segment, sampleRate)),
                (error) => {
                    this.deps.metrics.record('listener.retries', 1, { operation: 'extraction' });
                    this.logger.warn({ error }, 'Embedding extraction failed, retrying once');
                }
            );

            const result = this.deps.verifier.verify(live, enrolled);
            if (!result.verified) {
                const error = new VerificationRejectedError(result.confidence, this.deps.verifier.threshold);
                this.reject('verification_rejected', wakeAt, error.message, {
                    confidence: result.confidence,
                    code: error.code,
                });
                return null;
            }
            return result;
        } catch (error) {
            const code = isGatekeeperError(error) ? error.code : undefined;
            const reason = (code && REASON_BY_CODE[code]) ?? 'collaborator_error';
            const message = error instanceof Error ? error.message : String(error);
            if (isGatekeeperError(error) && error.securityRelevant) {
                this.logger.error({ code, reason }, 'Voiceprint could not be used for verification');
            } else {
                this.logger.warn({ error, reason }, 'Verification attempt failed');
            }
            this.reject(reason, wakeAt, message, { code });
            return null;
        }
    }

    private accept(segment: AudioFrame[], sampleRate: number, wakeAt: number, result: VerificationResult): void {
        const at = this.now();
        const { ownerId, confidence } = result;
        this.send({ type: 'VERIFIED', at });

        const latencyMs = at - wakeAt;
        this.deps.metrics.record('listener.wake_to_verify_ms', latencyMs, { outcome: 'verified' });
        this.deps.metrics.record('listener.verified', 1);

        const utterance: VerifiedUtterance = {
            ownerId,
            frames: segment,
            sampleRate,
            wakeToVerifyLatencyMs: latencyMs,
            confidence,
            token: this.deps.tokens.issue(ownerId),
        };
        this.logger.info({ ownerId, latencyMs, confidence }, 'Speaker verified');
        this.send({ type: 'RELEASE' });
        this.notify('verified', utterance);
    }

    private reject(
        reason: RejectionReason,
        wakeAt: number,
        message: string,
        extra: { confidence?: number; code?: string } = {}
    ): void {
        const at = this.now();
        this.send({ type: 'REJECTED', reason, countsTowardLockout: LOCKOUT_REASONS.has(reason), at });
        const context = this.actor.getSnapshot().context;

        if (context.consecutiveRejections >= this.options.cooldown.maxConsecutiveRejections && LOCKOUT_REASONS.has(reason)) {
            this.logger.warn(
                { consecutive: context.consecutiveRejections, cooldownMs: context.lastCooldownMs },
                'Repeated rejections, cooldown extended'
            );
        }

        this.reportRejection({
            reason,
            latencyMs: at - wakeAt,
            cooldownMs: context.lastCooldownMs,
            message,
            ...extra,
        });
    }

    private reportRejection(rejection: ListenerRejection): void {
        this.deps.metrics.record('listener.rejection_latency_ms', rejection.latencyMs, { reason: rejection.reason });
        this.deps.metrics.record('listener.rejected', 1, { reason: rejection.reason });
        this.logger.warn(
            { reason: rejection.reason, latencyMs: rejection.latencyMs, cooldownMs: rejection.cooldownMs },
            'Utterance rejected'
        );
        this.notify('rejected', rejection);
    }

    // Handler failures are logged; the state machine has already moved on.
    private notify(event: 'verified' | 'rejected', payload: VerifiedUtterance | ListenerRejection): void {
        try {
            this.emit(event, payload);
        } catch (error) {
            this.deps.metrics.record('listener.handler_errors', 1, { event });
            this.logger.error({ error, event }, 'Listener event handler failed');
        }
    }
}
