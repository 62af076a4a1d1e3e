/**
 * Voice Gatekeeper
 *
 * Wires the listener to the decision pipeline:
 * verified utterance -> transcript -> intent -> routing decision -> LLM payload.
 * Tool calls go through `dispatch`, which hands the utterance's token to the
 * ToolGate. Nothing privileged runs without a token issued by the listener.
 */

import { EventEmitter } from 'events';
import type {
    EnrolledVoiceprint,
    IntentResult,
    ListenerRejection,
    RoutingDecision,
    ToolResult,
    VerificationToken,
    VerifiedUtterance,
} from '@voicegate/shared';
import type { GatekeeperConfig } from './config.js';
import { GroqBackend, GroqTranscriber, createGroqClient, type LlmBackend } from './lib/groq.js';
import type { Logger } from './lib/logger.js';
import { MetricsCollector } from './lib/metrics.js';
import { retryTransient, withTimeout } from './lib/timeout.js';
import { TraceRecorder } from './lib/tracing.js';
import { AsrRouter, type Transcriber } from './nlp/asr.js';
import { ConversationController } from './nlp/conversation.js';
import { IntentClassifier } from './nlp/intent-classifier.js';
import { LLMRouter, type LlmPayload, type ToolDescriptor } from './nlp/router.js';
import { registerBuiltinTools } from './tools/builtin.js';
import type { ConfirmationPrompt } from './tools/confirmation.js';
import {
    loadDiscoveredTools,
    registerDiscoveredTools,
    type DiscoveredTool,
    type DiscoveredToolInvoker,
} from './tools/discovery.js';
import { ToolRegistry } from './tools/registry.js';
import { TokenLedger } from './tools/token-ledger.js';
import { ToolGate, type ToolInvocation } from './tools/tool-gate.js';
import { ContinuousListener } from './voice/continuous-listener.js';
import { HashEmbeddingExtractor, type EmbeddingExtractor } from './voice/embedding.js';
import { AudioGuardrail } from './voice/guardrail.js';
import { SpeakerVerifier } from './voice/speaker-verifier.js';
import { VoiceprintStore } from './voice/voiceprint-store.js';
import { TranscriptWakeDetector, type KeywordSpotter, type WakeDetector } from './voice/wake-detector.js';

export interface GatekeeperDependencies {
    config: Readonly<GatekeeperConfig>;
    logger: Logger;
    /** Either a ready detector, or a keyword spotter matched against the configured wake words. */
    wakeDetector?: WakeDetector;
    keywordSpotter?: KeywordSpotter;
    /** Cloud (or only) transcriber. */
    transcriber: Transcriber;
    /** When set, tried first; `transcriber` becomes the low-confidence fallback. */
    localTranscriber?: Transcriber;
    extractor?: EmbeddingExtractor;
    llm?: LlmBackend;
    /** Unbound registry of custom tools; the gatekeeper's gate takes its dispatcher. */
    registry?: ToolRegistry;
    discoveredTools?: readonly DiscoveredTool[];
    invokeDiscovered?: DiscoveredToolInvoker;
    /** Owner yes/no prompt for tools that require confirmation. */
    confirm?: ConfirmationPrompt;
    store?: VoiceprintStore;
    metrics?: MetricsCollector;
    now?: () => number;
}

export interface ProcessedUtterance {
    ownerId: string;
    transcript: string;
    intent: IntentResult;
    decision: RoutingDecision;
    payload: LlmPayload;
    reply?: string;
    token: VerificationToken;
}

export interface GatekeeperEvents {
    utterance: (processed: ProcessedUtterance) => void;
    rejected: (rejection: ListenerRejection) => void;
    pipelineError: (error: unknown, utterance: VerifiedUtterance) => void;
}

function resolveWakeDetector(deps: GatekeeperDependencies): WakeDetector {
    if (deps.wakeDetector) return deps.wakeDetector;
    if (deps.keywordSpotter) {
        return new TranscriptWakeDetector(deps.keywordSpotter, deps.config.wake.words);
    }
    throw new Error('A wake detector or a keyword spotter is required');
}

export class VoiceGatekeeper extends EventEmitter {
    readonly listener: ContinuousListener;
    readonly metrics: MetricsCollector;
    readonly tokens: TokenLedger;
    readonly trace: TraceRecorder;

    private readonly config: Readonly<GatekeeperConfig>;
    private readonly logger: Logger;
    private readonly registry: ToolRegistry;
    private readonly store: VoiceprintStore;
    private readonly transcriber: Transcriber;
    private readonly classifier = new IntentClassifier();
    private readonly router: LLMRouter;
    private readonly conversation: ConversationController;
    private readonly gate: ToolGate;
    private readonly llm?: LlmBackend;
    private readonly inFlight = new Set<Promise<void>>();
    private enrolled: EnrolledVoiceprint | null = null;

    constructor(deps: GatekeeperDependencies) {
        super();
        const { config } = deps;
        this.config = config;
        this.logger = deps.logger.child({ component: 'gatekeeper' });
        this.metrics = deps.metrics ?? new MetricsCollector(deps.logger);
        this.store = deps.store ?? new VoiceprintStore(deps.logger);
        this.llm = deps.llm;
        this.tokens = new TokenLedger(config.tokenTtlMs, deps.now);
        this.trace = new TraceRecorder(this.metrics);
        this.registry = registerDiscoveredTools(
            deps.registry ?? registerBuiltinTools(new ToolRegistry()),
            deps.discoveredTools ?? [],
            deps.invokeDiscovered
        );

        this.transcriber = deps.localTranscriber
            ? new AsrRouter(
                  deps.localTranscriber,
                  deps.transcriber,
                  { threshold: config.asrConfidenceThreshold },
                  this.metrics,
                  deps.logger
              )
            : deps.transcriber;

        this.router = new LLMRouter(config.routing);
        this.conversation = new ConversationController(this.router, 6, deps.logger);
        this.gate = new ToolGate(
            this.registry,
            this.tokens,
            {
                ownerId: config.ownerId,
                toolTimeoutMs: config.timeouts.toolMs,
                confirm: deps.confirm,
                confirmationTimeoutMs: config.timeouts.confirmationMs,
            },
            this.metrics,
            deps.logger
        );

        this.listener = new ContinuousListener(
            {
                wakeDetector: resolveWakeDetector(deps),
                extractor: deps.extractor ?? new HashEmbeddingExtractor(),
                verifier: new SpeakerVerifier({ threshold: config.verificationThreshold }),
                guardrail: new AudioGuardrail(config.guardrail),
                loadVoiceprint: () => this.loadVoiceprint(),
                tokens: this.tokens,
                metrics: this.metrics,
                logger: deps.logger,
                challengeTranscriber: config.guardrail.challengePhrase ? this.transcriber : undefined,
                now: deps.now,
            },
            {
                wakeThreshold: config.wake.threshold,
                cooldown: config.cooldown,
                extractionTimeoutMs: config.timeouts.extractionMs,
                transcriptionTimeoutMs: config.timeouts.transcriptionMs,
                frameBufferSize: config.frameBufferSize,
            }
        );

        this.listener.on('verified', (utterance: VerifiedUtterance) => this.track(utterance));
        this.listener.on('rejected', (rejection: ListenerRejection) => this.emit('rejected', rejection));
    }

    /**
     * Runs the listener until its frame source ends or `stop` is called, then
     * waits for utterances still being processed.
     */
    async start(): Promise<void> {
        this.logger.info({ ownerId: this.config.ownerId, tools: this.registry.names() }, 'Gatekeeper starting');
        try {
            await this.listener.run();
        } finally {
            await this.drain();
        }
    }

    stop(): void {
        this.listener.stop();
        this.tokens.revokeAll();
        this.logger.info({ summary: this.metrics.getSummary() }, 'Gatekeeper stopped');
    }

    async drain(): Promise<void> {
        await Promise.all([...this.inFlight]);
    }

    /** Descriptors of the tools the gate can dispatch. */
    catalog(): Readonly<ToolDescriptor>[] {
        return this.registry.describe();
    }

    /** Drops the cached voiceprint so the next verification reads it from disk. */
    reloadVoiceprint(): void {
        this.enrolled = null;
    }

    async processUtterance(utterance: VerifiedUtterance): Promise<ProcessedUtterance> {
        const startTime = Date.now();
        const timeoutMs = this.config.timeouts.transcriptionMs;
        const transcription = await this.trace.span('transcription', () =>
            retryTransient(
                () =>
                    withTimeout('transcription', timeoutMs, () =>
                        this.transcriber.transcribe(utterance.frames, utterance.sampleRate, timeoutMs)
                    ),
                (error) => {
                    this.metrics.record('pipeline.retries', 1, { operation: 'transcription' });
                    this.logger.warn({ error }, 'Transcription failed, retrying once');
                }
            )
        );

        const intent = await this.trace.span('classification', () => this.classifier.classify(transcription.text));
        const catalog = this.registry.describe();
        const { decision, payload } = await this.trace.span('routing', () => {
            const routed = this.router.route(intent, catalog);
            return { decision: routed, payload: this.conversation.respond(routed, transcription.text, catalog) };
        });

        this.metrics.record('pipeline.intent', 1, { intent: intent.intentLabel, tier: decision.modelTier });
        this.logger.info(
            {
                intent: intent.intentLabel,
                confidence: intent.confidence,
                complexity: intent.complexityScore,
                clarificationNeeded: decision.clarificationNeeded,
            },
            'Utterance classified'
        );

        let reply: string | undefined;
        const llm = this.llm;
        if (llm) {
            reply = await this.trace.span('llm', () => llm.complete(payload));
            this.conversation.recordReply(reply);
        }

        this.metrics.record('pipeline.processing_ms', Date.now() - startTime);
        return {
            ownerId: utterance.ownerId,
            transcript: transcription.text,
            intent,
            decision,
            payload,
            reply,
            token: utterance.token,
        };
    }

    dispatch(
        decision: RoutingDecision,
        token: VerificationToken | null | undefined,
        invocation: ToolInvocation
    ): Promise<ToolResult> {
        return this.gate.authorizeAndDispatch(decision, token, invocation);
    }

    private async loadVoiceprint(): Promise<EnrolledVoiceprint> {
        if (!this.enrolled) {
            this.enrolled = await this.store.load(this.config.voiceprintPath, this.config.voiceKey);
        }
        return this.enrolled;
    }

    private track(utterance: VerifiedUtterance): void {
        const task = this.processUtterance(utterance).then(
            (processed) => {
                this.emit('utterance', processed);
            },
            (error: unknown) => {
                this.metrics.record('pipeline.errors', 1);
                this.logger.error({ error }, 'Utterance processing failed');
                this.emit('pipelineError', error, utterance);
            }
        );
        this.inFlight.add(task);
        void task.finally(() => this.inFlight.delete(task));
    }
}

export type GroqGatekeeperOptions = Omit<GatekeeperDependencies, 'config' | 'logger' | 'transcriber' | 'llm'>;

/**
 * Gatekeeper backed by Groq for cloud transcription and completions.
 * Requires GROQ_API_KEY. Discovered tools are read from the configuration
 * unless the caller passes them in.
 */
export async function createGatekeeper(
    config: Readonly<GatekeeperConfig>,
    logger: Logger,
    options: GroqGatekeeperOptions
): Promise<VoiceGatekeeper> {
    const groq = createGroqClient(config.groqApiKey);
    const metrics = options.metrics ?? new MetricsCollector(logger);
    const discoveredTools = options.discoveredTools ?? (await loadDiscoveredTools(config.discovery, logger));
    return new VoiceGatekeeper({
        ...options,
        config,
        logger,
        metrics,
        discoveredTools,
        transcriber: new GroqTranscriber(groq, metrics, logger),
        llm: new GroqBackend(groq, config.timeouts.llmMs, metrics, logger),
    });
}
