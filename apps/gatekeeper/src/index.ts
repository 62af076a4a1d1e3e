/**
 * Voice Gatekeeper public API
 *
 * Continuous owner verification in front of a personal assistant:
 * 1. Wake word and speech guardrails on the live audio stream
 * 2. Speaker verification against an encrypted voiceprint
 * 3. Intent classification and model-tier routing
 * 4. Token-gated tool dispatch
 */

export * from '@voicegate/shared';

export { loadConfig, auditEnvironment } from './config.js';
export type {
    GatekeeperConfig,
    WakeConfig,
    GuardrailConfig,
    CooldownConfig,
    TimeoutConfig,
    RoutingConfig,
    DiscoveryConfig,
    EnvCheck,
} from './config.js';

export * from './lib/errors.js';
export { createLogger, createSilentLogger, REDACT_PATHS } from './lib/logger.js';
export type { Logger, LoggerOptions } from './lib/logger.js';
export { MetricsCollector, noopMetrics } from './lib/metrics.js';
export type { MetricsSink, MetricsSummary } from './lib/metrics.js';
export { withTimeout, retryTransient } from './lib/timeout.js';
export { TraceRecorder } from './lib/tracing.js';
export type { Span } from './lib/tracing.js';
export { createGroqClient, GroqBackend, GroqTranscriber } from './lib/groq.js';
export type { LlmBackend } from './lib/groq.js';

export * from './voice/audio.js';
export { ScoredWakeDetector, TranscriptWakeDetector, matchWakeWord, levenshteinDistance } from './voice/wake-detector.js';
export type { WakeDetector, FrameScorer, KeywordSpotter, WakeWordMatch } from './voice/wake-detector.js';
export { HashEmbeddingExtractor } from './voice/embedding.js';
export type { EmbeddingExtractor, HashEmbeddingOptions } from './voice/embedding.js';
export { SpeakerVerifier, cosineSimilarity } from './voice/speaker-verifier.js';
export { VoiceprintStore, fingerprintKey } from './voice/voiceprint-store.js';
export type { VoiceKey } from './voice/voiceprint-store.js';
export { AudioGuardrail, emptyGuardrailState } from './voice/guardrail.js';
export type { GuardrailVerdict, FrameMeasurement } from './voice/guardrail.js';
export { FrameQueue } from './voice/frame-queue.js';
export { ContinuousListener } from './voice/continuous-listener.js';
export type { ListenerDependencies, ListenerOptions, ListenerEvents, VoiceprintLoader } from './voice/continuous-listener.js';

export { AsrRouter } from './nlp/asr.js';
export type { Transcriber, Transcription, AsrRouterOptions } from './nlp/asr.js';
export { IntentClassifier, classify, complexityScore } from './nlp/intent-classifier.js';
export { LLMRouter } from './nlp/router.js';
export type { ToolDescriptor, LlmMessage, LlmPayload } from './nlp/router.js';
export { ConversationController } from './nlp/conversation.js';

export { TokenLedger } from './tools/token-ledger.js';
export type { TokenCheck } from './tools/token-ledger.js';
export { ToolRegistry } from './tools/registry.js';
export type { ToolDefinition, ToolImplementation, ToolDispatcher, PreparedCall } from './tools/registry.js';
export { ToolGate } from './tools/tool-gate.js';
export type { ToolInvocation, ToolGateOptions } from './tools/tool-gate.js';
export { registerBuiltinTools, slugify } from './tools/builtin.js';
export type { BuiltinToolOptions } from './tools/builtin.js';
export { confirmationQuestion, isAffirmative } from './tools/confirmation.js';
export type { ConfirmationPrompt } from './tools/confirmation.js';
export { dryRunInvoker, loadDiscoveredTools, parseDiscoveredTools, registerDiscoveredTools } from './tools/discovery.js';
export type { DiscoveredTool, DiscoveredToolInvoker } from './tools/discovery.js';

export { VoiceGatekeeper, createGatekeeper } from './gatekeeper.js';
export type { GatekeeperDependencies, GatekeeperEvents, GroqGatekeeperOptions, ProcessedUtterance } from './gatekeeper.js';
