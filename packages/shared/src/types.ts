// Shared types for the voice gatekeeper

export enum ListenerState {
    IDLE = 'idle',
    LISTENING_FOR_WAKE = 'listening_for_wake',
    WAKE_DETECTED = 'wake_detected',
    GUARDRAIL_CHECK = 'guardrail_check',
    VERIFYING = 'verifying',
    VERIFIED_ACTIVE = 'verified_active',
    COOLDOWN = 'cooldown',
}

export interface AudioFrame {
    readonly samples: Int16Array;
    readonly sampleRate: number;
    readonly timestamp: number;
}

export interface WakeEvent {
    confidence: number;
    timestamp: number;
    phrase?: string;
}

export type EmbeddingVector = readonly number[];

/**
 * Persisted, encrypted owner embedding. The raw key never appears here,
 * only its fingerprint.
 */
export interface Voiceprint {
    version: 1;
    ownerId: string;
    ciphertext: string;
    salt: string;
    iv: string;
    authTag: string;
    keyFingerprint: string;
    createdAt: string;
}

export interface EnrolledVoiceprint {
    ownerId: string;
    embedding: EmbeddingVector;
    keyFingerprint: string;
}

export interface VerificationResult {
    verified: boolean;
    confidence: number;
    ownerId: string;
}

export interface GuardrailState {
    speechMs: number;
    silenceMs: number;
}

export interface VerificationToken {
    readonly id: string;
    readonly ownerId: string;
    readonly issuedAt: number;
    readonly ttlMs: number;
}

export interface VerifiedUtterance {
    ownerId: string;
    frames: readonly AudioFrame[];
    sampleRate: number;
    wakeToVerifyLatencyMs: number;
    confidence: number;
    token: VerificationToken;
}

export type RejectionReason =
    | 'guardrail'
    | 'challenge_failed'
    | 'verification_rejected'
    | 'timeout'
    | 'extraction_failed'
    | 'not_enrolled'
    | 'key_mismatch'
    | 'missing_key'
    | 'voiceprint_unavailable'
    | 'collaborator_error';

export interface ListenerRejection {
    reason: RejectionReason;
    latencyMs: number;
    confidence?: number;
    cooldownMs: number;
    message: string;
    code?: string;
}

export type IntentLabel = 'chat' | 'email' | 'call' | 'blog' | 'tool-needed' | 'unknown';

export interface IntentResult {
    intentLabel: IntentLabel;
    complexityScore: number;
    confidence: number;
    evidence: string[];
}

export type ComplexityTier = 'simple' | 'complex';

export type ModelTier = 'low-cost' | 'high-capability';

export interface RoutingDecision {
    intentLabel: IntentLabel;
    complexityTier: ComplexityTier;
    modelTier: ModelTier;
    model: string;
    toolSchemaRefs: string[];
    clarificationNeeded: boolean;
    confidence: number;
}

export interface ToolResult {
    ok: boolean;
    data?: Record<string, unknown>;
    error?: string;
}

export interface ConversationTurn {
    role: 'user' | 'assistant';
    content: string;
}

export type MetricTags = Record<string, string | number | boolean>;

export interface MetricEvent {
    name: string;
    value: number;
    timestamp: number;
    tags?: MetricTags;
}
