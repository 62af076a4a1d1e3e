/**
 * Process-wide configuration.
 *
 * Built once at startup from the environment and passed explicitly into each
 * component; nothing below reads `process.env` on its own. The verification
 * threshold has no default: operators must choose the security/usability
 * trade-off themselves.
 */

import { z } from 'zod';
import { ConfigInvalidError } from './lib/errors.js';

const numberFromEnv = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess((value) => (value === undefined || value === '' ? undefined : Number(value)), schema);

const optionalString = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

const listFromEnv = (fallback: string[]) =>
    z.preprocess(
        (value) =>
            typeof value === 'string'
                ? value.split(',').map((item) => item.trim()).filter((item) => item.length > 0)
                : undefined,
        z.array(z.string()).min(1).default(fallback)
    );

const probability = () => z.number().min(0).max(1);
const positiveMs = () => z.number().int().positive();

const EnvSchema = z.object({
    VOICEGATE_VOICE_KEY: optionalString,
    VOICEGATE_OWNER_ID: z.string().min(1).default('owner'),
    VOICEGATE_VOICEPRINT_PATH: z.string().min(1).default('./owner.voiceprint.json'),

    VOICEGATE_VERIFICATION_THRESHOLD: numberFromEnv(
        z.number({ required_error: 'a verification threshold must be configured explicitly' }).min(0).max(1)
    ),
    VOICEGATE_WAKE_THRESHOLD: numberFromEnv(probability().default(0.8)),
    VOICEGATE_WAKE_WORDS: listFromEnv(['jarvis', 'hey jarvis']),

    VOICEGATE_MIN_SPEECH_MS: numberFromEnv(positiveMs().default(600)),
    VOICEGATE_MAX_SILENCE_MS: numberFromEnv(positiveMs().default(1500)),
    VOICEGATE_ENERGY_THRESHOLD: numberFromEnv(probability().default(0.02)),
    VOICEGATE_CHALLENGE_PHRASE: optionalString,

    VOICEGATE_COOLDOWN_MS: numberFromEnv(positiveMs().default(2000)),
    VOICEGATE_MAX_CONSECUTIVE_REJECTIONS: numberFromEnv(z.number().int().min(1).default(3)),
    VOICEGATE_REJECTION_WINDOW_MS: numberFromEnv(positiveMs().default(60_000)),
    VOICEGATE_COOLDOWN_ESCALATION: numberFromEnv(z.number().min(1).default(2)),
    VOICEGATE_MAX_COOLDOWN_MS: numberFromEnv(positiveMs().default(60_000)),

    VOICEGATE_TOKEN_TTL_MS: numberFromEnv(positiveMs().default(30_000)),
    VOICEGATE_FRAME_BUFFER: numberFromEnv(z.number().int().min(1).default(64)),

    VOICEGATE_EXTRACTION_TIMEOUT_MS: numberFromEnv(positiveMs().default(2000)),
    VOICEGATE_TRANSCRIPTION_TIMEOUT_MS: numberFromEnv(positiveMs().default(5000)),
    VOICEGATE_LLM_TIMEOUT_MS: numberFromEnv(positiveMs().default(15_000)),
    VOICEGATE_TOOL_TIMEOUT_MS: numberFromEnv(positiveMs().default(5000)),
    VOICEGATE_CONFIRMATION_TIMEOUT_MS: numberFromEnv(positiveMs().default(15_000)),

    VOICEGATE_DISCOVERED_TOOLS: optionalString,
    VOICEGATE_DISCOVERED_TOOLS_PATH: optionalString,

    VOICEGATE_COMPLEXITY_CUTOFF: numberFromEnv(probability().default(0.5)),
    VOICEGATE_CLARIFICATION_THRESHOLD: numberFromEnv(probability().default(0.5)),
    VOICEGATE_ASR_CONFIDENCE_THRESHOLD: numberFromEnv(probability().default(0.7)),
    VOICEGATE_LOW_COST_MODEL: z.string().min(1).default('llama-3.1-8b-instant'),
    VOICEGATE_HIGH_CAPABILITY_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),

    GROQ_API_KEY: optionalString,
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface WakeConfig {
    threshold: number;
    words: readonly string[];
}

export interface GuardrailConfig {
    minSpeechMs: number;
    maxSilenceMs: number;
    energyThreshold: number;
    challengePhrase?: string;
}

export interface CooldownConfig {
    baseMs: number;
    maxConsecutiveRejections: number;
    rejectionWindowMs: number;
    escalationFactor: number;
    maxMs: number;
}

export interface TimeoutConfig {
    extractionMs: number;
    transcriptionMs: number;
    llmMs: number;
    toolMs: number;
    confirmationMs: number;
}

/** Externally described tools: an inline JSON list wins over a file path. */
export interface DiscoveryConfig {
    inline?: string;
    path?: string;
}

export interface RoutingConfig {
    complexityCutoff: number;
    clarificationThreshold: number;
    lowCostModel: string;
    highCapabilityModel: string;
}

export interface GatekeeperConfig {
    ownerId: string;
    voiceprintPath: string;
    voiceKey?: string;
    verificationThreshold: number;
    wake: WakeConfig;
    guardrail: GuardrailConfig;
    cooldown: CooldownConfig;
    tokenTtlMs: number;
    frameBufferSize: number;
    timeouts: TimeoutConfig;
    routing: RoutingConfig;
    discovery: DiscoveryConfig;
    asrConfidenceThreshold: number;
    groqApiKey?: string;
    logLevel: string;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const child of Object.values(value)) {
        if (child && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<GatekeeperConfig> {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigInvalidError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const e = parsed.data;
    return deepFreeze<GatekeeperConfig>({
        ownerId: e.VOICEGATE_OWNER_ID,
        voiceprintPath: e.VOICEGATE_VOICEPRINT_PATH,
        voiceKey: e.VOICEGATE_VOICE_KEY,
        verificationThreshold: e.VOICEGATE_VERIFICATION_THRESHOLD,
        wake: {
            threshold: e.VOICEGATE_WAKE_THRESHOLD,
            words: e.VOICEGATE_WAKE_WORDS,
        },
        guardrail: {
            minSpeechMs: e.VOICEGATE_MIN_SPEECH_MS,
            maxSilenceMs: e.VOICEGATE_MAX_SILENCE_MS,
            energyThreshold: e.VOICEGATE_ENERGY_THRESHOLD,
            challengePhrase: e.VOICEGATE_CHALLENGE_PHRASE,
        },
        cooldown: {
            baseMs: e.VOICEGATE_COOLDOWN_MS,
            maxConsecutiveRejections: e.VOICEGATE_MAX_CONSECUTIVE_REJECTIONS,
            rejectionWindowMs: e.VOICEGATE_REJECTION_WINDOW_MS,
            escalationFactor: e.VOICEGATE_COOLDOWN_ESCALATION,
            maxMs: e.VOICEGATE_MAX_COOLDOWN_MS,
        },
        tokenTtlMs: e.VOICEGATE_TOKEN_TTL_MS,
        frameBufferSize: e.VOICEGATE_FRAME_BUFFER,
        timeouts: {
            extractionMs: e.VOICEGATE_EXTRACTION_TIMEOUT_MS,
            transcriptionMs: e.VOICEGATE_TRANSCRIPTION_TIMEOUT_MS,
            llmMs: e.VOICEGATE_LLM_TIMEOUT_MS,
            toolMs: e.VOICEGATE_TOOL_TIMEOUT_MS,
            confirmationMs: e.VOICEGATE_CONFIRMATION_TIMEOUT_MS,
        },
        routing: {
            complexityCutoff: e.VOICEGATE_COMPLEXITY_CUTOFF,
            clarificationThreshold: e.VOICEGATE_CLARIFICATION_THRESHOLD,
            lowCostModel: e.VOICEGATE_LOW_COST_MODEL,
            highCapabilityModel: e.VOICEGATE_HIGH_CAPABILITY_MODEL,
        },
        discovery: {
            inline: e.VOICEGATE_DISCOVERED_TOOLS,
            path: e.VOICEGATE_DISCOVERED_TOOLS_PATH,
        },
        asrConfidenceThreshold: e.VOICEGATE_ASR_CONFIDENCE_THRESHOLD,
        groqApiKey: e.GROQ_API_KEY,
        logLevel: e.LOG_LEVEL,
    });
}

export interface EnvCheck {
    present: string[];
    missing: string[];
    ok: boolean;
}

// Reports names only; values are never echoed.
export function auditEnvironment(required: Iterable<string>, env: NodeJS.ProcessEnv = process.env): EnvCheck {
    const present: string[] = [];
    const missing: string[] = [];
    for (const name of required) {
        if (env[name]) {
            present.push(name);
        } else {
            missing.push(name);
        }
    }
    return { present, missing, ok: missing.length === 0 };
}
