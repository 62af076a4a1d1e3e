/**
 * Error hierarchy for the gatekeeper.
 *
 * Every failure carries a stable `code`. Security-relevant failures
 * (missing key, key mismatch, unverified dispatch) are separate classes so a
 * caller can never confuse "service unavailable" with "identity rejected".
 */

export type GatekeeperErrorCode =
    | 'MISSING_KEY'
    | 'KEY_MISMATCH'
    | 'VOICEPRINT_CORRUPT'
    | 'NOT_ENROLLED'
    | 'GUARDRAIL_REJECTED'
    | 'VERIFICATION_REJECTED'
    | 'TIMEOUT'
    | 'EXTRACTION_FAILED'
    | 'LOW_CONFIDENCE'
    | 'UNVERIFIED'
    | 'INVALID_ARGS'
    | 'CLARIFICATION_REQUIRED'
    | 'TOOL_NOT_ROUTED'
    | 'UNKNOWN_TOOL'
    | 'CONFIRMATION_DECLINED'
    | 'CONFIG_INVALID';

const SECURITY_CODES: ReadonlySet<GatekeeperErrorCode> = new Set(['MISSING_KEY', 'KEY_MISMATCH', 'UNVERIFIED']);
const TRANSIENT_CODES: ReadonlySet<GatekeeperErrorCode> = new Set(['TIMEOUT', 'EXTRACTION_FAILED']);

export class GatekeeperError extends Error {
    constructor(
        message: string,
        public readonly code: GatekeeperErrorCode,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'GatekeeperError';
    }

    get securityRelevant(): boolean {
        return SECURITY_CODES.has(this.code);
    }

    get transient(): boolean {
        return TRANSIENT_CODES.has(this.code);
    }
}

export class MissingKeyError extends GatekeeperError {
    constructor(operation: string) {
        super(`An explicit voice key is required to ${operation}.`, 'MISSING_KEY', { operation });
        this.name = 'MissingKeyError';
    }
}

export class KeyMismatchError extends GatekeeperError {
    constructor(path: string) {
        super(
            `Voiceprint at "${path}" was enrolled under a different key. Re-enroll the owner with the current key.`,
            'KEY_MISMATCH',
            { path }
        );
        this.name = 'KeyMismatchError';
    }
}

export class VoiceprintCorruptError extends GatekeeperError {
    constructor(path: string, reason: string) {
        super(`Voiceprint at "${path}" could not be decoded: ${reason}`, 'VOICEPRINT_CORRUPT', { path, reason });
        this.name = 'VoiceprintCorruptError';
    }
}

export class NotEnrolledError extends GatekeeperError {
    constructor(path: string) {
        super(`No voiceprint enrolled at "${path}".`, 'NOT_ENROLLED', { path });
        this.name = 'NotEnrolledError';
    }
}

export class GuardrailRejectedError extends GatekeeperError {
    constructor(speechMs: number, silenceMs: number) {
        super(
            `Insufficient speech captured (speech ${speechMs}ms, silence ${silenceMs}ms).`,
            'GUARDRAIL_REJECTED',
            { speechMs, silenceMs }
        );
        this.name = 'GuardrailRejectedError';
    }
}

export class VerificationRejectedError extends GatekeeperError {
    constructor(confidence: number, threshold: number) {
        super(
            `Speaker does not match the enrolled owner (score ${confidence.toFixed(3)} < ${threshold}).`,
            'VERIFICATION_REJECTED',
            { confidence, threshold }
        );
        this.name = 'VerificationRejectedError';
    }
}

export class TimeoutError extends GatekeeperError {
    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms.`, 'TIMEOUT', { operation, timeoutMs });
        this.name = 'TimeoutError';
    }
}

export class ExtractionError extends GatekeeperError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'EXTRACTION_FAILED', details);
        this.name = 'ExtractionError';
    }
}

export class LowConfidenceError extends GatekeeperError {
    constructor(confidence: number, threshold: number) {
        super(
            `Transcription confidence ${confidence.toFixed(2)} is below ${threshold}.`,
            'LOW_CONFIDENCE',
            { confidence, threshold }
        );
        this.name = 'LowConfidenceError';
    }
}

export class UnverifiedError extends GatekeeperError {
    constructor(reason: string) {
        super(`Owner verification required for tool dispatch: ${reason}.`, 'UNVERIFIED', { reason });
        this.name = 'UnverifiedError';
    }
}

export class InvalidArgsError extends GatekeeperError {
    constructor(tool: string, issues: string[]) {
        super(`Invalid arguments for tool "${tool}": ${issues.join('; ')}`, 'INVALID_ARGS', { tool, issues });
        this.name = 'InvalidArgsError';
    }
}

export class ClarificationRequiredError extends GatekeeperError {
    constructor(intentLabel: string, confidence: number) {
        super(
            `Intent "${intentLabel}" is ambiguous (confidence ${confidence}); ask the owner before dispatching a tool.`,
            'CLARIFICATION_REQUIRED',
            { intentLabel, confidence }
        );
        this.name = 'ClarificationRequiredError';
    }
}

export class ToolNotRoutedError extends GatekeeperError {
    constructor(tool: string, intentLabel: string) {
        super(`Tool "${tool}" was not routed for intent "${intentLabel}".`, 'TOOL_NOT_ROUTED', { tool, intentLabel });
        this.name = 'ToolNotRoutedError';
    }
}

export class UnknownToolError extends GatekeeperError {
    constructor(tool: string) {
        super(`Tool "${tool}" is not registered.`, 'UNKNOWN_TOOL', { tool });
        this.name = 'UnknownToolError';
    }
}

export class ConfirmationDeclinedError extends GatekeeperError {
    constructor(tool: string, reason: string) {
        super(`Owner did not confirm "${tool}": ${reason}.`, 'CONFIRMATION_DECLINED', { tool, reason });
        this.name = 'ConfirmationDeclinedError';
    }
}

export class ConfigInvalidError extends GatekeeperError {
    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID', { issues });
        this.name = 'ConfigInvalidError';
    }
}

export function isGatekeeperError(error: unknown): error is GatekeeperError {
    return error instanceof GatekeeperError;
}
