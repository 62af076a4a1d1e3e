import { describe, expect, test } from 'vitest';
import { auditEnvironment, loadConfig } from './config.js';
import { ConfigInvalidError } from './lib/errors.js';

describe('loadConfig', () => {
    test('applies defaults around the required verification threshold', () => {
        const config = loadConfig({ VOICEGATE_VERIFICATION_THRESHOLD: '0.75' });

        expect(config.verificationThreshold).toBe(0.75);
        expect(config.ownerId).toBe('owner');
        expect(config.wake).toEqual({ threshold: 0.8, words: ['jarvis', 'hey jarvis'] });
        expect(config.guardrail.minSpeechMs).toBe(600);
        expect(config.guardrail.maxSilenceMs).toBe(1500);
        expect(config.cooldown.baseMs).toBe(2000);
        expect(config.tokenTtlMs).toBe(30_000);
        expect(config.routing.lowCostModel).toBe('llama-3.1-8b-instant');
        expect(config.routing.highCapabilityModel).toBe('llama-3.3-70b-versatile');
        expect(config.timeouts.confirmationMs).toBe(15_000);
        expect(config.discovery).toEqual({ inline: undefined, path: undefined });
        expect(config.voiceKey).toBeUndefined();
        expect(config.logLevel).toBe('info');
    });

    test('returns a deeply frozen object', () => {
        const config = loadConfig({ VOICEGATE_VERIFICATION_THRESHOLD: '0.75' });
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.guardrail)).toBe(true);
        expect(Object.isFrozen(config.wake.words)).toBe(true);
    });

    test('has no default verification threshold', () => {
        expect(() => loadConfig({})).toThrow(ConfigInvalidError);
        expect(() => loadConfig({})).toThrow(/VOICEGATE_VERIFICATION_THRESHOLD/);
    });

    test('rejects out-of-range and non-numeric values', () => {
        expect(() => loadConfig({ VOICEGATE_VERIFICATION_THRESHOLD: '1.5' })).toThrow(ConfigInvalidError);
        expect(() =>
            loadConfig({ VOICEGATE_VERIFICATION_THRESHOLD: '0.7', VOICEGATE_MIN_SPEECH_MS: 'soon' })
        ).toThrow(/VOICEGATE_MIN_SPEECH_MS/);
    });

    test('parses lists, secrets and overrides', () => {
        const config = loadConfig({
            VOICEGATE_VERIFICATION_THRESHOLD: '0.7',
            VOICEGATE_WAKE_WORDS: 'computer, hey computer ,',
            VOICEGATE_VOICE_KEY: 'test-secret',
            VOICEGATE_CHALLENGE_PHRASE: '',
            VOICEGATE_COOLDOWN_MS: '500',
            LOG_LEVEL: 'debug',
        });

        expect(config.wake.words).toEqual(['computer', 'hey computer']);
        expect(config.voiceKey).toBe('test-secret');
        expect(config.guardrail.challengePhrase).toBeUndefined();
        expect(config.cooldown.baseMs).toBe(500);
        expect(config.logLevel).toBe('debug');
    });
});

describe('auditEnvironment', () => {
    test('reports present and missing variable names', () => {
        expect(auditEnvironment(['GROQ_API_KEY', 'VOICEGATE_VOICE_KEY'], { GROQ_API_KEY: 'test-key' })).toEqual({
            present: ['GROQ_API_KEY'],
            missing: ['VOICEGATE_VOICE_KEY'],
            ok: false,
        });
    });
});
